import { HangmanGame } from './hangman-game';
import { HANGMAN_WORDS } from './hangman.constants';

/**
 * Game state owned by one MCP session. Each connected client gets its
 * own instance, so concurrent players never see each other's words.
 */
export class HangmanSession {
  private current: HangmanGame | null = null;

  constructor(
    private readonly words: readonly string[] = HANGMAN_WORDS,
    private readonly random: () => number = Math.random,
  ) {}

  get game(): HangmanGame | null {
    return this.current;
  }

  start(): HangmanGame {
    const index = Math.floor(this.random() * this.words.length);
    this.current = new HangmanGame(this.words[Math.min(index, this.words.length - 1)]);
    return this.current;
  }
}
