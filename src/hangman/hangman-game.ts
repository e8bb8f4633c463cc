import { HANGMAN_STAGES, MAX_WRONG_GUESSES } from './hangman.constants';

export type GuessOutcome = 'correct' | 'wrong' | 'repeat' | 'over';

/**
 * A single round. `letter` passed to `guess` must already be one
 * upper-case A-Z character.
 */
export class HangmanGame {
  private readonly guessed = new Set<string>();
  private wrong = 0;

  constructor(readonly word: string) {}

  get wrongGuesses(): number {
    return this.wrong;
  }

  get won(): boolean {
    return [...this.word].every((letter) => this.guessed.has(letter));
  }

  get lost(): boolean {
    return this.wrong >= MAX_WRONG_GUESSES;
  }

  get over(): boolean {
    return this.won || this.lost;
  }

  guess(letter: string): GuessOutcome {
    if (this.over) return 'over';
    if (this.guessed.has(letter)) return 'repeat';

    this.guessed.add(letter);
    if (this.word.includes(letter)) return 'correct';

    this.wrong += 1;
    return 'wrong';
  }

  displayWord(): string {
    return [...this.word].map((letter) => (this.guessed.has(letter) ? letter : '_')).join(' ');
  }

  status(): string {
    const guessed = [...this.guessed].sort();
    const lines = [
      '```',
      HANGMAN_STAGES[this.wrong],
      '```',
      `Word: ${this.displayWord()}`,
      `Letters guessed: ${guessed.length > 0 ? guessed.join(', ') : 'None'}`,
      `Wrong guesses: ${this.wrong}/${MAX_WRONG_GUESSES}`,
      `Remaining guesses: ${MAX_WRONG_GUESSES - this.wrong}`,
      '',
    ];

    if (this.won) {
      lines.push('🎉 **CONGRATULATIONS! YOU WON!** 🎉', `The word was: **${this.word}**`);
    } else if (this.lost) {
      lines.push('💀 **GAME OVER! YOU LOST!** 💀', `The word was: **${this.word}**`);
    } else {
      lines.push('Keep guessing! Enter a letter... 🎯');
    }

    return lines.join('\n');
  }
}
