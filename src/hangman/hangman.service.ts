import { BadRequestException, Injectable } from '@nestjs/common';
import { HangmanSession } from './hangman-session';
import { HANGMAN_RULES } from './hangman.constants';

const HEADER = '🎮 **HANGMAN GAME** 🎮';
const NO_GAME = '❌ No game in progress! Please start a new game first.';

@Injectable()
export class HangmanService {
  startNewGame(session: HangmanSession): string {
    const game = session.start();
    return [
      '🎮 **NEW HANGMAN GAME STARTED!** 🎮',
      '',
      game.status(),
      '',
      `Hint: The word has ${game.word.length} letters and is related to programming/computers!`,
    ].join('\n');
  }

  makeGuess(session: HangmanSession, input: string): string {
    const game = session.game;
    if (!game) return NO_GAME;

    const letter = input.trim().toUpperCase();
    if (!/^[A-Z]$/.test(letter)) {
      throw new BadRequestException('Please guess a single letter only!');
    }

    switch (game.guess(letter)) {
      case 'over':
        return `Game is over! Start a new game.\n\n${game.status()}`;
      case 'repeat':
        return `${HEADER}\n\nYou already guessed '${letter}'!\n\n${game.status()}`;
      case 'correct':
        return `${HEADER}\n\n✅ Great! '${letter}' is in the word!\n\n${game.status()}`;
      case 'wrong':
        return `${HEADER}\n\n❌ Sorry, '${letter}' is not in the word.\n\n${game.status()}`;
    }
  }

  getStatus(session: HangmanSession): string {
    const game = session.game;
    if (!game) return NO_GAME;
    return `🎮 **HANGMAN GAME STATUS** 🎮\n\n${game.status()}`;
  }

  rules(): string {
    return HANGMAN_RULES;
  }
}
