import { Module } from '@nestjs/common';
import { HangmanService } from './hangman.service';

@Module({
  providers: [HangmanService],
  exports: [HangmanService],
})
export class HangmanModule {}
