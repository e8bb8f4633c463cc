import { HttpModule } from '@nestjs/axios';
import { Module } from '@nestjs/common';
import { GithubProvider } from './providers/github.provider';
import { LeetcodeProvider } from './providers/leetcode.provider';
import { InstructionSynthesizerService } from './services/instruction-synthesizer.service';
import { ProfileNormalizerService } from './services/profile-normalizer.service';
import { ProfilesService } from './services/profiles.service';

@Module({
  imports: [HttpModule],
  providers: [
    ProfilesService,
    GithubProvider,
    LeetcodeProvider,
    ProfileNormalizerService,
    InstructionSynthesizerService,
  ],
  exports: [ProfilesService],
})
export class ProfilesModule {}
