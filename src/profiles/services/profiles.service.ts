import { Injectable, Logger } from '@nestjs/common';
import {
  NormalizedGithubProfile,
  NormalizedLeetcodeProfile,
} from '../interfaces/normalized-profile.interface';
import { GithubProvider } from '../providers/github.provider';
import { LeetcodeProvider } from '../providers/leetcode.provider';
import { requireHandle, resolveGithubHandle } from '../utils/identifier.util';
import { InstructionSynthesizerService } from './instruction-synthesizer.service';
import { ProfileNormalizerService } from './profile-normalizer.service';

@Injectable()
export class ProfilesService {
  private readonly logger = new Logger(ProfilesService.name);

  constructor(
    private readonly github: GithubProvider,
    private readonly leetcode: LeetcodeProvider,
    private readonly normalizer: ProfileNormalizerService,
    private readonly synthesizer: InstructionSynthesizerService,
  ) {}

  // ===========================================================================
  // GITHUB
  // ===========================================================================
  async getGithubProfileData(identifierOrUrl: string, signal?: AbortSignal): Promise<NormalizedGithubProfile> {
    // 1. Resolve before touching the network
    const handle = resolveGithubHandle(identifierOrUrl);
    this.logger.debug(`Fetching GitHub profile for ${handle}`);

    // 2. Fetch (profile + repositories, concurrently)
    const raw = await this.github.fetchProfile(handle, signal);

    // 3. Normalize against the current instant, then attach instructions
    const facts = this.normalizer.normalizeGithub(raw, new Date());
    return { ...facts, instructions: this.synthesizer.forGithub(facts) };
  }

  // ===========================================================================
  // LEETCODE
  // ===========================================================================
  async getLeetcodeProfileData(username: string, signal?: AbortSignal): Promise<NormalizedLeetcodeProfile> {
    const handle = requireHandle(username, 'LeetCode');
    this.logger.debug(`Fetching LeetCode profile for ${handle}`);

    const raw = await this.leetcode.fetchProfile(handle, signal);

    const facts = this.normalizer.normalizeLeetcode(raw);
    return { ...facts, instructions: this.synthesizer.forLeetcode(facts) };
  }
}
