import { Injectable } from '@nestjs/common';
import {
  NormalizedGithubProfile,
  NormalizedLeetcodeProfile,
  ProfileFacts,
} from '../interfaces/normalized-profile.interface';
import { GithubRawData, LeetcodeRawData } from '../interfaces/profile-source.interface';
import { GithubRepo } from '../schemas/github.schema';
import { DifficultyTier, SubmissionCount } from '../schemas/leetcode.schema';

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const TOP_LANGUAGE_LIMIT = 3;

@Injectable()
export class ProfileNormalizerService {
  /**
   * GitHub: account fields plus aggregates over the (possibly empty)
   * repository list. Day counts are measured against `now`.
   */
  normalizeGithub(raw: GithubRawData, now: Date): ProfileFacts<NormalizedGithubProfile> {
    const { profile, repos } = raw;

    return {
      username: profile.login,
      name: profile.name,
      bio: profile.bio,
      followers: profile.followers,
      following: profile.following,
      publicRepos: profile.public_repos,
      totalStars: repos.reduce((sum, repo) => sum + repo.stargazers_count, 0),
      forkedRepos: repos.filter((repo) => repo.fork).length,
      accountAgeDays: this.daysSince(profile.created_at, now),
      daysSinceLastActivity: this.daysSince(profile.updated_at, now),
      topLanguages: this.topLanguages(repos),
      twitterUsername: profile.twitter_username,
    };
  }

  /**
   * LeetCode: per-tier solved counts and the overall acceptance rate.
   * Tiers missing from the response count as 0.
   */
  normalizeLeetcode(raw: LeetcodeRawData): ProfileFacts<NormalizedLeetcodeProfile> {
    const solved = (tier: DifficultyTier) => this.findTier(raw.submitStats.acSubmissionNum, tier)?.count ?? 0;

    const totalSolved = solved('All');
    const totalSubmissions = this.findTier(raw.submitStats.totalSubmissionNum, 'All')?.submissions ?? 0;

    return {
      username: raw.username,
      ranking: raw.profile.ranking,
      reputation: raw.profile.reputation,
      totalSolved,
      easySolved: solved('Easy'),
      mediumSolved: solved('Medium'),
      hardSolved: solved('Hard'),
      acceptanceRate: this.acceptanceRate(totalSolved, totalSubmissions),
    };
  }

  private findTier(list: SubmissionCount[], tier: DifficultyTier): SubmissionCount | undefined {
    return list.find((entry) => entry.difficulty === tier);
  }

  private acceptanceRate(solved: number, submissions: number): number {
    if (submissions === 0) return 0;
    const rate = Math.round((solved / submissions) * 100 * 100) / 100;
    return Math.min(rate, 100);
  }

  // Whole days, truncated. Unknown or future timestamps give 0.
  private daysSince(timestamp: string, now: Date): number {
    const then = Date.parse(timestamp);
    if (Number.isNaN(then)) return 0;
    return Math.max(0, Math.floor((now.getTime() - then) / MS_PER_DAY));
  }

  /**
   * Most frequent primary languages. Map iteration follows insertion
   * order and Array#sort is stable, so ties keep first-seen order.
   */
  private topLanguages(repos: GithubRepo[]): string[] {
    const counts = new Map<string, number>();
    for (const { language } of repos) {
      if (!language || language === 'null') continue;
      counts.set(language, (counts.get(language) ?? 0) + 1);
    }

    return [...counts.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, TOP_LANGUAGE_LIMIT)
      .map(([language]) => language);
  }
}
