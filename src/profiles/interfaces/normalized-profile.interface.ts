// Records returned to tool callers, independent of the upstream response shapes.

export interface NormalizedGithubProfile {
  readonly username: string;
  readonly name?: string;
  readonly bio?: string;
  readonly followers: number;
  readonly following: number;
  readonly publicRepos: number;
  readonly totalStars: number;
  readonly forkedRepos: number;
  readonly accountAgeDays: number;
  readonly daysSinceLastActivity: number;
  readonly topLanguages: readonly string[];
  readonly twitterUsername?: string;
  readonly instructions: string;
}

export interface NormalizedLeetcodeProfile {
  readonly username: string;
  readonly ranking: number;
  readonly reputation: number;
  readonly totalSolved: number;
  readonly easySolved: number;
  readonly mediumSolved: number;
  readonly hardSolved: number;
  /** Percentage rounded to 2 decimals, 0 when nothing was submitted */
  readonly acceptanceRate: number;
  readonly instructions: string;
}

/** A normalized record before the instruction text is attached. */
export type ProfileFacts<T extends { instructions: string }> = Omit<T, 'instructions'>;
