import { GithubRepo, GithubUser } from '../schemas/github.schema';
import { LeetcodeMatchedUser } from '../schemas/leetcode.schema';

export interface GithubRawData {
  profile: GithubUser;
  /** Empty when the repository listing could not be fetched */
  repos: GithubRepo[];
}

export type LeetcodeRawData = LeetcodeMatchedUser;

/**
 * One external service's network protocol. `signal` aborts every
 * in-flight request the call has started.
 */
export interface ProfileSource<TRaw> {
  readonly source: string;
  fetchProfile(handle: string, signal?: AbortSignal): Promise<TRaw>;
}
