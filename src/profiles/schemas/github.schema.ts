import { z } from 'zod';

/**
 * Shapes returned by the GitHub REST API (`/users/{handle}` and
 * `/users/{handle}/repos`). Only `login` is required; every other field
 * falls back to a default when absent or of the wrong type.
 */

const count = z.number().int().nonnegative().catch(0);
const optionalText = z
  .string()
  .nullish()
  .catch(undefined)
  .transform((value) => value ?? undefined);

export const GithubUserSchema = z.object({
  login: z.string().min(1),
  name: optionalText,
  bio: optionalText,
  twitter_username: optionalText,
  followers: count,
  following: count,
  public_repos: count,
  created_at: z.string().catch(''),
  updated_at: z.string().catch(''),
});

export const GithubRepoSchema = z.object({
  stargazers_count: count,
  fork: z.boolean().catch(false),
  language: z.string().nullish().catch(null),
});

export type GithubUser = z.infer<typeof GithubUserSchema>;
export type GithubRepo = z.infer<typeof GithubRepoSchema>;

/**
 * Decodes a repository listing item by item. Anything that is not an
 * object is dropped rather than failing the whole list.
 */
export function parseGithubRepos(payload: unknown): GithubRepo[] {
  if (!Array.isArray(payload)) return [];

  const repos: GithubRepo[] = [];
  for (const item of payload) {
    const parsed = GithubRepoSchema.safeParse(item);
    if (parsed.success) repos.push(parsed.data);
  }
  return repos;
}
