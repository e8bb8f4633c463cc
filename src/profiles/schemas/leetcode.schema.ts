import { z } from 'zod';

export const DIFFICULTY_TIERS = ['All', 'Easy', 'Medium', 'Hard'] as const;
export type DifficultyTier = (typeof DIFFICULTY_TIERS)[number];

const count = z.number().int().nonnegative().catch(0);

const SubmissionCountSchema = z.object({
  difficulty: z.string(),
  count,
  submissions: count,
});

const submissionList = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items.flatMap((item) => {
      const parsed = SubmissionCountSchema.safeParse(item);
      return parsed.success ? [parsed.data] : [];
    }),
  );

// `matchedUser` from the `userProfile` query
export const LeetcodeMatchedUserSchema = z.object({
  username: z.string().min(1),
  profile: z
    .object({ ranking: count, reputation: count })
    .catch({ ranking: 0, reputation: 0 }),
  submitStats: z
    .object({
      acSubmissionNum: submissionList,
      totalSubmissionNum: submissionList,
    })
    .catch({ acSubmissionNum: [], totalSubmissionNum: [] }),
});

export type SubmissionCount = z.infer<typeof SubmissionCountSchema>;
export type LeetcodeMatchedUser = z.infer<typeof LeetcodeMatchedUserSchema>;
