/**
 * Tool descriptions are sent as JSON so the calling agent can read when
 * to use a tool and what it changes.
 */
export interface RichToolDescription {
  description: string;
  use_when: string;
  side_effects?: string;
}

const richDescription = (tool: RichToolDescription): string => JSON.stringify(tool);

export const TOOL_DESCRIPTIONS = {
  validate: richDescription({
    description: 'Return the identity number configured for this server',
    use_when: 'Called by the hosting platform to verify the server owner',
  }),
  githubProfile: richDescription({
    description:
      'Fetch a public GitHub profile and its repositories, returning follower, star, fork and language stats plus roast instructions',
    use_when: 'Use this when the user shares a GitHub username or profile URL and wants it analysed or roasted',
    side_effects: 'None - read-only calls to the GitHub API',
  }),
  leetcodeProfile: richDescription({
    description:
      'Fetch a public LeetCode profile, returning ranking, solved counts per difficulty and acceptance rate plus critique instructions',
    use_when: 'Use this when the user shares a LeetCode username and wants their progress reviewed',
    side_effects: 'None - a single read-only call to the LeetCode GraphQL API',
  }),
  startNewGame: richDescription({
    description: 'Start a new hangman game with a random word',
    use_when: 'Use this when the user wants to start a new hangman game or restart the current one',
    side_effects: 'Resets the current game state and selects a new random word',
  }),
  makeGuess: richDescription({
    description: 'Make a letter guess in the current hangman game',
    use_when: 'Use this when the user wants to guess a letter in the hangman game',
    side_effects: 'Updates the game state, reveals letters if correct, or adds to wrong guesses if incorrect',
  }),
  gameStatus: richDescription({
    description: 'Get the current status of the hangman game',
    use_when: 'Use this when the user wants to see the current game state without making a guess',
    side_effects: 'None - just displays current game information',
  }),
  gameRules: richDescription({
    description: 'Explain the rules of hangman game',
    use_when: 'Use this when the user wants to understand how to play hangman',
    side_effects: 'None - just provides information',
  }),
} as const;
