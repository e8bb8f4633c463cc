export const MAX_WRONG_GUESSES = 6;

export const HANGMAN_WORDS: readonly string[] = [
  'PYTHON', 'JAVASCRIPT', 'COMPUTER', 'PROGRAMMING', 'ALGORITHM',
  'DATABASE', 'NETWORK', 'SOFTWARE', 'HARDWARE', 'INTERNET',
  'FUNCTION', 'VARIABLE', 'BOOLEAN', 'INTEGER', 'STRING',
  'FRAMEWORK', 'LIBRARY', 'DEBUGGING', 'COMPILER', 'SYNTAX',
];

const gallows = (head: string, body: string, legs: string) =>
  ['   +---+', '   |   |', `  ${head}   |`, `  ${body}  |`, `  ${legs}  |`, '       |', '========='].join('\n');

// Index = number of wrong guesses so far
export const HANGMAN_STAGES: readonly string[] = [
  gallows('  ', '   ', '   '),
  gallows(' O', '   ', '   '),
  gallows(' O', ' | ', '   '),
  gallows(' O', '/| ', '   '),
  gallows(' O', '/|\\', '   '),
  gallows(' O', '/|\\', '/  '),
  gallows(' O', '/|\\', '/ \\'),
];

export const HANGMAN_RULES = [
  '🎮 **HANGMAN GAME RULES** 🎮',
  '',
  '📝 **How to Play:**',
  '1. I pick a random word related to programming/computers',
  '2. You see blank spaces representing each letter: _ _ _ _ _',
  '3. Guess letters one at a time',
  '4. If your letter is in the word, it is revealed in every position',
  '5. If your letter is NOT in the word, part of the hangman gets drawn',
  `6. You have ${MAX_WRONG_GUESSES} wrong guesses before the hangman is complete`,
  '',
  '🎯 **How to Win:**',
  `- Guess all letters in the word before making ${MAX_WRONG_GUESSES} wrong guesses`,
  '',
  '💀 **How to Lose:**',
  `- Make ${MAX_WRONG_GUESSES} wrong guesses and the drawing is completed`,
  '',
  '🎲 **Commands:**',
  '- Use `start_new_game` to begin a new game',
  '- Use `user_tool_make_guess` with a letter to guess',
  '- Use `get_game_status` to see current progress',
  '',
  'Good luck! 🍀',
].join('\n');
