export const UI_CONSTANTS = {
  EXIT_DELAY_MS: 100,
  MASKED_VALUE: "********",
  SPINNER_MESSAGES: {
    SUMMARIZING: "Summarizing staged files...",
    GENERATING: "Generating pull request and commit messages...",
    COMMITTING: "Creating commit...",
    WRITING_MESSAGE: "Writing commit message...",
    LOADING_MODEL: "Loading local model...",
  },
} as const;

export const COMMIT_MESSAGE_PATTERNS = {
  // a single token before the first colon, scope and bang included
  TYPE_PREFIX: /^\S+$/,
  FENCED_JSON: /```(?:json)?\s*(\{[\s\S]*?\})\s*```/,
} as const;
