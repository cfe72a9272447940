export const ERROR_MESSAGES = {
  NOT_A_REPO: "Not a git repository. Please run this command from within a git repository.",
  API_KEY_NOT_FOUND:
    "No API key found for the remote backend. Run 'dscribe config set apiKey <key>' or set OPENROUTER_API_KEY.",
  API_KEY_REJECTED: "The remote API rejected the API key (401). Check your key with 'dscribe config get apiKey'.",
  MODEL_DOWNLOAD_DECLINED: "Local model download declined. AI features need the model, another backend, or a running daemon.",
  NO_SUGGESTION: "The model returned no commit message for the staged changes",
  EMPTY_REQUEST: "Generation request needs a non-empty prompt or at least one message",
} as const;

export const WARNING_MESSAGES = {
  NO_STAGED_FILES: "No staged changes found. Stage files with 'git add' first.",
  NOTHING_TO_GROUP: "None of the staged files produced a usable summary.",
  COMMIT_CANCELLED: "Commit cancelled",
} as const;

export const SUCCESS_MESSAGES = {
  MODEL_READY: "Local model is downloaded and ready",
  CONFIG_RESET: "Configuration reset to defaults",
  SETUP_DONE: "Setup completed successfully!",
} as const;

export const INFO_MESSAGES = {
  DRY_RUN: "Dry run: no commits were created.",
} as const;
