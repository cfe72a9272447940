import type { BackendKind } from "../types/common.js";

export const DAEMON_RETRY_ATTEMPTS = 3;
export const DAEMON_RETRY_DELAY_MS = 1000;

export const DEFAULT_BACKEND: BackendKind = "local-model";
export const FALLBACK_BACKEND: BackendKind = "local-model";

export const DEFAULT_OLLAMA_URL = "http://localhost:11434/api/generate";
export const DEFAULT_OLLAMA_MODEL = "llama3";

export const DEFAULT_OFFLINE_MODEL = "Xenova/TinyLlama-1.1B-Chat-v1.0";
// Characters kept from the end of the prompt before local inference.
export const OFFLINE_CONTEXT_CHARS = 2048;
export const OFFLINE_MAX_NEW_TOKENS = 128;
export const OFFLINE_TEMPERATURE = 0.7;
export const OFFLINE_DOWNLOAD_SIZE_HINT = "~1.1GB";

export const DEFAULT_REMOTE_BASE_URL = "https://openrouter.ai/api/v1";
export const DEFAULT_REMOTE_MODEL = "anthropic/claude-3-haiku";
export const REMOTE_APP_HEADERS = {
  "HTTP-Referer": "https://www.npmjs.com/package/diffscribe",
  "X-Title": "diffscribe",
} as const;

export const DEFAULT_COMMIT_TYPE = "chore";
