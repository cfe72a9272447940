// User-facing rendering of errors: a title, the cause and what to try next.

import { lightColors } from "./colors.js";
import { AllBackendsExhaustedError, GenerationError } from "./error-handler.js";
import { ErrorType } from "../types/error-handler.js";

export interface UserFriendlyError {
  title: string;
  message: string;
  suggestions: string[];
  technicalDetails?: string;
}

type Remedy = Pick<UserFriendlyError, "title" | "suggestions">;

const REMEDIES: Record<ErrorType, Remedy> = {
  [ErrorType.BACKEND_UNAVAILABLE]: {
    title: "Backend Unavailable",
    suggestions: [
      'Start the local daemon with "ollama serve" and pull the model ("ollama pull <model>")',
      'Run "dscribe model download" to fetch the in-process model',
      'Switch backends with "dscribe config set backend <local-daemon|local-model|remote-api>"',
    ],
  },
  [ErrorType.AUTH_FAILED]: {
    title: "API Key Problem",
    suggestions: [
      'Run "dscribe config set apiKey <key>" or export OPENROUTER_API_KEY',
      'Check the key with "dscribe config get apiKey"',
    ],
  },
  [ErrorType.EMPTY_RESPONSE]: {
    title: "Empty Model Response",
    suggestions: ["Try again", 'Pick a larger model with "dscribe config set <ollamaModel|remoteModel> <name>"'],
  },
  [ErrorType.PROTOCOL_ERROR]: {
    title: "Unexpected Backend Response",
    suggestions: [
      "Check that the configured URL points at the right service",
      "Run with DEBUG=1 for the raw error",
    ],
  },
  [ErrorType.ALL_BACKENDS_EXHAUSTED]: {
    title: "All Backends Failed",
    suggestions: ["Run with DEBUG=1 to see every attempt"],
  },
  [ErrorType.LLM_CALL_FAILED]: {
    title: "Generation Failed",
    suggestions: ["Try again", "Run with DEBUG=1 for the underlying cause"],
  },
  [ErrorType.NO_JSON_FOUND]: {
    title: "No Structured Output",
    suggestions: ["Try again; smaller models sometimes ignore the JSON format", "Use a larger model"],
  },
  [ErrorType.INVALID_JSON]: {
    title: "Malformed Structured Output",
    suggestions: ["Try again", "Use a larger model"],
  },
  [ErrorType.SCHEMA_VALIDATION_FAILED]: {
    title: "Structured Output Rejected",
    suggestions: ["Try again", 'Add --guidance to steer the model, e.g. --guidance "one commit per group"'],
  },
  [ErrorType.CONFIG_ERROR]: {
    title: "Configuration Error",
    suggestions: [
      'Run "dscribe config get" to check current settings',
      'Run "dscribe config reset" to restore defaults',
      'Run "dscribe setup" to reconfigure from scratch',
    ],
  },
  [ErrorType.GIT_ERROR]: {
    title: "Git Error",
    suggestions: ['Check "git status"', "Make sure no other git process holds the index lock"],
  },
  [ErrorType.VALIDATION_ERROR]: {
    title: "Invalid Input",
    suggestions: ['Use "dscribe help-examples" to see correct usage'],
  },
};

const FALLBACK_REMEDY: Remedy = {
  title: "Unexpected Error",
  suggestions: ["Try running the command again", "Run with DEBUG=1 for more detailed error information"],
};

// A router failure is remedied by whatever broke last.
const remedyFor = (error: unknown): Remedy => {
  if (error instanceof AllBackendsExhaustedError) {
    const cause = error.lastCauseType;
    const base = REMEDIES[ErrorType.ALL_BACKENDS_EXHAUSTED];
    return cause === undefined
      ? base
      : { title: base.title, suggestions: [...REMEDIES[cause].suggestions, ...base.suggestions] };
  }
  if (error instanceof GenerationError) {
    return REMEDIES[error.type];
  }
  return FALLBACK_REMEDY;
};

const technicalDetails = (error: unknown): string | undefined => {
  if (error instanceof AllBackendsExhaustedError) {
    return error.attempts
      .map(a => `${a.backend} attempt ${a.attempt}: ${a.error.name}: ${a.error.message}`)
      .join("\n");
  }
  return error instanceof Error ? error.stack : undefined;
};

export const createUserFriendlyError = (error: unknown): UserFriendlyError => {
  const remedy = remedyFor(error);
  return {
    ...remedy,
    message: error instanceof Error ? error.message : String(error),
    technicalDetails: technicalDetails(error),
  };
};

export const displayUserFriendlyError = (error: unknown): void => {
  const friendly = createUserFriendlyError(error);

  console.error("\n" + lightColors.red("❌ " + friendly.title));
  console.error(lightColors.gray(friendly.message));

  if (friendly.suggestions.length > 0) {
    console.error("\n" + lightColors.yellow("💡 Suggestions:"));
    friendly.suggestions.forEach((suggestion, index) => {
      console.error(`  ${index + 1}. ${suggestion}`);
    });
  }

  if (friendly.technicalDetails && process.env.DEBUG) {
    console.error("\n" + lightColors.dim("🔍 Technical Details:"));
    console.error(lightColors.dim(friendly.technicalDetails));
  }
};

export const debugLog = (message: string): void => {
  if (process.env.DEBUG) {
    console.error(lightColors.dim(`[debug] ${message}`));
  }
};
