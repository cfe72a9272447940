import type {
  BackendKind,
  ChatMessage,
  GenerationOptions,
  GenerationRequest,
} from "../../types/common.js";
import { ErrorType } from "../../types/error-handler.js";
import { GenerationError } from "../../utils/error-handler.js";
import { ERROR_MESSAGES } from "../../constants/messages.js";

/**
 * A text-generation environment. Implementations must only throw the
 * normalized errors from `utils/error-handler` (unavailable, auth,
 * empty response, protocol).
 */
export interface GenerationBackend {
  readonly kind: BackendKind;
  complete(request: GenerationRequest): Promise<string>;
}

export const createGenerationRequest = (
  input: string | ChatMessage[],
  options: GenerationOptions = {}
): GenerationRequest => {
  const request: GenerationRequest =
    typeof input === "string"
      ? { prompt: input, options: Object.freeze({ ...options }) }
      : {
          messages: Object.freeze(input.map(message => Object.freeze({ ...message }))),
          options: Object.freeze({ ...options }),
        };

  const hasPrompt = request.prompt !== undefined && request.prompt.trim() !== "";
  const hasMessages = (request.messages ?? []).some(message => message.content.trim() !== "");
  if (!hasPrompt && !hasMessages) {
    throw new GenerationError(ERROR_MESSAGES.EMPTY_REQUEST, ErrorType.VALIDATION_ERROR, {
      operation: "createGenerationRequest",
    });
  }

  return Object.freeze(request);
};

/** Flatten a request to a single prompt string for completion-style backends. */
export const toPromptText = (request: GenerationRequest): string => {
  if (request.prompt !== undefined) {
    return request.prompt;
  }
  return (request.messages ?? [])
    .map(message => (message.role === "user" ? message.content : `${message.role}: ${message.content}`))
    .join("\n\n");
};

/** Normalize a request to chat messages for chat-completion backends. */
export const toChatMessages = (request: GenerationRequest): ChatMessage[] => {
  if (request.messages !== undefined) {
    return request.messages.map(message => ({ role: message.role, content: message.content }));
  }
  return [{ role: "user", content: request.prompt ?? "" }];
};
