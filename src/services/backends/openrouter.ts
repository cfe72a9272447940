import OpenAI, { APIConnectionError, APIError, AuthenticationError } from "openai";
import type { ChatMessage, GenerationRequest } from "../../types/common.js";
import {
  AuthFailedError,
  BackendUnavailableError,
  EmptyResponseError,
  ProtocolError,
  toError,
} from "../../utils/error-handler.js";
import { calculateRemoteTimeout } from "../../utils/timeout.js";
import {
  DEFAULT_REMOTE_BASE_URL,
  DEFAULT_REMOTE_MODEL,
  REMOTE_APP_HEADERS,
} from "../../constants/ai.js";
import { ERROR_MESSAGES } from "../../constants/messages.js";
import { toChatMessages, type GenerationBackend } from "./types.js";

interface ChatCompletionBody {
  model: string;
  messages: ChatMessage[];
  stream: false;
  temperature?: number;
  max_tokens?: number;
  top_p?: number;
}

interface ChatCompletionResult {
  choices: Array<{ message?: { content?: string | null } | null }>;
}

/** The slice of the OpenAI client this backend calls. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionBody): PromiseLike<ChatCompletionResult>;
    };
  };
}

export interface RemoteBackendConfig {
  apiKey?: string;
  model: string;
  baseUrl: string;
  createClient?: (options: { apiKey: string; baseURL: string; timeout: number }) => ChatCompletionsClient;
}

const defaultClientFactory = (options: {
  apiKey: string;
  baseURL: string;
  timeout: number;
}): ChatCompletionsClient =>
  new OpenAI({
    ...options,
    maxRetries: 0,
    defaultHeaders: { ...REMOTE_APP_HEADERS },
  });

/** Remote OpenAI-compatible chat-completions backend (OpenRouter by default). */
export class OpenRouterBackend implements GenerationBackend {
  readonly kind = "remote-api" as const;
  private readonly config: RemoteBackendConfig;

  constructor(config: Partial<RemoteBackendConfig> = {}) {
    this.config = {
      apiKey: config.apiKey,
      model: config.model ?? DEFAULT_REMOTE_MODEL,
      baseUrl: config.baseUrl ?? DEFAULT_REMOTE_BASE_URL,
      createClient: config.createClient,
    };
  }

  async complete(request: GenerationRequest): Promise<string> {
    const apiKey = this.config.apiKey?.trim();
    if (!apiKey) {
      throw new AuthFailedError(this.kind, ERROR_MESSAGES.API_KEY_NOT_FOUND);
    }

    const messages = toChatMessages(request);
    const promptSize = messages.reduce((sum, message) => sum + message.content.length, 0);
    const createClient = this.config.createClient ?? defaultClientFactory;
    const client = createClient({
      apiKey,
      baseURL: this.config.baseUrl,
      timeout: calculateRemoteTimeout({ promptSize, maxTokens: request.options.maxTokens }),
    });

    const { temperature, maxTokens, topP } = request.options;
    let result: ChatCompletionResult;
    try {
      result = await client.chat.completions.create({
        model: this.config.model,
        messages,
        stream: false,
        ...(temperature !== undefined && { temperature }),
        ...(maxTokens !== undefined && { max_tokens: maxTokens }),
        ...(topP !== undefined && { top_p: topP }),
      });
    } catch (error) {
      throw this.normalizeError(error);
    }

    const content = result.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new EmptyResponseError(this.kind, `Remote model ${this.config.model} returned no content`);
    }
    return content;
  }

  private normalizeError(error: unknown): Error {
    // APIConnectionError also covers timeouts
    if (error instanceof AuthenticationError) {
      return new AuthFailedError(this.kind, ERROR_MESSAGES.API_KEY_REJECTED, { cause: error, status: 401 });
    }
    if (error instanceof APIConnectionError) {
      return new BackendUnavailableError(
        this.kind,
        `Could not reach ${this.config.baseUrl}: ${error.message}`,
        { cause: error, retryable: false }
      );
    }
    if (error instanceof APIError) {
      if (error.status === 401) {
        return new AuthFailedError(this.kind, ERROR_MESSAGES.API_KEY_REJECTED, { cause: error, status: 401 });
      }
      return new ProtocolError(
        this.kind,
        `Remote API request failed with HTTP ${error.status ?? "unknown"}: ${error.message}`,
        { cause: error, status: error.status }
      );
    }
    return new ProtocolError(this.kind, `Remote API request failed: ${toError(error).message}`, {
      cause: error,
    });
  }
}
