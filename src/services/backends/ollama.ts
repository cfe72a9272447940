import type { GenerationRequest } from "../../types/common.js";
import {
  BackendUnavailableError,
  EmptyResponseError,
  ProtocolError,
  toError,
} from "../../utils/error-handler.js";
import { calculateDaemonTimeout } from "../../utils/timeout.js";
import { DEFAULT_OLLAMA_MODEL, DEFAULT_OLLAMA_URL } from "../../constants/ai.js";
import { toPromptText, type GenerationBackend } from "./types.js";

export interface OllamaBackendConfig {
  url: string;
  model: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

interface OllamaGenerateBody {
  model: string;
  prompt: string;
  stream: false;
  options?: {
    temperature?: number;
    num_predict?: number;
    top_p?: number;
  };
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Local daemon backend: one non-streaming call to Ollama's generate endpoint. */
export class OllamaBackend implements GenerationBackend {
  readonly kind = "local-daemon" as const;
  private readonly config: OllamaBackendConfig;

  constructor(config: Partial<OllamaBackendConfig> = {}) {
    this.config = {
      url: config.url ?? DEFAULT_OLLAMA_URL,
      model: config.model ?? DEFAULT_OLLAMA_MODEL,
      timeoutMs: config.timeoutMs,
      fetchImpl: config.fetchImpl,
    };
  }

  async complete(request: GenerationRequest): Promise<string> {
    const body = this.buildBody(request);
    const timeoutMs =
      this.config.timeoutMs ??
      calculateDaemonTimeout({ promptSize: body.prompt.length, maxTokens: request.options.maxTokens });
    const doFetch = this.config.fetchImpl ?? fetch;

    let response: Response;
    try {
      response = await doFetch(this.config.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw new BackendUnavailableError(
        this.kind,
        `Could not connect to Ollama at ${this.config.url}: ${toError(error).message}`,
        { cause: error }
      );
    }

    if (!response.ok) {
      throw new BackendUnavailableError(
        this.kind,
        `Ollama at ${this.config.url} responded with HTTP ${response.status}`
      );
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw new ProtocolError(this.kind, "Ollama returned a body that is not JSON", { cause: error });
    }

    if (!isRecord(data) || typeof data.response !== "string") {
      throw new ProtocolError(this.kind, "Ollama response has no 'response' field");
    }

    const text = data.response.trim();
    if (!text) {
      throw new EmptyResponseError(this.kind, `Ollama model ${this.config.model} returned an empty response`);
    }
    return text;
  }

  private buildBody(request: GenerationRequest): OllamaGenerateBody {
    const { temperature, maxTokens, topP } = request.options;
    const options = {
      ...(temperature !== undefined && { temperature }),
      ...(maxTokens !== undefined && { num_predict: maxTokens }),
      ...(topP !== undefined && { top_p: topP }),
    };

    return {
      model: this.config.model,
      prompt: toPromptText(request),
      stream: false,
      ...(Object.keys(options).length > 0 && { options }),
    };
  }
}
