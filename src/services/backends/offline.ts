import { existsSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import type { GenerationRequest } from "../../types/common.js";
import {
  BackendUnavailableError,
  EmptyResponseError,
  toError,
} from "../../utils/error-handler.js";
import { lazyModules } from "../../utils/lazy-loader.js";
import { lightColors } from "../../utils/colors.js";
import {
  DEFAULT_OFFLINE_MODEL,
  OFFLINE_CONTEXT_CHARS,
  OFFLINE_DOWNLOAD_SIZE_HINT,
  OFFLINE_MAX_NEW_TOKENS,
  OFFLINE_TEMPERATURE,
} from "../../constants/ai.js";
import { ERROR_MESSAGES } from "../../constants/messages.js";
import { toPromptText, type GenerationBackend } from "./types.js";

export interface LocalGenerationOptions {
  maxNewTokens: number;
  temperature: number;
  topP?: number;
}

export type TextGenerator = (prompt: string, options: LocalGenerationOptions) => Promise<string>;

export interface LocalModelLoader {
  isModelCached(modelName: string, cacheDir: string): boolean;
  load(modelName: string, cacheDir: string): Promise<TextGenerator>;
}

/** Asked once before a model download; resolving `false` aborts the call. */
export type DownloadConsent = (modelName: string, sizeHint: string) => Promise<boolean>;

export const DEFAULT_MODEL_CACHE_DIR =
  process.env.DIFFSCRIBE_MODEL_CACHE ?? join(homedir(), ".cache", "diffscribe", "models");

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Pull the text out of a text-generation pipeline result. */
export const readGeneratedText = (output: unknown): string => {
  const first = Array.isArray(output) ? output[0] : output;
  const entry = Array.isArray(first) ? first[0] : first;
  if (!isRecord(entry)) {
    return "";
  }

  const generated = entry.generated_text;
  if (typeof generated === "string") {
    return generated;
  }
  if (Array.isArray(generated)) {
    const last: unknown = generated[generated.length - 1];
    return isRecord(last) && typeof last.content === "string" ? last.content : "";
  }
  return "";
};

export const transformersLoader: LocalModelLoader = {
  isModelCached: (modelName, cacheDir) => existsSync(join(cacheDir, modelName)),

  async load(modelName, cacheDir) {
    const { pipeline } = await lazyModules.transformers();
    const generator = await pipeline("text-generation", modelName, { cache_dir: cacheDir });

    return async (prompt, options) => {
      const output = await generator(prompt, {
        max_new_tokens: options.maxNewTokens,
        temperature: options.temperature,
        do_sample: true,
        ...(options.topP !== undefined && { top_p: options.topP }),
      });
      return readGeneratedText(output);
    };
  },
};

/** Keep the most recent `maxChars` characters of the prompt. */
export const truncatePrompt = (prompt: string, maxChars: number = OFFLINE_CONTEXT_CHARS): string =>
  prompt.length > maxChars ? prompt.slice(-maxChars) : prompt;

export const stripEchoedPrompt = (output: string, prompt: string): string =>
  output.startsWith(prompt) ? output.slice(prompt.length) : output;

interface LoadedModel {
  modelName: string;
  generator: Promise<TextGenerator>;
}

/**
 * Process-wide handle to the in-process model. The first `acquire` starts the
 * load and stores its promise, so concurrent callers wait on the same load.
 * A failed load is forgotten and the next call starts over. The handle is
 * never torn down.
 */
export class LocalModelHandle {
  private loaded: LoadedModel | null = null;

  acquire(
    modelName: string,
    loader: LocalModelLoader,
    cacheDir: string,
    confirmDownload?: DownloadConsent
  ): Promise<TextGenerator> {
    let entry = this.loaded;
    if (!entry || entry.modelName !== modelName) {
      const current: LoadedModel = {
        modelName,
        generator: this.materialize(modelName, loader, cacheDir, confirmDownload),
      };
      this.loaded = current;
      void current.generator.catch(() => {
        if (this.loaded === current) {
          this.loaded = null;
        }
      });
      entry = current;
    }
    return entry.generator;
  }

  get isLoaded(): boolean {
    return this.loaded !== null;
  }

  reset(): void {
    this.loaded = null;
  }

  private async materialize(
    modelName: string,
    loader: LocalModelLoader,
    cacheDir: string,
    confirmDownload?: DownloadConsent
  ): Promise<TextGenerator> {
    if (!loader.isModelCached(modelName, cacheDir)) {
      console.warn(
        lightColors.yellow(
          `The local model (${modelName}) is not present (${OFFLINE_DOWNLOAD_SIZE_HINT} download required).`
        )
      );
      const accepted = confirmDownload ? await confirmDownload(modelName, OFFLINE_DOWNLOAD_SIZE_HINT) : false;
      if (!accepted) {
        throw new BackendUnavailableError("local-model", ERROR_MESSAGES.MODEL_DOWNLOAD_DECLINED, {
          retryable: false,
        });
      }
    }

    try {
      return await loader.load(modelName, cacheDir);
    } catch (error) {
      throw new BackendUnavailableError(
        "local-model",
        `Failed to load local model ${modelName}: ${toError(error).message}`,
        { cause: error, retryable: false }
      );
    }
  }
}

export const localModelHandle = new LocalModelHandle();

export const resetLocalModelForTests = (): void => {
  localModelHandle.reset();
};

export interface OfflineBackendConfig {
  model: string;
  cacheDir: string;
  loader: LocalModelLoader;
  handle: LocalModelHandle;
  confirmDownload?: DownloadConsent;
}

/** In-process backend. No timeout is enforced on inference. */
export class OfflineBackend implements GenerationBackend {
  readonly kind = "local-model" as const;
  private readonly config: OfflineBackendConfig;

  constructor(config: Partial<OfflineBackendConfig> = {}) {
    this.config = {
      model: config.model ?? DEFAULT_OFFLINE_MODEL,
      cacheDir: config.cacheDir ?? DEFAULT_MODEL_CACHE_DIR,
      loader: config.loader ?? transformersLoader,
      handle: config.handle ?? localModelHandle,
      confirmDownload: config.confirmDownload,
    };
  }

  /** Download (with consent) and load the model without generating anything. */
  async ensureReady(): Promise<void> {
    await this.acquire();
  }

  async complete(request: GenerationRequest): Promise<string> {
    const generate = await this.acquire();
    const prompt = truncatePrompt(toPromptText(request));

    let output: string;
    try {
      output = await generate(prompt, {
        maxNewTokens: request.options.maxTokens ?? OFFLINE_MAX_NEW_TOKENS,
        temperature: request.options.temperature ?? OFFLINE_TEMPERATURE,
        topP: request.options.topP,
      });
    } catch (error) {
      throw new BackendUnavailableError(
        this.kind,
        `Local inference failed: ${toError(error).message}`,
        { cause: error, retryable: false }
      );
    }

    const text = stripEchoedPrompt(output, prompt).trim();
    if (!text) {
      throw new EmptyResponseError(this.kind, `Local model ${this.config.model} produced no text`);
    }
    return text;
  }

  private acquire(): Promise<TextGenerator> {
    const { model, loader, cacheDir, confirmDownload, handle } = this.config;
    return handle.acquire(model, loader, cacheDir, confirmDownload);
  }
}
