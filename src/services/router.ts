import type {
  BackendIdentity,
  BackendKind,
  ConfigProvider,
  DiffscribeConfig,
  GenerationRequest,
} from "../types/common.js";
import {
  AllBackendsExhaustedError,
  GenerationError,
  toError,
  withRetry,
  type BackendFailure,
} from "../utils/error-handler.js";
import { ErrorType } from "../types/error-handler.js";
import { lightColors } from "../utils/colors.js";
import {
  DAEMON_RETRY_ATTEMPTS,
  DAEMON_RETRY_DELAY_MS,
  DEFAULT_BACKEND,
  FALLBACK_BACKEND,
} from "../constants/ai.js";
import type { GenerationBackend } from "./backends/types.js";
import { OllamaBackend } from "./backends/ollama.js";
import { OfflineBackend, type DownloadConsent } from "./backends/offline.js";
import { OpenRouterBackend } from "./backends/openrouter.js";
import { resolveApiKey } from "../config.js";

export type BackendFactory = (identity: BackendIdentity, config: DiffscribeConfig) => GenerationBackend;

export interface RouterOptions {
  createBackend?: BackendFactory;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  confirmDownload?: DownloadConsent;
  env?: Record<string, string | undefined>;
}

/** Map configuration to the backend to use for this call. Unknown or unset means local model. */
export const resolveBackendIdentity = (
  config: DiffscribeConfig,
  kind: BackendKind | undefined = config.backend
): BackendIdentity => {
  switch (kind) {
    case "local-daemon":
      return { kind, model: config.ollamaModel, endpoint: config.ollamaUrl };
    case "remote-api":
      return { kind, model: config.remoteModel, endpoint: config.remoteBaseUrl };
    case "local-model":
      return { kind, model: config.offlineModel };
    default:
      return resolveBackendIdentity(config, DEFAULT_BACKEND);
  }
};

export const createDefaultBackendFactory =
  (options: Pick<RouterOptions, "confirmDownload" | "env"> = {}): BackendFactory =>
  (identity, config) => {
    switch (identity.kind) {
      case "local-daemon":
        return new OllamaBackend({ url: identity.endpoint, model: identity.model });
      case "local-model":
        return new OfflineBackend({ model: identity.model, confirmDownload: options.confirmDownload });
      case "remote-api":
        return new OpenRouterBackend({
          apiKey: resolveApiKey(config, options.env),
          model: identity.model,
          baseUrl: identity.endpoint,
        });
    }
  };

/**
 * Routes a request to the configured backend. The daemon is retried on
 * connectivity failures and then falls back to the local model; the local
 * model and the remote API get a single attempt.
 */
export class BackendRouter {
  private readonly createBackend: BackendFactory;
  private readonly retryDelayMs: number;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(
    private readonly configProvider: ConfigProvider,
    options: RouterOptions = {}
  ) {
    this.createBackend = options.createBackend ?? createDefaultBackendFactory(options);
    this.retryDelayMs = options.retryDelayMs ?? DAEMON_RETRY_DELAY_MS;
    this.sleep = options.sleep;
  }

  async route(request: GenerationRequest): Promise<string> {
    // Read on every call: config may change between commands.
    const config = this.configProvider.getConfig();
    const primary = resolveBackendIdentity(config);

    if (primary.kind === "local-daemon") {
      return this.routeWithFallback(primary, config, request);
    }
    return this.routeSingle(primary, config, request);
  }

  private async routeSingle(
    identity: BackendIdentity,
    config: DiffscribeConfig,
    request: GenerationRequest
  ): Promise<string> {
    try {
      return await this.createBackend(identity, config).complete(request);
    } catch (error) {
      throw new AllBackendsExhaustedError([{ backend: identity.kind, attempt: 1, error: toError(error) }]);
    }
  }

  private async routeWithFallback(
    primary: BackendIdentity,
    config: DiffscribeConfig,
    request: GenerationRequest
  ): Promise<string> {
    const failures: BackendFailure[] = [];
    const daemon = this.createBackend(primary, config);

    try {
      return await withRetry(
        () => daemon.complete(request),
        DAEMON_RETRY_ATTEMPTS,
        this.retryDelayMs,
        { operation: "route", backend: primary.kind },
        {
          sleep: this.sleep,
          shouldRetry: isRetryableDaemonFailure,
          onRetry: (attempt, maxAttempts, error) => {
            failures.push({ backend: primary.kind, attempt, error });
            console.warn(
              lightColors.yellow(
                `⚠️  ${primary.kind} failed (attempt ${attempt}/${maxAttempts}): ${error.message}`
              )
            );
          },
        }
      );
    } catch (error) {
      // onRetry records Error failures; anything else thrown is recorded here
      if (!failures.some(failure => failure.error === error)) {
        failures.push({ backend: primary.kind, attempt: failures.length + 1, error: toError(error) });
      }
    }

    const fallback = resolveBackendIdentity(config, FALLBACK_BACKEND);
    console.warn(lightColors.yellow(`⚠️  Falling back to ${fallback.kind} (${fallback.model})...`));

    try {
      return await this.createBackend(fallback, config).complete(request);
    } catch (error) {
      failures.push({ backend: fallback.kind, attempt: 1, error: toError(error) });
      throw new AllBackendsExhaustedError(failures);
    }
  }
}

const isRetryableDaemonFailure = (error: Error): boolean =>
  error instanceof GenerationError && error.type === ErrorType.BACKEND_UNAVAILABLE && error.recoverable;
