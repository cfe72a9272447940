import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { homedir } from "os";
import { dirname, join } from "path";
import { BackendKindSchema, CONFIG_KEYS, ConfigSchema, StoredConfigSchema, type ConfigKey } from "./schemas/validation.js";
import { ErrorType } from "./types/error-handler.js";
import { UI_CONSTANTS } from "./constants/ui.js";
import type { ConfigProvider, DiffscribeConfig } from "./types/common.js";
import { GenerationError } from "./utils/error-handler.js";

export const DEFAULT_CONFIG_PATH = join(homedir(), ".diffscribe", "config.json");

type Env = Record<string, string | undefined>;

/** A config value as printed by the CLI. The API key is never shown. */
export const displayConfigValue = (key: ConfigKey, value: string | undefined): string => {
  if (!value) {
    return "Not set";
  }
  return key === "apiKey" ? UI_CONSTANTS.MASKED_VALUE : value;
};

/** Remote API key: configuration first, then the environment. */
export const resolveApiKey = (config: DiffscribeConfig, env: Env = process.env): string | undefined =>
  config.apiKey ?? env.OPENROUTER_API_KEY ?? env.OPENAI_API_KEY;

/**
 * File-backed configuration. Every `getConfig()` re-reads the file so a
 * long-lived process picks up `dscribe config set` from another shell.
 */
export class ConfigManager implements ConfigProvider {
  private static instance: ConfigManager | null = null;

  constructor(
    private readonly configPath: string = DEFAULT_CONFIG_PATH,
    private readonly env: Env = process.env
  ) {}

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getConfig(): DiffscribeConfig {
    return this.applyEnvOverrides(this.readStoredConfig());
  }

  getApiKey(): string | undefined {
    return resolveApiKey(this.getConfig(), this.env);
  }

  get<K extends ConfigKey>(key: K): DiffscribeConfig[K] {
    return this.getConfig()[key];
  }

  set(key: ConfigKey, value: string): void {
    const stored = this.readRawConfig();
    const candidate = { ...stored, [key]: value };
    const result = ConfigSchema.safeParse(candidate);

    if (!result.success) {
      const reasons = result.error.issues.map(issue => issue.message).join(", ");
      throw new GenerationError(
        `Invalid value for ${key}: ${reasons}`,
        ErrorType.VALIDATION_ERROR,
        { operation: "configSet", key },
        true
      );
    }

    this.writeRawConfig(candidate);
  }

  saveConfig(values: Partial<Record<ConfigKey, string>>): void {
    for (const key of CONFIG_KEYS) {
      const value = values[key];
      if (value !== undefined && value !== "") {
        this.set(key, value);
      }
    }
  }

  reset(): void {
    this.writeRawConfig({});
  }

  private readStoredConfig(): DiffscribeConfig {
    const result = StoredConfigSchema.safeParse(this.readRawConfig());
    if (!result.success) {
      const reasons = result.error.issues
        .map(issue => `${issue.path.join(".") || "config"}: ${issue.message}`)
        .join("; ");
      throw new GenerationError(
        `Invalid configuration in ${this.configPath}: ${reasons}`,
        ErrorType.CONFIG_ERROR,
        { operation: "loadConfig" }
      );
    }
    return result.data;
  }

  private applyEnvOverrides(config: DiffscribeConfig): DiffscribeConfig {
    const backendOverride = this.env.DIFFSCRIBE_BACKEND;
    const parsedBackend = backendOverride ? BackendKindSchema.safeParse(backendOverride) : undefined;

    return {
      ...config,
      // An unrecognised override clears the selection; the router then takes its default path.
      backend: parsedBackend ? (parsedBackend.success ? parsedBackend.data : undefined) : config.backend,
      ollamaUrl: this.env.OLLAMA_URL ?? config.ollamaUrl,
      ollamaModel: this.env.OLLAMA_MODEL ?? config.ollamaModel,
      offlineModel: this.env.DIFFSCRIBE_OFFLINE_MODEL ?? config.offlineModel,
    };
  }

  private readRawConfig(): Record<string, unknown> {
    if (!existsSync(this.configPath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.configPath, "utf-8"));
    } catch (error) {
      throw new GenerationError(
        `Could not read configuration file ${this.configPath}`,
        ErrorType.CONFIG_ERROR,
        { operation: "loadConfig" },
        false,
        { cause: error }
      );
    }

    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new GenerationError(
        `Configuration file ${this.configPath} must contain a JSON object`,
        ErrorType.CONFIG_ERROR,
        { operation: "loadConfig" }
      );
    }
    return Object.fromEntries(Object.entries(parsed));
  }

  private writeRawConfig(values: Record<string, unknown>): void {
    mkdirSync(dirname(this.configPath), { recursive: true });
    writeFileSync(this.configPath, `${JSON.stringify(values, null, 2)}\n`, { mode: 0o600 });
  }
}
