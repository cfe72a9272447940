#!/usr/bin/env node

import { Command } from "commander";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import process from "process";
import { lightColors } from "./utils/colors.js";
import { lazyModules } from "./utils/lazy-loader.js";
import { exitProcess, handleErrorImmediate } from "./utils/process-utils.js";
import { BACKEND_KINDS, type BackendKind } from "./types/common.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const readVersion = (): string => {
  const parsed: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
  if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
    return parsed.version;
  }
  return "0.0.0";
};

const run =
  <A extends unknown[]>(action: (...args: A) => Promise<void>) =>
  async (...args: A): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      handleErrorImmediate(error);
    }
  };

const program = new Command();

program
  .name("dscribe")
  .description("🚀 AI-written commits and pull request text for your staged changes")
  .version(readVersion());

program
  .command("commit")
  .alias("c")
  .description("Group staged files by change and commit each group")
  .option("-d, --dry-run", "Show the groups and messages without committing")
  .option("-g, --guidance <text>", "Extra instructions for the model")
  .option("-y, --yes", "Commit without asking for confirmation")
  .option("-s, --single", "Commit everything staged as one commit with one message")
  .action(
    run(async (options: { dryRun?: boolean; guidance?: string; yes?: boolean; single?: boolean }): Promise<void> => {
      const { Diffscribe } = await lazyModules.diffscribe();
      await new Diffscribe().commit(options);
      exitProcess(0);
    })
  );

program
  .command("generate")
  .alias("g")
  .description("Generate a pull request title, body and per-group commit messages")
  .option("-g, --guidance <text>", "Extra instructions for the model")
  .action(
    run(async (options: { guidance?: string }): Promise<void> => {
      const { Diffscribe } = await lazyModules.diffscribe();
      await new Diffscribe().generate(options);
      exitProcess(0);
    })
  );

const configCmd = program.command("config").description("Manage diffscribe configuration");

configCmd
  .command("set <key> <value>")
  .description("Set configuration value")
  .action(
    run(async (key: string, value: string): Promise<void> => {
      const { ConfigManager, displayConfigValue } = await import("./config.js");
      const { CONFIG_KEYS, isConfigKey } = await import("./schemas/validation.js");
      const { GenerationError } = await import("./utils/error-handler.js");
      const { ErrorType } = await import("./types/error-handler.js");

      if (!isConfigKey(key)) {
        throw new GenerationError(
          `Invalid configuration key: ${key}. Allowed keys: ${CONFIG_KEYS.join(", ")}`,
          ErrorType.VALIDATION_ERROR,
          { operation: "configSet", key }
        );
      }

      ConfigManager.getInstance().set(key, value);
      console.log(lightColors.green(`✅ Set ${key} = ${displayConfigValue(key, value)}`));
    })
  );

configCmd
  .command("get [key]")
  .description("Get configuration value(s)")
  .action(
    run(async (key?: string): Promise<void> => {
      const { ConfigManager, displayConfigValue: display } = await import("./config.js");
      const { CONFIG_KEYS, isConfigKey } = await import("./schemas/validation.js");
      const { GenerationError } = await import("./utils/error-handler.js");
      const { ErrorType } = await import("./types/error-handler.js");

      const config = ConfigManager.getInstance();

      if (key) {
        if (!isConfigKey(key)) {
          throw new GenerationError(
            `Invalid configuration key: ${key}. Allowed keys: ${CONFIG_KEYS.join(", ")}`,
            ErrorType.VALIDATION_ERROR,
            { operation: "configGet", key }
          );
        }
        const value = key === "apiKey" ? config.getApiKey() : config.get(key);
        console.log(`${key}: ${display(key, value)}`);
        return;
      }

      const current = config.getConfig();
      console.log(lightColors.blue(`Current configuration (${config.getConfigPath()}):`));
      for (const k of CONFIG_KEYS) {
        const value = k === "apiKey" ? config.getApiKey() : current[k];
        console.log(`  ${k}: ${display(k, value)}`);
      }
    })
  );

configCmd
  .command("reset")
  .description("Reset configuration to defaults")
  .action(
    run(async (): Promise<void> => {
      const { confirm } = await import("./utils/prompts.js");
      const accepted = await confirm({
        message: "Are you sure you want to reset all configuration to defaults?",
        default: false,
      });

      if (!accepted) {
        console.log(lightColors.yellow("Reset cancelled"));
        return;
      }

      const { ConfigManager } = await import("./config.js");
      const { SUCCESS_MESSAGES } = await import("./constants/messages.js");
      ConfigManager.getInstance().reset();
      console.log(lightColors.green(`✅ ${SUCCESS_MESSAGES.CONFIG_RESET}`));
    })
  );

program
  .command("setup")
  .description("Interactive setup for first-time users")
  .action(
    run(async (): Promise<void> => {
      const { input, select } = await import("./utils/prompts.js");
      const { ConfigManager } = await import("./config.js");
      const { ApiKeySchema } = await import("./schemas/validation.js");
      const { SUCCESS_MESSAGES } = await import("./constants/messages.js");

      console.log(lightColors.blue("🚀 Welcome to diffscribe setup!\n"));
      const config = ConfigManager.getInstance();

      const backend = await select<BackendKind>({
        message: "Which backend should generate text?",
        choices: [
          { name: "Local daemon (Ollama), falls back to the in-process model", value: "local-daemon" },
          { name: "In-process model (downloaded once, runs offline)", value: "local-model" },
          { name: "Remote OpenAI-compatible API (OpenRouter by default)", value: "remote-api" },
        ],
      });

      const values: Partial<Record<"backend" | "ollamaModel" | "apiKey", string>> = { backend };

      if (backend === "local-daemon") {
        values.ollamaModel = await input({ message: "Ollama model:", default: config.get("ollamaModel") });
      }

      if (backend === "remote-api") {
        values.apiKey = await input({
          message: "Enter your API key:",
          validate: (value: string): string | boolean => {
            const result = ApiKeySchema.safeParse(value);
            return result.success || (result.error.issues[0]?.message ?? "Invalid API key");
          },
        });
      }

      config.saveConfig(values);

      console.log(`${lightColors.green(`\n✅ ${SUCCESS_MESSAGES.SETUP_DONE}`)}
${lightColors.blue('Stage some changes and run "dscribe commit".')}
${lightColors.gray('Use "dscribe config" to modify settings later.')}`);
    })
  );

const modelCmd = program.command("model").description("Manage the in-process model");

modelCmd
  .command("download")
  .description("Download and load the in-process model ahead of time")
  .action(
    run(async (): Promise<void> => {
      const { Diffscribe } = await lazyModules.diffscribe();
      await new Diffscribe().downloadModel();
      exitProcess(0);
    })
  );

program
  .command("help-examples")
  .description("Show usage examples")
  .action(
    run(async (): Promise<void> => {
      const { pastel } = await lazyModules.gradientString();
      console.log(`${pastel("📚 diffscribe usage examples:\n")}

${lightColors.yellow("Commits:")}
  dscribe commit                         # Group staged files and commit each group
  dscribe commit --dry-run               # Preview groups and messages
  dscribe commit --single                # One commit for everything staged
  dscribe commit -g "mention the ticket" # Steer the model

${lightColors.yellow("Pull requests:")}
  dscribe generate                       # PR title, body and per-group messages

${lightColors.yellow("Backends:")}
  dscribe config set backend ${BACKEND_KINDS.join("|")}
  dscribe config set apiKey <key>        # For remote-api (or OPENROUTER_API_KEY)
  dscribe model download                 # Fetch the in-process model

${lightColors.yellow("Configuration:")}
  dscribe setup                          # Interactive setup
  dscribe config get                     # View configuration
  dscribe config reset                   # Reset configuration`);
    })
  );

program.on("command:*", (): void => {
  console.error(lightColors.red(`❌ Unknown command: ${program.args.join(" ")}`));
  console.log(`${lightColors.yellow("\n💡 Available commands:")}
${lightColors.blue("  dscribe --help              # Show all available commands")}
${lightColors.blue("  dscribe help-examples       # Show usage examples")}`);
  process.exit(1);
});

program.parse(process.argv);
