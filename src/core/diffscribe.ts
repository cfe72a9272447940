import { lightColors } from "../utils/colors.js";
import { lightSpinner, type LightSpinner } from "../utils/spinner.js";
import { confirm } from "../utils/prompts.js";
import { GenerationError } from "../utils/error-handler.js";
import { debugLog } from "../utils/enhanced-error-handler.js";
import { ErrorType } from "../types/error-handler.js";
import type { ChangeGroup, CommitOptions, ConfigProvider, GenerationOutput } from "../types/common.js";
import { ConfigManager } from "../config.js";
import { GitService } from "../services/git.js";
import { BackendRouter } from "../services/router.js";
import { ChangeGroupingEngine, firstSuggestionLine } from "../services/grouping.js";
import { createGenerationRequest } from "../services/backends/types.js";
import { renderCommitPrompt } from "../prompts/templates.js";
import {
  StructuredGenerator,
  describeExtractionFailure,
  type ExtractionFailure,
} from "../services/generator.js";
import { OfflineBackend, type DownloadConsent } from "../services/backends/offline.js";
import { ERROR_MESSAGES, INFO_MESSAGES, SUCCESS_MESSAGES, WARNING_MESSAGES } from "../constants/messages.js";
import { UI_CONSTANTS } from "../constants/ui.js";

type Git = Pick<
  GitService,
  | "isGitRepository"
  | "getStagedFiles"
  | "getFileDiff"
  | "getStagedDiff"
  | "getCachedPatch"
  | "unstageFiles"
  | "applyCachedPatch"
  | "commit"
>;

export interface DiffscribeDeps {
  git?: Git;
  config?: ConfigProvider;
  router?: Pick<BackendRouter, "route">;
  confirm?: (message: string, defaultValue: boolean) => Promise<boolean>;
}

const FAILURE_TYPES: Record<ExtractionFailure["kind"], ErrorType> = {
  LLMCallFailed: ErrorType.LLM_CALL_FAILED,
  NoJsonFound: ErrorType.NO_JSON_FOUND,
  InvalidJson: ErrorType.INVALID_JSON,
  SchemaValidationFailed: ErrorType.SCHEMA_VALIDATION_FAILED,
};

const failureDiagnostics = (failure: ExtractionFailure): string | undefined => {
  switch (failure.kind) {
    case "NoJsonFound":
      return failure.raw;
    case "InvalidJson":
      return failure.block;
    default:
      return undefined;
  }
};

export class Diffscribe {
  private readonly git: Git;
  private readonly config: ConfigProvider;
  private readonly router: Pick<BackendRouter, "route">;
  private readonly ask: (message: string, defaultValue: boolean) => Promise<boolean>;
  private spinner: LightSpinner | null = null;

  constructor(deps: DiffscribeDeps = {}) {
    this.git = deps.git ?? new GitService();
    this.config = deps.config ?? ConfigManager.getInstance();
    this.ask = deps.confirm ?? ((message, defaultValue) => confirm({ message, default: defaultValue }));
    this.router =
      deps.router ?? new BackendRouter(this.config, { confirmDownload: this.confirmDownload });
  }

  /**
   * Group staged files and commit each group separately, or, with `single`,
   * commit everything staged under one message.
   */
  commit = async (options: CommitOptions = {}): Promise<number> => {
    const staged = await this.requireStagedFiles();
    if (staged.length === 0) {
      return 0;
    }
    if (options.single) {
      return this.commitConsolidated(options);
    }

    const groups = await this.groupFiles(staged, options.guidance);
    if (groups.length === 0) {
      return 0;
    }

    this.printGroups(groups);

    if (options.dryRun) {
      console.log(lightColors.blue(INFO_MESSAGES.DRY_RUN));
      return 0;
    }

    if (!options.yes && !(await this.ask(`Create ${groups.length} commit(s)?`, true))) {
      console.log(lightColors.yellow(WARNING_MESSAGES.COMMIT_CANCELLED));
      return 0;
    }

    return this.commitGroups(staged, groups);
  };

  /** Group staged files, then generate a PR title/body and one message per group. */
  generate = async (options: Pick<CommitOptions, "guidance"> = {}): Promise<GenerationOutput | null> => {
    const staged = await this.requireStagedFiles();
    if (staged.length === 0) {
      return null;
    }

    const groups = await this.groupFiles(staged, options.guidance);
    if (groups.length === 0) {
      return null;
    }

    const spinner = this.track(lightSpinner(UI_CONSTANTS.SPINNER_MESSAGES.GENERATING).start());
    const result = await new StructuredGenerator(this.router).extract(groups, options.guidance);
    this.untrack();

    if (!result.ok) {
      spinner.fail();
      const diagnostics = failureDiagnostics(result.failure);
      if (diagnostics !== undefined) {
        debugLog(`model reply:\n${diagnostics}`);
      }
      throw new GenerationError(describeExtractionFailure(result.failure), FAILURE_TYPES[result.failure.kind], {
        operation: "generate",
      });
    }
    spinner.succeed();

    this.printOutput(result.output, groups);
    return result.output;
  };

  /** Fetch (with consent) and load the in-process model. */
  downloadModel = async (): Promise<void> => {
    const { offlineModel } = this.config.getConfig();
    const backend = new OfflineBackend({ model: offlineModel, confirmDownload: this.confirmDownload });
    const spinner = this.track(lightSpinner(`${UI_CONSTANTS.SPINNER_MESSAGES.LOADING_MODEL} (${offlineModel})`).start());

    try {
      await backend.ensureReady();
      spinner.succeed(SUCCESS_MESSAGES.MODEL_READY);
    } catch (error) {
      spinner.fail();
      throw error;
    } finally {
      this.untrack();
    }
  };

  /**
   * Commit groups one at a time with exactly their staged content. Everything
   * outside the first group is held out of the index as a patch and applied
   * back with `git apply --cached` when its turn comes, so unstaged
   * working-tree edits never end up in a commit.
   */
  private async commitGroups(staged: readonly string[], groups: readonly ChangeGroup[]): Promise<number> {
    const patches: string[] = [];
    for (const group of groups) {
      patches.push(await this.git.getCachedPatch(group.files));
    }
    const grouped = new Set(groups.flatMap(group => group.files));
    const ungrouped = staged.filter(file => !grouped.has(file));
    const ungroupedPatch = ungrouped.length > 0 ? await this.git.getCachedPatch(ungrouped) : "";

    const firstFiles = new Set(groups[0]?.files ?? []);
    const heldOut = staged.filter(file => !firstFiles.has(file));
    if (heldOut.length > 0) {
      await this.git.unstageFiles(heldOut);
    }

    // groups[0..inIndex) have their changes in the index
    let inIndex = 1;
    let committed = 0;
    try {
      for (const [index, group] of groups.entries()) {
        const spinner = lightSpinner(UI_CONSTANTS.SPINNER_MESSAGES.COMMITTING).start();
        try {
          const patch = patches[index];
          if (index >= inIndex && patch) {
            await this.git.applyCachedPatch(patch);
          }
          inIndex = Math.max(inIndex, index + 1);
          const hash = await this.git.commit(group.message);
          spinner.succeed(`${lightColors.gray(hash)} ${group.message}`);
        } catch (error) {
          spinner.fail(`Could not commit ${group.id}`);
          throw error;
        }
        committed++;
      }
    } finally {
      // put back whatever was staged but not committed
      for (const patch of [...patches.slice(inIndex), ungroupedPatch]) {
        if (patch) {
          await this.git.applyCachedPatch(patch);
        }
      }
    }

    console.log(lightColors.green(`\n✅ Created ${committed} commit(s).`));
    return committed;
  }

  /** One message for the whole staged diff, committed as it stands in the index. */
  private async commitConsolidated(options: CommitOptions): Promise<number> {
    const diff = await this.git.getStagedDiff();
    const spinner = this.track(lightSpinner(UI_CONSTANTS.SPINNER_MESSAGES.WRITING_MESSAGE).start());

    let message: string;
    try {
      const reply = await this.router.route(createGenerationRequest(renderCommitPrompt(diff, options.guidance), {}));
      message = firstSuggestionLine(reply);
    } catch (error) {
      spinner.fail();
      throw error;
    } finally {
      this.untrack();
    }

    if (!message) {
      spinner.fail();
      throw new GenerationError(ERROR_MESSAGES.NO_SUGGESTION, ErrorType.EMPTY_RESPONSE, {
        operation: "commitConsolidated",
      });
    }
    spinner.succeed();
    console.log(`\n${lightColors.blue(message)}\n`);

    if (options.dryRun) {
      console.log(lightColors.blue(INFO_MESSAGES.DRY_RUN));
      return 0;
    }

    if (!options.yes && !(await this.ask("Create 1 commit?", true))) {
      console.log(lightColors.yellow(WARNING_MESSAGES.COMMIT_CANCELLED));
      return 0;
    }

    const commitSpinner = lightSpinner(UI_CONSTANTS.SPINNER_MESSAGES.COMMITTING).start();
    try {
      const hash = await this.git.commit(message);
      commitSpinner.succeed(`${lightColors.gray(hash)} ${message}`);
    } catch (error) {
      commitSpinner.fail();
      throw error;
    }
    return 1;
  }

  // The spinner redraws over stdin, so pause it while asking.
  private readonly confirmDownload: DownloadConsent = async (modelName, sizeHint) => {
    const paused = this.spinner?.isRunning ? this.spinner : null;
    paused?.stop();
    try {
      return await this.ask(`Download ${modelName} (${sizeHint}) now?`, false);
    } finally {
      paused?.start();
    }
  };

  private async requireStagedFiles(): Promise<string[]> {
    if (!(await this.git.isGitRepository())) {
      throw new GenerationError(ERROR_MESSAGES.NOT_A_REPO, ErrorType.GIT_ERROR, { operation: "requireStagedFiles" });
    }
    const staged = await this.git.getStagedFiles();
    if (staged.length === 0) {
      console.log(lightColors.yellow(WARNING_MESSAGES.NO_STAGED_FILES));
    }
    return staged;
  }

  private async groupFiles(staged: string[], guidance?: string): Promise<ChangeGroup[]> {
    const engine = new ChangeGroupingEngine(this.git, this.router);
    const spinner = this.track(lightSpinner(UI_CONSTANTS.SPINNER_MESSAGES.SUMMARIZING).start());

    let groups: ChangeGroup[];
    try {
      groups = await engine.group(staged, {
        guidance,
        onProgress: (done, total, path) => {
          spinner.message = `Summarized ${done}/${total}: ${path}`;
        },
      });
    } catch (error) {
      spinner.fail();
      throw error;
    } finally {
      this.untrack();
    }

    if (groups.length === 0) {
      spinner.warn(WARNING_MESSAGES.NOTHING_TO_GROUP);
    } else {
      spinner.succeed(`Grouped ${staged.length} file(s) into ${groups.length} change group(s)`);
    }
    return groups;
  }

  private printGroups(groups: readonly ChangeGroup[]): void {
    for (const group of groups) {
      console.log(`\n${lightColors.bold(group.id)} ${lightColors.blue(group.message)}`);
      for (const file of group.files) {
        console.log(lightColors.gray(`  ${file}`));
      }
    }
    console.log("");
  }

  private printOutput(output: GenerationOutput, groups: readonly ChangeGroup[]): void {
    const filesById = new Map(groups.map(group => [group.id, group.files]));

    console.log(`\n${lightColors.bold("Pull request title:")}\n${output.pullRequest.title}`);
    console.log(`\n${lightColors.bold("Pull request body:")}\n${output.pullRequest.body}`);
    console.log(`\n${lightColors.bold("Commits:")}`);
    for (const commit of output.commits) {
      const files = filesById.get(commit.groupId) ?? [];
      console.log(`\n${lightColors.cyan(commit.groupId)} ${lightColors.gray(files.join(", "))}`);
      console.log(commit.message);
    }
  }

  private track(spinner: LightSpinner): LightSpinner {
    this.spinner = spinner;
    return spinner;
  }

  private untrack(): void {
    this.spinner = null;
  }
}
