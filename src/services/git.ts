import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { simpleGit, type SimpleGit } from "simple-git";
import type { DiffProvider } from "../types/common.js";
import { ErrorType } from "../types/error-handler.js";
import { withErrorHandling } from "../utils/error-handler.js";

/** Staged-only git access. Every diff is taken with `--cached`. */
export class GitService implements DiffProvider {
  private readonly git: SimpleGit;

  constructor(git: SimpleGit = simpleGit(process.cwd())) {
    this.git = git;
  }

  async isGitRepository(): Promise<boolean> {
    try {
      return await this.git.checkIsRepo();
    } catch {
      return false;
    }
  }

  /** Paths with staged changes. Renames are listed as their deleted and added paths. */
  getStagedFiles = async (): Promise<string[]> =>
    withErrorHandling(
      async () => {
        const output = await this.git.diff(["--cached", "--name-only", "--no-renames", "-z"]);
        return output.split("\0").filter(path => path.length > 0);
      },
      { operation: "getStagedFiles" },
      ErrorType.GIT_ERROR
    );

  getFileDiff = async (path: string): Promise<string> =>
    withErrorHandling(
      () => this.git.diff(["--cached", "--", path]),
      { operation: "getFileDiff", file: path },
      ErrorType.GIT_ERROR
    );

  getStagedDiff = async (): Promise<string> =>
    withErrorHandling(() => this.git.diff(["--cached"]), { operation: "getStagedDiff" }, ErrorType.GIT_ERROR);

  /** Staged changes of `paths` as a patch that `applyCachedPatch` can put back. */
  getCachedPatch = async (paths: readonly string[]): Promise<string> =>
    withErrorHandling(
      () => this.git.diff(["--cached", "--binary", "--no-renames", "--no-color", "--no-ext-diff", "--", ...paths]),
      { operation: "getCachedPatch" },
      ErrorType.GIT_ERROR
    );

  /** Reset the index entries of `paths` to HEAD, keeping working-tree changes. */
  unstageFiles = async (paths: readonly string[]): Promise<void> => {
    await withErrorHandling(
      () => this.git.reset(["--quiet", "--", ...paths]),
      { operation: "unstageFiles" },
      ErrorType.GIT_ERROR
    );
  };

  /** Apply a patch to the index only. The working tree is left alone. */
  applyCachedPatch = async (patch: string): Promise<void> => {
    await withErrorHandling(
      async () => {
        const dir = await mkdtemp(join(tmpdir(), "diffscribe-"));
        try {
          const file = join(dir, "staged.patch");
          await writeFile(file, patch);
          await this.git.applyPatch(file, ["--cached"]);
        } finally {
          await rm(dir, { recursive: true, force: true });
        }
      },
      { operation: "applyCachedPatch" },
      ErrorType.GIT_ERROR
    );
  };

  commit = async (message: string): Promise<string> =>
    withErrorHandling(
      async () => {
        const result = await this.git.commit(message);
        return result.commit;
      },
      { operation: "commit" },
      ErrorType.GIT_ERROR
    );
}
