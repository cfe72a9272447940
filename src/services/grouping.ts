import type { ChangeGroup, CommitSuggestion, DiffProvider } from "../types/common.js";
import { toError } from "../utils/error-handler.js";
import { lightColors } from "../utils/colors.js";
import { DEFAULT_COMMIT_TYPE } from "../constants/ai.js";
import { COMMIT_MESSAGE_PATTERNS } from "../constants/ui.js";
import { renderCommitPrompt } from "../prompts/templates.js";
import { createGenerationRequest } from "./backends/types.js";
import type { BackendRouter } from "./router.js";

export interface GroupingOptions {
  guidance?: string;
  onProgress?: (done: number, total: number, path: string) => void;
}

export interface FileSuggestion {
  path: string;
  diff: string;
  suggestion: CommitSuggestion;
}

type Router = Pick<BackendRouter, "route">;

/** Split a "type: description" line. The type is kept as written; lines without one become chores. */
export const parseSuggestion = (text: string): CommitSuggestion => {
  const message = text.trim();
  const colon = message.indexOf(":");
  if (colon === -1) {
    return { type: DEFAULT_COMMIT_TYPE, description: message, message };
  }

  const prefix = message.slice(0, colon).trim();
  const description = message.slice(colon + 1).trim();
  if (!COMMIT_MESSAGE_PATTERNS.TYPE_PREFIX.test(prefix)) {
    return { type: DEFAULT_COMMIT_TYPE, description: message, message };
  }
  return { type: prefix, description, message };
};

/** First non-empty line of a model reply, without wrapping backticks or quotes. */
export const firstSuggestionLine = (reply: string): string => {
  const line = reply
    .split("\n")
    .map(l => l.trim())
    .find(l => l.length > 0 && !l.startsWith("```"));
  return (line ?? "").replace(/^[`"']+|[`"']+$/g, "").trim();
};

export const groupKey = (type: string, description: string): string =>
  `${type}\u0000${description.trim().toLowerCase()}`;

export const isSameGroup = (a: CommitSuggestion, b: CommitSuggestion): boolean =>
  groupKey(a.type, a.description) === groupKey(b.type, b.description);

/**
 * Greedy single pass over files in input order. Each unclustered file seeds a
 * group and absorbs every later file with the same key.
 */
export const clusterSuggestions = (files: readonly FileSuggestion[]): ChangeGroup[] => {
  const clustered = new Set<number>();
  const groups: ChangeGroup[] = [];

  files.forEach((seed, seedIndex) => {
    if (clustered.has(seedIndex)) {
      return;
    }
    clustered.add(seedIndex);
    const members = [seed];

    for (let i = seedIndex + 1; i < files.length; i++) {
      const candidate = files[i];
      if (candidate && !clustered.has(i) && isSameGroup(seed.suggestion, candidate.suggestion)) {
        clustered.add(i);
        members.push(candidate);
      }
    }

    groups.push({
      id: `group-${groups.length + 1}`,
      files: members.map(m => m.path),
      type: seed.suggestion.type,
      description: seed.suggestion.description,
      diff: members.map(m => m.diff).join("\n"),
      message: seed.suggestion.message,
    });
  });

  return groups;
};

export class ChangeGroupingEngine {
  constructor(
    private readonly diffProvider: DiffProvider,
    private readonly router: Router
  ) {}

  async group(stagedPaths: readonly string[], options: GroupingOptions = {}): Promise<ChangeGroup[]> {
    const unique = [...new Set(stagedPaths)];
    const summarized: FileSuggestion[] = [];

    for (const [index, path] of unique.entries()) {
      const summary = await this.summarize(path, options.guidance);
      if (summary) {
        summarized.push(summary);
      }
      options.onProgress?.(index + 1, unique.length, path);
    }

    return clusterSuggestions(summarized);
  }

  private async summarize(path: string, guidance?: string): Promise<FileSuggestion | undefined> {
    let diff: string;
    try {
      diff = await this.diffProvider.getFileDiff(path);
    } catch (error) {
      console.warn(lightColors.yellow(`⚠️  Skipping ${path}: could not read diff (${toError(error).message})`));
      return undefined;
    }

    if (!diff.trim()) {
      console.warn(lightColors.yellow(`⚠️  Skipping ${path}: no staged changes`));
      return undefined;
    }

    let reply: string;
    try {
      reply = await this.router.route(createGenerationRequest(renderCommitPrompt(diff, guidance), {}));
    } catch (error) {
      console.warn(lightColors.yellow(`⚠️  Skipping ${path}: ${toError(error).message}`));
      return undefined;
    }

    const line = firstSuggestionLine(reply);
    if (!line) {
      console.warn(lightColors.yellow(`⚠️  Skipping ${path}: the model returned no suggestion`));
      return undefined;
    }
    return { path, diff, suggestion: parseSuggestion(line) };
  }
}
