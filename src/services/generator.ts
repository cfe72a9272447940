import type { ZodIssue } from "zod";
import type { ChangeGroup, GenerationOutput } from "../types/common.js";
import { GenerationOutputSchema } from "../schemas/validation.js";
import { COMMIT_MESSAGE_PATTERNS } from "../constants/ui.js";
import { renderPrAndCommitsPrompt } from "../prompts/templates.js";
import { toError } from "../utils/error-handler.js";
import { createGenerationRequest } from "./backends/types.js";
import type { BackendRouter } from "./router.js";

export interface SchemaIssue {
  path: string;
  message: string;
}

export type ExtractionFailure =
  | { kind: "LLMCallFailed"; cause: Error }
  | { kind: "NoJsonFound"; raw: string }
  | { kind: "InvalidJson"; block: string; message: string }
  | { kind: "SchemaValidationFailed"; issues: SchemaIssue[] };

export type ExtractionResult =
  | { ok: true; output: GenerationOutput }
  | { ok: false; failure: ExtractionFailure };

type Router = Pick<BackendRouter, "route">;

export const findFencedJson = (text: string): string | undefined =>
  COMMIT_MESSAGE_PATTERNS.FENCED_JSON.exec(text)?.[1];

export const findBraceSpan = (text: string): string | undefined => {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  return start !== -1 && end > start ? text.slice(start, end + 1) : undefined;
};

/** Fenced ```json block first, then the first-`{` to last-`}` span. */
export const extractJsonBlock = (text: string): string | undefined =>
  findFencedJson(text) ?? findBraceSpan(text);

export const serializeGroups = (groups: readonly ChangeGroup[]): string =>
  JSON.stringify(
    groups.map(group => ({
      group_id: group.id,
      files: group.files,
      type: group.type,
      description: group.description,
      diff: group.diff,
    })),
    null,
    2
  );

const formatIssuePath = (path: ReadonlyArray<string | number>): string =>
  path.length === 0 ? "(root)" : path.join(".");

const toSchemaIssues = (issues: readonly ZodIssue[]): SchemaIssue[] =>
  issues.map(issue => ({ path: formatIssuePath(issue.path), message: issue.message }));

/**
 * Checks the commits against the submitted groups: one entry per group,
 * unique ids, no unknown ids. Returns the commits in submission order.
 */
export const matchCommitsToGroups = (
  output: GenerationOutput,
  groups: readonly ChangeGroup[]
): { commits: GenerationOutput["commits"] } | { issues: SchemaIssue[] } => {
  const issues: SchemaIssue[] = [];
  const submitted = new Set(groups.map(group => group.id));
  const byId = new Map<string, GenerationOutput["commits"][number]>();

  if (output.commits.length !== groups.length) {
    issues.push({
      path: "commits",
      message: `expected ${groups.length} commit(s), got ${output.commits.length}`,
    });
  }

  output.commits.forEach((commit, index) => {
    if (!submitted.has(commit.groupId)) {
      issues.push({ path: `commits.${index}.group_id`, message: `unknown group_id "${commit.groupId}"` });
    } else if (byId.has(commit.groupId)) {
      issues.push({ path: `commits.${index}.group_id`, message: `duplicate group_id "${commit.groupId}"` });
    } else {
      byId.set(commit.groupId, commit);
    }
  });

  const ordered: GenerationOutput["commits"] = [];
  for (const group of groups) {
    const commit = byId.get(group.id);
    if (commit) {
      ordered.push(commit);
    } else if (output.commits.length === groups.length) {
      issues.push({ path: "commits", message: `missing commit for group_id "${group.id}"` });
    }
  }

  return issues.length > 0 ? { issues } : { commits: ordered };
};

/** Parse a raw model reply for the given groups. Pure; never throws. */
export const parseGenerationOutput = (raw: string, groups: readonly ChangeGroup[]): ExtractionResult => {
  const block = extractJsonBlock(raw);
  if (block === undefined) {
    return { ok: false, failure: { kind: "NoJsonFound", raw } };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(block);
  } catch (error) {
    return { ok: false, failure: { kind: "InvalidJson", block, message: toError(error).message } };
  }

  const validated = GenerationOutputSchema.safeParse(parsed);
  if (!validated.success) {
    return {
      ok: false,
      failure: { kind: "SchemaValidationFailed", issues: toSchemaIssues(validated.error.issues) },
    };
  }

  const matched = matchCommitsToGroups(validated.data, groups);
  if ("issues" in matched) {
    return { ok: false, failure: { kind: "SchemaValidationFailed", issues: matched.issues } };
  }

  return { ok: true, output: { pullRequest: validated.data.pullRequest, commits: matched.commits } };
};

export const describeExtractionFailure = (failure: ExtractionFailure): string => {
  switch (failure.kind) {
    case "LLMCallFailed":
      return `Generation call failed: ${failure.cause.message}`;
    case "NoJsonFound":
      return "The model reply contained no JSON object";
    case "InvalidJson":
      return `The model reply contained malformed JSON: ${failure.message}`;
    case "SchemaValidationFailed":
      return `The model reply did not match the expected shape: ${failure.issues
        .map(issue => `${issue.path}: ${issue.message}`)
        .join("; ")}`;
  }
};

/** Turns change groups into a validated PR title/body and one commit message per group. */
export class StructuredGenerator {
  constructor(private readonly router: Router) {}

  async extract(groups: readonly ChangeGroup[], guidance = ""): Promise<ExtractionResult> {
    const prompt = renderPrAndCommitsPrompt(serializeGroups(groups), guidance);

    let raw: string;
    try {
      raw = await this.router.route(createGenerationRequest(prompt, {}));
    } catch (error) {
      return { ok: false, failure: { kind: "LLMCallFailed", cause: toError(error) } };
    }

    return parseGenerationOutput(raw, groups);
  }
}
