import { z } from "zod";
import { BACKEND_KINDS } from "../types/common.js";
import {
  DEFAULT_OFFLINE_MODEL,
  DEFAULT_OLLAMA_MODEL,
  DEFAULT_OLLAMA_URL,
  DEFAULT_REMOTE_BASE_URL,
  DEFAULT_REMOTE_MODEL,
} from "../constants/ai.js";

export const BackendKindSchema = z.enum(BACKEND_KINDS);

export const ApiKeySchema = z
  .string()
  .transform(val => val.trim())
  .pipe(
    z
      .string()
      .min(10, "API key must be at least 10 characters long")
      .max(200, "API key must be 200 characters or less")
      .regex(/^[A-Za-z0-9_.:-]+$/, "API key contains invalid characters")
  );

export const UrlSchema = z.string().url("Must be a valid URL");

export const ConfigSchema = z.object({
  backend: BackendKindSchema.optional(),
  ollamaUrl: UrlSchema.default(DEFAULT_OLLAMA_URL),
  ollamaModel: z.string().min(1).default(DEFAULT_OLLAMA_MODEL),
  offlineModel: z.string().min(1).default(DEFAULT_OFFLINE_MODEL),
  apiKey: ApiKeySchema.optional(),
  remoteModel: z.string().min(1).default(DEFAULT_REMOTE_MODEL),
  remoteBaseUrl: UrlSchema.default(DEFAULT_REMOTE_BASE_URL),
});

/**
 * Shape of a config file on read. An unrecognised backend name is dropped so
 * the router falls back to its default; `set` still rejects it.
 */
export const StoredConfigSchema = ConfigSchema.extend({
  backend: BackendKindSchema.optional().catch(undefined),
});

export type ConfigKey = keyof typeof ConfigSchema.shape;

export const CONFIG_KEYS = [
  "backend",
  "ollamaUrl",
  "ollamaModel",
  "offlineModel",
  "apiKey",
  "remoteModel",
  "remoteBaseUrl",
] as const satisfies readonly ConfigKey[];

export const isConfigKey = (key: string): key is ConfigKey =>
  CONFIG_KEYS.some(configKey => configKey === key);

export const CommitMessageSchema = z
  .string()
  .transform(val => val.trim())
  .pipe(z.string().min(1, "Commit message cannot be empty"));

const PullRequestSchema = z.object({
  title: z.string().trim().min(1, "Pull request title is required"),
  body: z.string(),
});

const GroupCommitSchema = z
  .object({
    group_id: z.string().min(1).optional(),
    groupId: z.string().min(1).optional(),
    message: CommitMessageSchema,
  })
  .transform((commit, ctx) => {
    const groupId = commit.group_id ?? commit.groupId;
    if (groupId === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "group_id is required",
        path: ["group_id"],
      });
      return z.NEVER;
    }
    return { groupId, message: commit.message };
  });

/** Model output for the combined PR + commits prompt. Accepts camelCase aliases. */
export const GenerationOutputSchema = z
  .object({
    pull_request: PullRequestSchema.optional(),
    pullRequest: PullRequestSchema.optional(),
    commits: z.array(GroupCommitSchema),
  })
  .transform((output, ctx) => {
    const pullRequest = output.pull_request ?? output.pullRequest;
    if (!pullRequest) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "pull_request is required",
        path: ["pull_request"],
      });
      return z.NEVER;
    }
    return { pullRequest, commits: output.commits };
  });
