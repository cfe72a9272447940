export const BACKEND_KINDS = ["local-daemon", "local-model", "remote-api"] as const;

export type BackendKind = (typeof BACKEND_KINDS)[number];

export interface BackendIdentity {
  kind: BackendKind;
  model: string;
  endpoint?: string;
}

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface GenerationOptions {
  temperature?: number;
  maxTokens?: number;
  topP?: number;
}

export interface GenerationRequest {
  readonly prompt?: string;
  readonly messages?: readonly Readonly<ChatMessage>[];
  readonly options: Readonly<GenerationOptions>;
}

export interface CommitSuggestion {
  type: string;
  description: string;
  message: string;
}

export interface ChangeGroup {
  id: string;
  files: string[];
  type: string;
  description: string;
  diff: string;
  message: string;
}

export interface PullRequestText {
  title: string;
  body: string;
}

export interface GroupCommitMessage {
  groupId: string;
  message: string;
}

export interface GenerationOutput {
  pullRequest: PullRequestText;
  commits: GroupCommitMessage[];
}

export interface DiffProvider {
  getFileDiff(path: string): Promise<string>;
  getStagedDiff(): Promise<string>;
}

export interface DiffscribeConfig {
  backend?: BackendKind;
  ollamaUrl: string;
  ollamaModel: string;
  offlineModel: string;
  apiKey?: string;
  remoteModel: string;
  remoteBaseUrl: string;
}

export interface ConfigProvider {
  getConfig(): DiffscribeConfig;
}

export interface CommitOptions {
  dryRun?: boolean;
  guidance?: string;
  yes?: boolean;
  single?: boolean;
}
