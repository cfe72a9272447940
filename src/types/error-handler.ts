import type { BackendKind } from "./common.js";

export enum ErrorType {
  BACKEND_UNAVAILABLE = "BACKEND_UNAVAILABLE",
  AUTH_FAILED = "AUTH_FAILED",
  EMPTY_RESPONSE = "EMPTY_RESPONSE",
  PROTOCOL_ERROR = "PROTOCOL_ERROR",
  ALL_BACKENDS_EXHAUSTED = "ALL_BACKENDS_EXHAUSTED",
  LLM_CALL_FAILED = "LLM_CALL_FAILED",
  NO_JSON_FOUND = "NO_JSON_FOUND",
  INVALID_JSON = "INVALID_JSON",
  SCHEMA_VALIDATION_FAILED = "SCHEMA_VALIDATION_FAILED",
  CONFIG_ERROR = "CONFIG_ERROR",
  GIT_ERROR = "GIT_ERROR",
  VALIDATION_ERROR = "VALIDATION_ERROR",
}

export interface ErrorContext {
  operation?: string;
  backend?: BackendKind;
  file?: string;
  key?: string;
  status?: number;
}
