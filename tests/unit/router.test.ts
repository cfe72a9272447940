import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { BackendRouter, resolveBackendIdentity, type BackendFactory } from "../../src/services/router.js";
import { createGenerationRequest, type GenerationBackend } from "../../src/services/backends/types.js";
import {
  AllBackendsExhaustedError,
  AuthFailedError,
  BackendUnavailableError,
  ProtocolError,
} from "../../src/utils/error-handler.js";
import { ErrorType } from "../../src/types/error-handler.js";
import type { BackendKind, DiffscribeConfig, GenerationRequest } from "../../src/types/common.js";
import { ConfigManager } from "../../src/config.js";

const baseConfig: DiffscribeConfig = {
  ollamaUrl: "http://localhost:11434/api/generate",
  ollamaModel: "llama3",
  offlineModel: "test/offline-model",
  remoteModel: "test/remote-model",
  remoteBaseUrl: "https://remote.test/v1",
};

const fakeBackend = (kind: BackendKind) => ({
  kind,
  complete: vi.fn<(request: GenerationRequest) => Promise<string>>(),
});

describe("resolveBackendIdentity", () => {
  it("resolves each kind to its model and endpoint", () => {
    expect(resolveBackendIdentity({ ...baseConfig, backend: "local-daemon" })).toEqual({
      kind: "local-daemon",
      model: "llama3",
      endpoint: "http://localhost:11434/api/generate",
    });
    expect(resolveBackendIdentity({ ...baseConfig, backend: "remote-api" })).toEqual({
      kind: "remote-api",
      model: "test/remote-model",
      endpoint: "https://remote.test/v1",
    });
    expect(resolveBackendIdentity({ ...baseConfig, backend: "local-model" })).toEqual({
      kind: "local-model",
      model: "test/offline-model",
    });
  });

  it("defaults an unset backend to the local model", () => {
    expect(resolveBackendIdentity(baseConfig).kind).toBe("local-model");
  });
});

describe("BackendRouter", () => {
  let daemon: ReturnType<typeof fakeBackend>;
  let local: ReturnType<typeof fakeBackend>;
  let remote: ReturnType<typeof fakeBackend>;
  let createBackend: BackendFactory;
  let sleep: Mock<(ms: number) => Promise<void>>;
  const request = createGenerationRequest("summarize this diff");

  const routerFor = (backend?: BackendKind): BackendRouter =>
    new BackendRouter({ getConfig: () => ({ ...baseConfig, backend }) }, { createBackend, sleep });

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    daemon = fakeBackend("local-daemon");
    local = fakeBackend("local-model");
    remote = fakeBackend("remote-api");
    const backends: Record<BackendKind, GenerationBackend> = {
      "local-daemon": daemon,
      "local-model": local,
      "remote-api": remote,
    };
    createBackend = vi.fn<BackendFactory>(identity => backends[identity.kind]);
    sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
  });

  it("returns the daemon output on first success", async () => {
    daemon.complete.mockResolvedValue("feat: add parser");

    await expect(routerFor("local-daemon").route(request)).resolves.toBe("feat: add parser");
    expect(daemon.complete).toHaveBeenCalledTimes(1);
    expect(local.complete).not.toHaveBeenCalled();
  });

  it("retries the daemon three times and then falls back to the local model", async () => {
    daemon.complete.mockRejectedValue(new BackendUnavailableError("local-daemon", "connection refused"));
    local.complete.mockResolvedValue("fix: handle empty input");

    await expect(routerFor("local-daemon").route(request)).resolves.toBe("fix: handle empty input");
    expect(daemon.complete).toHaveBeenCalledTimes(3);
    expect(local.complete).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(1000);
  });

  it("recovers when the daemon comes up on a later attempt", async () => {
    daemon.complete
      .mockRejectedValueOnce(new BackendUnavailableError("local-daemon", "connection refused"))
      .mockResolvedValueOnce("docs: update readme");

    await expect(routerFor("local-daemon").route(request)).resolves.toBe("docs: update readme");
    expect(daemon.complete).toHaveBeenCalledTimes(2);
    expect(local.complete).not.toHaveBeenCalled();
  });

  it("reports both causes when the fallback also fails", async () => {
    daemon.complete.mockRejectedValue(new BackendUnavailableError("local-daemon", "connection refused"));
    local.complete.mockRejectedValue(
      new BackendUnavailableError("local-model", "download declined", { retryable: false })
    );

    const error = await routerFor("local-daemon").route(request).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AllBackendsExhaustedError);
    if (!(error instanceof AllBackendsExhaustedError)) return;
    expect(error.message).toBe(
      "All backends failed. local-daemon (attempt 3): connection refused; local-model (attempt 1): download declined"
    );
    expect(error.attempts).toHaveLength(4);
    expect(error.backendsTried).toEqual(["local-daemon", "local-model"]);
    expect(error.type).toBe(ErrorType.ALL_BACKENDS_EXHAUSTED);
  });

  it("falls back immediately on a daemon failure that is not retryable", async () => {
    daemon.complete.mockRejectedValue(new ProtocolError("local-daemon", "Ollama response has no 'response' field"));
    local.complete.mockResolvedValue("chore: bump deps");

    await expect(routerFor("local-daemon").route(request)).resolves.toBe("chore: bump deps");
    expect(daemon.complete).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("gives the remote API a single attempt with no fallback", async () => {
    remote.complete.mockRejectedValue(new AuthFailedError("remote-api", "key rejected", { status: 401 }));

    const error = await routerFor("remote-api").route(request).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AllBackendsExhaustedError);
    if (!(error instanceof AllBackendsExhaustedError)) return;
    expect(error.message).toBe("All backends failed. remote-api (attempt 1): key rejected");
    expect(error.lastCauseType).toBe(ErrorType.AUTH_FAILED);
    expect(remote.complete).toHaveBeenCalledTimes(1);
    expect(local.complete).not.toHaveBeenCalled();
  });

  it("gives the local model a single attempt", async () => {
    local.complete.mockRejectedValue(new BackendUnavailableError("local-model", "load failed"));

    await expect(routerFor("local-model").route(request)).rejects.toBeInstanceOf(AllBackendsExhaustedError);
    expect(local.complete).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("routes to the local model when no backend is configured", async () => {
    local.complete.mockResolvedValue("test: cover router");

    await expect(routerFor(undefined).route(request)).resolves.toBe("test: cover router");
    expect(daemon.complete).not.toHaveBeenCalled();
  });

  it("reads configuration on every call", async () => {
    let backend: BackendKind = "remote-api";
    const getConfig = vi.fn(() => ({ ...baseConfig, backend }));
    const router = new BackendRouter({ getConfig }, { createBackend, sleep });
    remote.complete.mockResolvedValue("from remote");
    local.complete.mockResolvedValue("from local");

    await expect(router.route(request)).resolves.toBe("from remote");
    backend = "local-model";
    await expect(router.route(request)).resolves.toBe("from local");
    expect(getConfig).toHaveBeenCalledTimes(2);
  });

  it("takes the local model path when the config file names an unknown backend", async () => {
    const dir = mkdtempSync(join(tmpdir(), "diffscribe-router-"));
    const configPath = join(dir, "config.json");
    writeFileSync(configPath, JSON.stringify({ backend: "ollama" }));
    local.complete.mockResolvedValue("chore: tidy");

    try {
      const router = new BackendRouter(new ConfigManager(configPath, {}), { createBackend, sleep });

      await expect(router.route(request)).resolves.toBe("chore: tidy");
      expect(createBackend).toHaveBeenCalledTimes(1);
      expect(vi.mocked(createBackend).mock.calls[0]?.[0].kind).toBe("local-model");
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
