import { describe, it, expect, vi } from "vitest";
import { OllamaBackend } from "../../src/services/backends/ollama.js";
import { createGenerationRequest } from "../../src/services/backends/types.js";
import {
  BackendUnavailableError,
  EmptyResponseError,
  ProtocolError,
} from "../../src/utils/error-handler.js";
import { ErrorType } from "../../src/types/error-handler.js";

const OLLAMA_URL = "http://localhost:11434/api/generate";

const backendWith = (fetchImpl: typeof fetch) =>
  new OllamaBackend({ url: OLLAMA_URL, model: "llama3", timeoutMs: 5_000, fetchImpl });

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

describe("OllamaBackend", () => {
  it("posts a non-streaming generate request and returns the trimmed response", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ response: "  feat: add cache\n" }));

    await expect(backendWith(fetchImpl).complete(createGenerationRequest("describe this"))).resolves.toBe(
      "feat: add cache"
    );

    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe(OLLAMA_URL);
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({ model: "llama3", prompt: "describe this", stream: false });
  });

  it("maps generation options to Ollama's option names", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ response: "ok" }));

    await backendWith(fetchImpl).complete(createGenerationRequest("p", { temperature: 0.2, maxTokens: 64, topP: 0.9 }));

    const init = fetchImpl.mock.calls[0]?.[1];
    expect(JSON.parse(String(init?.body)).options).toEqual({ temperature: 0.2, num_predict: 64, top_p: 0.9 });
  });

  it("flattens chat messages into one prompt", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ response: "ok" }));

    await backendWith(fetchImpl).complete(
      createGenerationRequest([
        { role: "system", content: "be brief" },
        { role: "user", content: "summarize" },
      ])
    );

    expect(JSON.parse(String(fetchImpl.mock.calls[0]?.[1]?.body)).prompt).toBe("system: be brief\n\nsummarize");
  });

  it("reports a refused connection as a retryable unavailable error", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(new TypeError("fetch failed"));

    const error = await backendWith(fetchImpl).complete(createGenerationRequest("p")).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendUnavailableError);
    expect(error).toMatchObject({
      message: `Could not connect to Ollama at ${OLLAMA_URL}: fetch failed`,
      type: ErrorType.BACKEND_UNAVAILABLE,
      recoverable: true,
    });
  });

  it("reports a non-2xx status as unavailable", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response("model not loaded", { status: 503 }));

    await expect(backendWith(fetchImpl).complete(createGenerationRequest("p"))).rejects.toThrow(
      `Ollama at ${OLLAMA_URL} responded with HTTP 503`
    );
  });

  it("reports a body without a response field as a protocol error", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ done: true }));

    const error = await backendWith(fetchImpl).complete(createGenerationRequest("p")).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProtocolError);
    expect(error).toMatchObject({ message: "Ollama response has no 'response' field", recoverable: false });
  });

  it("reports a body that is not JSON as a protocol error", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response("<html>proxy</html>", { status: 200 }));

    await expect(backendWith(fetchImpl).complete(createGenerationRequest("p"))).rejects.toBeInstanceOf(
      ProtocolError
    );
  });

  it("reports a blank response as empty", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ response: "   " }));

    await expect(backendWith(fetchImpl).complete(createGenerationRequest("p"))).rejects.toBeInstanceOf(
      EmptyResponseError
    );
  });
});
