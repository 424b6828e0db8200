import { describe, it, expect, vi, afterEach } from "vitest";
import { EmbeddingRequestError, ExternalServiceError } from "@factvault/errors";
import { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";

describe("BgeM3EmbeddingProvider", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts texts to the embed endpoint", async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      new Response(JSON.stringify({ embeddings: [[0.5, 0.5]], tokens_used: 3 }), { status: 200 }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const provider = new BgeM3EmbeddingProvider({ baseUrl: "http://localhost:8080/", dimensions: 2 });
    const result = await provider.embed("hello");

    expect(result).toEqual({ embeddings: [[0.5, 0.5]], model: "bge-m3", tokensUsed: 3, dimensions: 2 });
    const [url, init] = fetchMock.mock.calls[0] as [string, RequestInit];
    expect(url).toBe("http://localhost:8080/embed");
    expect(JSON.parse(String(init.body))).toEqual({ texts: ["hello"], dimensions: 2 });
  });

  it("rejects a 422 without marking it transient", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("too long", { status: 422 })));
    const provider = new BgeM3EmbeddingProvider({ baseUrl: "http://localhost:8080" });

    const error: unknown = await provider.embed("x").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EmbeddingRequestError);
    expect(error).toMatchObject({ statusCode: 422, message: "bge-m3 embedding failed: 422" });
  });

  it("treats an unreachable server as transient", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")));
    const provider = new BgeM3EmbeddingProvider({ baseUrl: "http://localhost:8080" });

    await expect(provider.embed("x")).rejects.toThrow(
      new ExternalServiceError("bge-m3 request failed: fetch failed", "bge-m3"),
    );
  });

  it("reports health from the health endpoint", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("ok", { status: 200 })));
    const provider = new BgeM3EmbeddingProvider({ baseUrl: "http://localhost:8080" });
    await expect(provider.healthCheck()).resolves.toBe(true);

    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")));
    await expect(provider.healthCheck()).resolves.toBe(false);
  });
});
