import { describe, it, expect, vi } from "vitest";
import {
  EmbeddingRequestError,
  EmbeddingUnavailableError,
  ExternalServiceError,
  PersistenceError,
  ValidationError,
} from "@factvault/errors";
import { Embedder, HashingEmbeddingProvider } from "@factvault/embeddings";
import { InMemoryVectorStore } from "@factvault/vector-store";
import type { DocumentRow, EmbeddingResult } from "@factvault/types";
import { DocumentStore } from "./document-store.js";

const DIMENSIONS = 64;

function hashed(provider: HashingEmbeddingProvider, texts: string[]): EmbeddingResult {
  return {
    embeddings: texts.map((text) => provider.vectorize(text)),
    model: "hashing",
    tokensUsed: 0,
    dimensions: DIMENSIONS,
  };
}

function setup(options: { batchSize?: number; embedBatchSize?: number } = {}) {
  const provider = new HashingEmbeddingProvider({ dimensions: DIMENSIONS });
  const embedder = new Embedder({
    provider,
    batchSize: options.embedBatchSize,
    maxAttempts: 2,
    retryDelayMs: 0,
  });
  const store = new InMemoryVectorStore({ dimensions: DIMENSIONS });
  const documents = new DocumentStore({ embedder, store, batchSize: options.batchSize });
  return { provider, embedder, store, documents };
}

describe("DocumentStore", () => {
  describe("upsert", () => {
    it("stores content and metadata that get returns unchanged", async () => {
      const { documents } = setup();
      const metadata = { source: "handbook", tags: ["hr", "policy"], revision: 3, draft: false };

      await documents.upsert("policy-1", "Remote work policy allows 3 days per week", metadata);
      const fetched = await documents.get("policy-1");

      expect(fetched?.content).toBe("Remote work policy allows 3 days per week");
      expect(fetched?.metadata).toEqual(metadata);
      expect(fetched?.vector).toHaveLength(DIMENSIONS);
    });

    it("defaults metadata to an empty object", async () => {
      const { documents } = setup();
      const stored = await documents.upsert("a", "some fact");
      expect(stored.metadata).toEqual({});
    });

    it("replaces an existing id", async () => {
      const { documents } = setup();
      await documents.upsert("a", "first version", { v: 1 });
      await documents.upsert("a", "second version", { v: 2 });

      expect(await documents.count()).toBe(1);
      const fetched = await documents.get("a");
      expect(fetched?.content).toBe("second version");
      expect(fetched?.metadata).toEqual({ v: 2 });
    });

    it("rejects empty content before embedding", async () => {
      const { provider, documents } = setup();
      const embed = vi.spyOn(provider, "embed");

      const error: unknown = await documents.upsert("a", "   ").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ fields: { content: "Document content must not be empty" } });
      expect(embed).not.toHaveBeenCalled();
    });

    it("rejects an empty id", async () => {
      const { documents } = setup();
      const error: unknown = await documents.upsert("", "text").catch((e: unknown) => e);
      expect(error).toMatchObject({ fields: { id: "Document id must not be empty" } });
    });

    it("rejects metadata that is not JSON", async () => {
      const { documents } = setup();
      const error: unknown = await documents
        .upsert("a", "text", { ratio: Number.NaN })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toHaveProperty(["fields", "metadata.ratio"]);
    });

    it("surfaces embedding failure and writes nothing", async () => {
      const { provider, documents } = setup();
      vi.spyOn(provider, "embed").mockRejectedValue(new ExternalServiceError("503", "hashing"));

      await expect(documents.upsert("a", "text")).rejects.toBeInstanceOf(EmbeddingUnavailableError);
      expect(await documents.count()).toBe(0);
    });

    it("wraps a backend write failure", async () => {
      const { store, documents } = setup();
      vi.spyOn(store, "upsert").mockRejectedValue(new Error("connection reset"));

      const error: unknown = await documents.upsert("a", "text").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PersistenceError);
      expect(error).toMatchObject({
        operation: "upsert",
        message: "upsert failed: connection reset",
      });
    });
  });

  describe("upsertBatch", () => {
    it("writes only documents with content and id", async () => {
      const { documents } = setup();
      await documents.upsert("existing", "already here");

      const written = await documents.upsertBatch([
        { id: "1", content: "Quarterly revenue grew 12 percent" },
        { id: "2", content: "" },
        { id: "3", content: "Offsite budget approved", metadata: { team: "ops" } },
        { id: "", content: "orphan content" },
        { id: "5", content: "Remote work policy allows 3 days per week" },
      ]);

      expect(written.map((d) => d.id)).toEqual(["1", "3", "5"]);
      expect(await documents.count()).toBe(4);
      expect((await documents.get("3"))?.metadata).toEqual({ team: "ops" });
    });

    it("returns an empty list for an empty batch", async () => {
      const { store, documents } = setup();
      const upsert = vi.spyOn(store, "upsert");

      await expect(documents.upsertBatch([])).resolves.toEqual([]);
      expect(upsert).not.toHaveBeenCalled();
    });

    it("writes one bulk upsert per chunk", async () => {
      const { store, documents } = setup({ batchSize: 2 });
      const upsert = vi.spyOn(store, "upsert");

      await documents.upsertBatch(
        ["a", "b", "c", "d", "e"].map((id) => ({ id, content: `fact ${id}` })),
      );

      expect(upsert).toHaveBeenCalledTimes(3);
      expect(upsert.mock.calls.map(([rows]) => rows.map((row) => row.id))).toEqual([
        ["a", "b"],
        ["c", "d"],
        ["e"],
      ]);
    });

    it("keeps the last entry for an id repeated within a chunk", async () => {
      const { documents } = setup();

      const written = await documents.upsertBatch([
        { id: "a", content: "first" },
        { id: "a", content: "second" },
      ]);

      expect(written).toHaveLength(1);
      expect(written[0]?.content).toBe("second");
      expect(await documents.count()).toBe(1);
    });

    it("stops on a failed write and reports what was committed", async () => {
      const { store, documents } = setup({ batchSize: 2 });
      const original = store.upsert.bind(store);
      let calls = 0;
      vi.spyOn(store, "upsert").mockImplementation(async (rows: DocumentRow[]) => {
        calls++;
        if (calls === 2) {
          throw new Error("disk full");
        }
        return original(rows);
      });

      const error: unknown = await documents
        .upsertBatch(["a", "b", "c", "d", "e"].map((id) => ({ id, content: `fact ${id}` })))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PersistenceError);
      expect(error).toMatchObject({ operation: "upsertBatch", committed: 2 });
      expect(calls).toBe(2);
      expect(await store.count()).toBe(2);
    });

    it("stops when no document of a chunk can be embedded", async () => {
      const { provider, store, documents } = setup({ batchSize: 2 });
      vi.spyOn(provider, "batchEmbed").mockImplementation(async (texts: string[]) => {
        if (texts.includes("poison")) {
          throw new EmbeddingRequestError("input rejected", "hashing", 400);
        }
        return hashed(provider, texts);
      });

      const error: unknown = await documents
        .upsertBatch([
          { id: "a", content: "alpha" },
          { id: "b", content: "beta" },
          { id: "c", content: "poison" },
          { id: "d", content: "delta" },
        ])
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(EmbeddingUnavailableError);
      expect(error).toMatchObject({ attempts: 1, details: { committed: 2 } });
      expect(await store.count()).toBe(2);
    });

    it("writes the documents that embedded when part of a chunk fails", async () => {
      const { provider, documents } = setup({ embedBatchSize: 1 });
      vi.spyOn(provider, "batchEmbed").mockImplementation(async (texts: string[]) => {
        if (texts.includes("poison")) {
          throw new EmbeddingRequestError("input rejected", "hashing", 400);
        }
        return hashed(provider, texts);
      });

      const written = await documents.upsertBatch([
        { id: "a", content: "alpha" },
        { id: "b", content: "poison" },
        { id: "c", content: "gamma" },
      ]);

      expect(written.map((d) => d.id)).toEqual(["a", "c"]);
      expect(await documents.get("b")).toBeNull();
    });
  });

  describe("delete", () => {
    it("returns true for an existing id and removes it", async () => {
      const { documents } = setup();
      await documents.upsert("a", "text");

      await expect(documents.delete("a")).resolves.toBe(true);
      await expect(documents.get("a")).resolves.toBeNull();
    });

    it("returns false for an unknown id", async () => {
      const { documents } = setup();
      await expect(documents.delete("missing")).resolves.toBe(false);
    });

    it("wraps backend failures", async () => {
      const { store, documents } = setup();
      vi.spyOn(store, "delete").mockRejectedValue(new Error("timeout"));

      await expect(documents.delete("a")).rejects.toMatchObject({
        operation: "delete",
        message: "delete failed: timeout",
      });
    });
  });

  describe("deleteBatch", () => {
    it("counts only ids that existed", async () => {
      const { documents } = setup();
      await documents.upsertBatch([
        { id: "a", content: "one" },
        { id: "b", content: "two" },
        { id: "c", content: "three" },
      ]);

      await expect(documents.deleteBatch(["a", "zzz", "b"])).resolves.toBe(2);
      expect(await documents.count()).toBe(1);
    });

    it("returns 0 for an empty list without touching the backend", async () => {
      const { store, documents } = setup();
      const remove = vi.spyOn(store, "delete");

      await expect(documents.deleteBatch([])).resolves.toBe(0);
      expect(remove).not.toHaveBeenCalled();
    });
  });

  describe("reads", () => {
    it("wraps get and count failures", async () => {
      const { store, documents } = setup();
      vi.spyOn(store, "get").mockRejectedValue(new Error("gone"));
      vi.spyOn(store, "count").mockRejectedValue(new Error("gone"));

      await expect(documents.get("a")).rejects.toMatchObject({ operation: "get" });
      await expect(documents.count()).rejects.toBeInstanceOf(PersistenceError);
    });
  });

  it("rejects a non-positive batch size", () => {
    const embedder = new Embedder({ provider: new HashingEmbeddingProvider() });
    const store = new InMemoryVectorStore({ dimensions: 256 });
    expect(() => new DocumentStore({ embedder, store, batchSize: 0 })).toThrow(RangeError);
  });
});
