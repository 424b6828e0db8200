import { describe, it, expect } from "vitest";
import { IntegrityError } from "@factvault/errors";
import type { DocumentRow } from "@factvault/types";
import {
  InMemoryVectorStore,
  PgVectorStore,
  cosineSimilarity,
  createVectorStore,
  escapeLike,
  likeToRegExp,
  parseMetadata,
} from "./index.js";

function row(id: string, content: string, vector: number[], metadata = {}): DocumentRow {
  return { id, content, vector, metadata };
}

describe("Vector Store", () => {
  describe("createVectorStore factory", () => {
    it("creates an in-memory store", () => {
      const store = createVectorStore({ type: "memory", dimensions: 3 });
      expect(store).toBeInstanceOf(InMemoryVectorStore);
      expect(store.dimensions).toBe(3);
    });

    it("throws for pgvector without a db client", () => {
      expect(() => createVectorStore({ type: "pgvector", dimensions: 3 })).toThrow(
        "db client is required",
      );
    });

    it("throws for unknown type", () => {
      expect(() => createVectorStore({ type: "unknown" as "memory", dimensions: 3 })).toThrow(
        "Unknown vector store type: unknown",
      );
    });

    it("exposes the pgvector store class", () => {
      expect(PgVectorStore).toBeTypeOf("function");
    });
  });

  describe("InMemoryVectorStore", () => {
    it("returns stored documents in input order", async () => {
      const store = new InMemoryVectorStore({ dimensions: 2 });
      const stored = await store.upsert([row("b", "bee", [1, 0]), row("a", "ay", [0, 1])]);

      expect(stored.map((d) => d.id)).toEqual(["b", "a"]);
      expect(await store.count()).toBe(2);
    });

    it("replaces by id, keeping createdAt and advancing updatedAt", async () => {
      const store = new InMemoryVectorStore({ dimensions: 2 });
      const [first] = await store.upsert([row("a", "old", [1, 0], { v: 1 })]);
      const [second] = await store.upsert([row("a", "new", [0, 1], { v: 2 })]);

      expect(await store.count()).toBe(1);
      expect(second?.content).toBe("new");
      expect(second?.metadata).toEqual({ v: 2 });
      expect(second?.createdAt.getTime()).toBe(first?.createdAt.getTime());
      expect(second && first && second.updatedAt > first.updatedAt).toBe(true);
    });

    it("rejects vectors of the wrong length without writing", async () => {
      const store = new InMemoryVectorStore({ dimensions: 2 });
      await expect(
        store.upsert([row("a", "ok", [1, 0]), row("b", "bad", [1, 0, 0])]),
      ).rejects.toBeInstanceOf(IntegrityError);
      expect(await store.count()).toBe(0);
    });

    it("hands out copies", async () => {
      const store = new InMemoryVectorStore({ dimensions: 2 });
      await store.upsert([row("a", "text", [1, 0], { tag: "x" })]);

      const fetched = await store.get("a");
      if (fetched) {
        fetched.metadata.tag = "changed";
        fetched.vector[0] = 9;
      }

      const again = await store.get("a");
      expect(again?.metadata).toEqual({ tag: "x" });
      expect(again?.vector).toEqual([1, 0]);
    });

    it("deletes and reports only ids that existed", async () => {
      const store = new InMemoryVectorStore({ dimensions: 2 });
      await store.upsert([row("a", "one", [1, 0]), row("b", "two", [0, 1])]);

      expect(await store.delete(["a", "missing", "a"])).toEqual(["a"]);
      expect(await store.get("a")).toBeNull();
      expect(await store.count()).toBe(1);
    });

    it("ranks by cosine similarity, ties in insertion order", async () => {
      const store = new InMemoryVectorStore({ dimensions: 2 });
      await store.upsert([
        row("orthogonal", "o", [0, 1]),
        row("same-1", "s1", [2, 0]),
        row("diagonal", "d", [1, 1]),
        row("same-2", "s2", [1, 0]),
      ]);

      const hits = await store.similaritySearch({ vector: [1, 0], topK: 3 });

      expect(hits.map((h) => h.document.id)).toEqual(["same-1", "same-2", "diagonal"]);
      expect(hits[0]?.score).toBeCloseTo(1);
      expect(hits[2]?.score).toBeCloseTo(Math.SQRT1_2);
    });

    it("drops hits below the score threshold", async () => {
      const store = new InMemoryVectorStore({ dimensions: 2 });
      await store.upsert([row("near", "n", [1, 0]), row("far", "f", [0, 1])]);

      const hits = await store.similaritySearch({ vector: [1, 0], topK: 5, scoreThreshold: 0.5 });

      expect(hits.map((h) => h.document.id)).toEqual(["near"]);
    });

    it("matches content patterns case-insensitively in insertion order", async () => {
      const store = new InMemoryVectorStore({ dimensions: 2 });
      await store.upsert([
        row("1", "Quarterly revenue grew", [1, 0]),
        row("2", "Remote work policy", [1, 0]),
        row("3", "revenue forecast", [1, 0]),
      ]);

      const found = await store.findByContentPattern("%REVENUE%", 10);
      expect(found.map((d) => d.id)).toEqual(["1", "3"]);

      const limited = await store.findByContentPattern("%revenue%", 1);
      expect(limited.map((d) => d.id)).toEqual(["1"]);
    });

    it("lists in insertion order up to the limit", async () => {
      const store = new InMemoryVectorStore({ dimensions: 2 });
      await store.upsert([row("x", "x", [1, 0]), row("y", "y", [1, 0]), row("z", "z", [1, 0])]);
      await store.upsert([row("x", "x2", [0, 1])]);

      const listed = await store.list(2);
      expect(listed.map((d) => d.id)).toEqual(["x", "y"]);
    });

    it("is always healthy", async () => {
      const store = new InMemoryVectorStore({ dimensions: 2 });
      await store.ensureSchema();
      await expect(store.healthCheck()).resolves.toBe(true);
    });
  });

  describe("cosineSimilarity", () => {
    it("is zero when either vector has no magnitude", () => {
      expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    });

    it("is -1 for opposite vectors", () => {
      expect(cosineSimilarity([1, 0], [-3, 0])).toBeCloseTo(-1);
    });
  });

  describe("LIKE patterns", () => {
    it("escapes metacharacters", () => {
      expect(escapeLike("50%_off\\")).toBe("50\\%\\_off\\\\");
    });

    it("treats escaped metacharacters literally", () => {
      const matcher = likeToRegExp(`%${escapeLike("50%")}%`);
      expect(matcher.test("save 50% today")).toBe(true);
      expect(matcher.test("save 500 today")).toBe(false);
    });

    it("maps _ to a single character and anchors the match", () => {
      const matcher = likeToRegExp("c_t");
      expect(matcher.test("CAT")).toBe(true);
      expect(matcher.test("cart")).toBe(false);
    });

    it("lets % span line breaks", () => {
      expect(likeToRegExp("%days%").test("three\ndays a week")).toBe(true);
    });
  });

  describe("parseMetadata", () => {
    it("passes objects through", () => {
      expect(parseMetadata({ a: 1 })).toEqual({ a: 1 });
    });

    it("decodes JSON-encoded objects", () => {
      expect(parseMetadata('{"source":"handbook"}')).toEqual({ source: "handbook" });
    });

    it("keeps other strings under raw", () => {
      expect(parseMetadata("not json")).toEqual({ raw: "not json" });
      expect(parseMetadata("[1,2]")).toEqual({ raw: "[1,2]" });
    });

    it("maps null to an empty object", () => {
      expect(parseMetadata(null)).toEqual({});
    });
  });
});
