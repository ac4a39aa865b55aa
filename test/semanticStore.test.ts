import { describe, expect, test } from "vitest";
import {
  EmbeddingSemanticStore,
  InMemorySemanticStore,
  seedDefaultKnowledge,
  tokenize,
} from "../store";
import type { Embedder } from "../utils/callLlm";
import { silentLogger } from "./fakes";

describe("tokenize", () => {
  test("lower-cases and drops single characters and punctuation", () => {
    expect(tokenize("My Monstera's leaves: yellow & a bit droopy!")).toEqual([
      "my",
      "monstera",
      "leaves",
      "yellow",
      "bit",
      "droopy",
    ]);
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// InMemorySemanticStore
// ─────────────────────────────────────────────────────────────────────────────

describe("InMemorySemanticStore", () => {
  test("returns nothing from an empty store", async () => {
    const store = new InMemorySemanticStore();
    expect(await store.query("monstera watering", 5)).toEqual([]);
    expect(store.size).toBe(0);
  });

  test("ranks by similarity and drops documents with no overlap", async () => {
    const store = new InMemorySemanticStore();
    await store.append("cactus light", { plant_name: "Cactaceae" });
    await store.append("monstera watering", { plant_name: "Monstera deliciosa" });
    await store.append("orchid repotting", { plant_name: "Orchidaceae" });

    const hits = await store.query("monstera watering schedule", 5);
    expect(hits).toHaveLength(1);
    expect(hits[0]?.content).toBe("monstera watering");
    expect(hits[0]?.metadata).toEqual({ plant_name: "Monstera deliciosa" });
    // 2 shared terms / (sqrt(3) * sqrt(2))
    expect(hits[0]?.score).toBe(0.816497);
  });

  test("breaks score ties by insertion order and honours k", async () => {
    const store = new InMemorySemanticStore();
    await store.append("fern humidity", { n: 1 });
    await store.append("fern misting", { n: 2 });
    await store.append("fern light", { n: 3 });
    const hits = await store.query("fern", 2);
    expect(hits.map((h) => h.metadata.n)).toEqual([1, 2]);
  });

  test("is deterministic for the same store contents", async () => {
    const store = new InMemorySemanticStore();
    await seedDefaultKnowledge(store);
    const a = await store.query("how often to water succulents", 3);
    const b = await store.query("how often to water succulents", 3);
    expect(a).toEqual(b);
  });

  test("rejects blank documents", async () => {
    const store = new InMemorySemanticStore();
    expect(await store.append("   ", {})).toBe(false);
    expect(store.size).toBe(0);
  });

  test("appends are visible to later queries and earlier entries are unchanged", async () => {
    const store = new InMemorySemanticStore();
    const meta = { plant_name: "Rosa", feedback_score: 90 };
    await store.append("rose pruning in spring", meta);
    meta.feedback_score = 10;
    const [hit] = await store.query("rose pruning", 1);
    expect(hit?.metadata.feedback_score).toBe(90);
  });

  test("minScore filters weak matches", async () => {
    const store = new InMemorySemanticStore({ minScore: 0.5 });
    await store.append("basil needs sun and regular water in summer heat", {});
    await store.append("basil sun", {});
    const hits = await store.query("basil sun", 5);
    expect(hits.map((h) => h.content)).toEqual(["basil sun"]);
  });
});

describe("seedDefaultKnowledge", () => {
  test("writes every starter document", async () => {
    const store = new InMemorySemanticStore();
    const written = await seedDefaultKnowledge(store);
    expect(written).toBe(8);
    expect(store.size).toBe(8);
    const [top] = await store.query("succulent watering", 1);
    expect(top?.metadata.plant_name).toBe("Succulents");
    expect(top?.metadata.source).toBe("starter");
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// EmbeddingSemanticStore
// ─────────────────────────────────────────────────────────────────────────────

/** Two-dimensional "embedding": counts of "water" and "light". */
const countingEmbedder: Embedder = {
  async embed(texts) {
    return texts.map((t) => {
      const words = t.toLowerCase().split(/\W+/);
      return [
        words.filter((w) => w === "water").length,
        words.filter((w) => w === "light").length,
      ];
    });
  },
};

describe("EmbeddingSemanticStore", () => {
  test("ranks by cosine similarity of embeddings", async () => {
    const store = new EmbeddingSemanticStore({ embedder: countingEmbedder, logger: silentLogger });
    await store.append("light light", { n: 1 });
    await store.append("water water light", { n: 2 });
    await store.append("water", { n: 3 });
    const hits = await store.query("water", 2);
    expect(hits.map((h) => h.metadata.n)).toEqual([3, 2]);
    expect(hits[0]?.score).toBeCloseTo(1);
  });

  test("an embedding failure on append is reported as false", async () => {
    const failing: Embedder = {
      async embed() {
        throw new Error("quota exceeded");
      },
    };
    const store = new EmbeddingSemanticStore({ embedder: failing, logger: silentLogger });
    expect(await store.append("anything", {})).toBe(false);
    expect(store.size).toBe(0);
  });
});
