import type { FlatMetadata, SemanticStore, Snippet } from "./types";
import { rank, sparseCosine, termFrequencies, tokenize } from "./similarity";

interface Entry {
  content: string;
  metadata: Readonly<FlatMetadata>;
  terms: Map<string, number>;
}

export interface InMemoryStoreOptions {
  /** Results must score strictly above this. Defaults to 0 (any overlap). */
  minScore?: number;
}

/**
 * Process-local semantic store ranking documents by term-frequency cosine
 * similarity. Deterministic for a fixed set of documents.
 */
export class InMemorySemanticStore implements SemanticStore {
  private readonly entries: Entry[] = [];
  private readonly minScore: number;

  constructor(options: InMemoryStoreOptions = {}) {
    this.minScore = options.minScore ?? 0;
  }

  get size(): number {
    return this.entries.length;
  }

  async query(text: string, k: number): Promise<Snippet[]> {
    const q = termFrequencies(tokenize(text));
    const scored = this.entries.map((e, position) => ({
      entry: e,
      position,
      score: sparseCosine(q, e.terms),
    }));
    return rank(scored, k, this.minScore).map(({ entry, score }) => ({
      content: entry.content,
      metadata: { ...entry.metadata },
      score: Math.round(score * 1e6) / 1e6,
    }));
  }

  async append(text: string, metadata: FlatMetadata): Promise<boolean> {
    if (text.trim() === "") return false;
    this.entries.push({
      content: text,
      metadata: Object.freeze({ ...metadata }),
      terms: termFrequencies(tokenize(text)),
    });
    return true;
  }
}
