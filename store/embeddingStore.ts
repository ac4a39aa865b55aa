import type winston from "winston";
import type { Embedder } from "../utils/callLlm";
import { getLogger } from "../utils/logger";
import type { FlatMetadata, SemanticStore, Snippet } from "./types";
import { denseCosine, rank } from "./similarity";

interface Entry {
  content: string;
  metadata: Readonly<FlatMetadata>;
  vector: number[];
}

export interface EmbeddingStoreOptions {
  embedder: Embedder;
  /** Results must score strictly above this. */
  minScore?: number;
  logger?: winston.Logger;
}

/** Semantic store over dense embeddings, held in process memory. */
export class EmbeddingSemanticStore implements SemanticStore {
  private readonly entries: Entry[] = [];
  private readonly embedder: Embedder;
  private readonly minScore: number;
  private readonly logger: winston.Logger;

  constructor(options: EmbeddingStoreOptions) {
    this.embedder = options.embedder;
    this.minScore = options.minScore ?? 0;
    this.logger = options.logger ?? getLogger();
  }

  get size(): number {
    return this.entries.length;
  }

  async query(text: string, k: number): Promise<Snippet[]> {
    if (this.entries.length === 0) return [];
    const [vector] = await this.embedder.embed([text]);
    if (!vector) return [];
    const scored = this.entries.map((e, position) => ({
      entry: e,
      position,
      score: denseCosine(vector, e.vector),
    }));
    return rank(scored, k, this.minScore).map(({ entry, score }) => ({
      content: entry.content,
      metadata: { ...entry.metadata },
      score,
    }));
  }

  async append(text: string, metadata: FlatMetadata): Promise<boolean> {
    if (text.trim() === "") return false;
    try {
      const [vector] = await this.embedder.embed([text]);
      if (!vector) return false;
      this.entries.push({
        content: text,
        metadata: Object.freeze({ ...metadata }),
        vector,
      });
      return true;
    } catch (err) {
      this.logger.warn("embedding store append failed", {
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }
}
