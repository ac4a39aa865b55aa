/** Store metadata is flat: nested structures must be serialized first. */
export type MetadataValue = string | number | boolean | null;
export type FlatMetadata = Record<string, MetadataValue>;

/** One ranked result of a similarity query. */
export interface Snippet {
  content: string;
  metadata: FlatMetadata;
  /** Similarity in [0, 1]; higher is closer. */
  score: number;
}

/**
 * Append-only, similarity-queryable text store. Queries are side-effect
 * free; appends never modify earlier entries.
 */
export interface SemanticStore {
  query(text: string, k: number): Promise<Snippet[]>;
  append(text: string, metadata: FlatMetadata): Promise<boolean>;
  /** Number of stored documents. */
  readonly size: number;
}
