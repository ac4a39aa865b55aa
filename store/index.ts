export { InMemorySemanticStore } from "./memoryStore";
export { EmbeddingSemanticStore } from "./embeddingStore";
export { seedDefaultKnowledge } from "./seed";
export { tokenize } from "./similarity";

export type { InMemoryStoreOptions } from "./memoryStore";
export type { EmbeddingStoreOptions } from "./embeddingStore";
export type { FlatMetadata, MetadataValue, SemanticStore, Snippet } from "./types";
