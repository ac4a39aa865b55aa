import type { CapabilityFn } from "../orchestrator/capabilities";
import { errorMessage } from "../orchestrator/errors";
import type { SemanticStore } from "../store";

/** Nearest-neighbour lookup against the semantic store. */
export function createKnowledgeSearch(store: SemanticStore): CapabilityFn<"search_knowledge"> {
  return async ({ query, k }) => {
    try {
      return { ok: true, data: await store.query(query, k) };
    } catch (err) {
      return { ok: false, error: `Knowledge search failed: ${errorMessage(err)}` };
    }
  };
}
