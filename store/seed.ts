import { z } from "zod";
import starter from "../data/starterKnowledge.json";
import type { SemanticStore } from "./types";

const starterSchema = z.array(
  z.object({
    text: z.string(),
    plant_name: z.string(),
    source: z.string(),
    type: z.string(),
  }),
);

/** Append the bundled starter care documents. Returns how many were written. */
export async function seedDefaultKnowledge(store: SemanticStore): Promise<number> {
  let written = 0;
  for (const doc of starterSchema.parse(starter)) {
    const { text, ...metadata } = doc;
    if (await store.append(text, metadata)) written++;
  }
  return written;
}
