import type winston from "winston";
import { z } from "zod";
import lexicon from "../data/lexicon.json";
import { parseJsonOutput } from "../plugins";
import { tokenize } from "../store";
import type { LlmClient } from "../utils/callLlm";
import { errorMessage } from "./errors";
import type { KeywordAnalysis } from "./state";

const STOPWORDS = new Set(lexicon.stopwords);
const CARE_CATEGORIES: [string, Set<string>][] = Object.entries(
  lexicon.careCategories,
).map(([category, terms]) => [category, new Set(terms)]);
const CARE_TERMS = new Set(CARE_CATEGORIES.flatMap(([, terms]) => [...terms]));
// Longest names first so "snake plant" wins over "plant"-like fragments.
const PLANT_NAMES = Object.entries(lexicon.plantNames).sort(
  ([a], [b]) => b.length - a.length,
);

const MAX_PRIMARY = 3;
const MAX_SECONDARY = 5;

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

/** Canonical plant name mentioned in free text, if the lexicon knows it. */
export function detectPlantName(text: string): string | undefined {
  const padded = ` ${tokenize(text).join(" ")} `;
  for (const [alias, canonical] of PLANT_NAMES) {
    if (padded.includes(` ${alias} `)) return canonical;
  }
  return undefined;
}

/**
 * Deterministic keyword analysis: stop-word filtering, care-category lookup
 * and plant-name detection over the query text.
 */
export function heuristicKeywords(query: string): KeywordAnalysis {
  const words = unique(tokenize(query).filter((t) => !STOPWORDS.has(t)));
  const careWords = words.filter((w) => CARE_TERMS.has(w));
  const otherWords = words.filter((w) => !CARE_TERMS.has(w));

  const primary = (careWords.length > 0 ? careWords : otherWords).slice(0, MAX_PRIMARY);
  const secondary = words.filter((w) => !primary.includes(w)).slice(0, MAX_SECONDARY);

  const careCategories = CARE_CATEGORIES.filter(([, terms]) =>
    words.some((w) => terms.has(w)),
  ).map(([category]) => category);

  return {
    optimizedQuery: words.length > 0 ? words.join(" ") : query.trim(),
    primaryKeywords: primary,
    secondaryKeywords: secondary,
    careCategories,
    plantName: detectPlantName(query),
    source: "heuristic",
  };
}

const llmKeywordsSchema = z.object({
  optimized_query: z.string().min(1),
  primary_keywords: z.array(z.string()).default([]),
  secondary_keywords: z.array(z.string()).default([]),
  care_categories: z.array(z.string()).default([]),
  plant_name: z.string().nullish(),
});

function keywordPrompt(query: string, plantName: string): string {
  return [
    "Extract search keywords from a plant care question.",
    `Question: "${query}"`,
    `Identified plant: ${plantName}`,
    "Reply with JSON only:",
    '{"optimized_query": string, "primary_keywords": string[], "secondary_keywords": string[], "care_categories": string[], "plant_name": string | null}',
    "plant_name is the plant named in the question itself, or null.",
  ].join("\n");
}

export interface KeywordOptions {
  llm?: LlmClient;
  logger: winston.Logger;
}

/**
 * Extract keywords with the language model when one is configured, falling
 * back to `heuristicKeywords` on any failure or malformed output.
 */
export async function analyzeKeywords(
  query: string,
  plantName: string,
  { llm, logger }: KeywordOptions,
): Promise<KeywordAnalysis> {
  const fallback = heuristicKeywords(query);
  if (!llm) return fallback;

  try {
    const raw = await llm.complete(keywordPrompt(query, plantName), {
      temperature: 0,
      maxTokens: 200,
    });
    const parsed = parseJsonOutput(raw, llmKeywordsSchema);
    const named = parsed.plant_name?.trim();
    return {
      optimizedQuery: parsed.optimized_query.trim(),
      primaryKeywords: parsed.primary_keywords.slice(0, MAX_PRIMARY),
      secondaryKeywords: parsed.secondary_keywords.slice(0, MAX_SECONDARY),
      careCategories: parsed.care_categories,
      plantName: named ? named : fallback.plantName,
      source: "llm",
    };
  } catch (err) {
    logger.debug("keyword extraction fell back to heuristics", {
      error: errorMessage(err),
    });
    return fallback;
  }
}
