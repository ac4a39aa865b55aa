// ---------------------------------------------------------------------------
// Stages shared by both strategies. Each owns the state fields it writes,
// catches every capability failure and never throws for one.
// ---------------------------------------------------------------------------

import { FlowBuilder } from "../src";
import { withRateLimit, withStepLogging } from "../plugins";
import type { LlmClient } from "../utils/callLlm";
import {
  callCapability,
  projectInput,
  type CapabilityId,
  type InvokeContext,
} from "./capabilities";
import { CapabilityError } from "./errors";
import { analyzeKeywords, heuristicKeywords } from "./keywords";
import { buildProvenance } from "./provenance";
import {
  UNKNOWN_PLANT,
  WEATHER_NO_LOCATION,
  WEATHER_UNAVAILABLE,
  effectivePlantName,
  isKnownPlant,
  recordFailure,
  recordSuccess,
  setOnce,
  type KnowledgeSnippet,
  type TurnState,
  type WebSnippet,
} from "./state";

export interface StageContext extends InvokeContext {
  llm?: LlmClient;
}

export type Stage = (state: TurnState, ctx: StageContext) => Promise<void>;

export const SYNTHESIS_APOLOGY =
  "I apologize, but I encountered an error while generating advice";

// ---------------------------------------------------------------------------
// Identify / DetectDisease
// ---------------------------------------------------------------------------

export const identifyStage: Stage = async (state, ctx) => {
  const input = projectInput("identify", state, ctx.config);
  if (!input) {
    setOnce(state, "identifiedPlant", { ...UNKNOWN_PLANT });
    return;
  }

  const out = await callCapability("identify", input, ctx);
  if (out.ok) {
    setOnce(state, "identifiedPlant", out.data);
    state.confidence = out.data.confidence;
    recordSuccess(state, "identify", out.data.confidence, out.durationMs);
  } else {
    setOnce(state, "identifiedPlant", { ...UNKNOWN_PLANT });
    recordFailure(state, out.error, out.durationMs);
  }
};

export const detectDiseaseStage: Stage = async (state, ctx) => {
  const input = projectInput("detect_disease", state, ctx.config);
  if (!input) return;

  const out = await callCapability("detect_disease", input, ctx);
  if (out.ok) {
    setOnce(state, "diseaseInfo", out.data);
    recordSuccess(state, "detect_disease", ctx.config.defaultConfidence, out.durationMs);
  } else {
    recordFailure(state, out.error, out.durationMs);
  }
};

// ---------------------------------------------------------------------------
// SearchKnowledge
// ---------------------------------------------------------------------------

/** Outcome of a stage that makes several calls to one capability. */
interface Tally {
  succeeded: number;
  lastError?: CapabilityError;
  durationMs: number;
}

/** A multi-call stage failed only if every call failed. */
function settle(
  state: TurnState,
  id: CapabilityId,
  tally: Tally,
  confidence: number,
): void {
  if (tally.succeeded > 0) {
    recordSuccess(state, id, confidence, tally.durationMs);
  } else if (tally.lastError) {
    recordFailure(state, tally.lastError, tally.durationMs);
  }
}

export const knowledgeStage: Stage = async (state, ctx) => {
  const { config } = ctx;
  if (config.useKeywordExtraction && !state.keywords) {
    const keywords = await analyzeKeywords(
      state.input.query,
      effectivePlantName(state),
      ctx,
    );
    setOnce(state, "keywords", keywords);
  }

  const input = projectInput("search_knowledge", state, config);
  if (!input) return;

  const merged: KnowledgeSnippet[] = [];
  const seen = new Set<string>();
  const tally: Tally = { succeeded: 0, durationMs: 0 };

  const search = async (query: string) => {
    const out = await callCapability("search_knowledge", { query, k: input.k }, ctx);
    tally.durationMs += out.durationMs;
    if (!out.ok) {
      tally.lastError = out.error;
      return;
    }
    tally.succeeded++;
    for (const snippet of out.data) {
      if (seen.has(snippet.content)) continue;
      seen.add(snippet.content);
      merged.push(snippet);
    }
  };

  await search(input.query);

  if (merged.length < config.minKnowledgeResults) {
    const keywords = state.keywords ?? heuristicKeywords(state.input.query);
    for (const keyword of keywords.primaryKeywords.slice(0, config.maxKeywordQueries)) {
      await search(keyword);
    }
  }

  state.knowledge = merged.slice(0, config.maxKnowledgeResults);
  state.needsWebSearch =
    config.webSearchMode === "always" ||
    state.knowledge.length < config.minKnowledgeResults;

  settle(state, "search_knowledge", tally, config.defaultConfidence);
};

// ---------------------------------------------------------------------------
// SearchWeb
// ---------------------------------------------------------------------------

const WEB_TOPICS = ["care", "watering", "light", "soil"];

/**
 * Query variants for one turn: the user's own words first, then descriptive
 * queries about the plant, then topic queries. Deduplicated, capped at
 * `maxWebQueries`.
 *
 * The planner may start web search alongside knowledge search, before
 * keyword analysis has landed, so the query text is analysed here when
 * `state.keywords` is still unset.
 */
export function buildWebQueries(state: TurnState, maxQueries: number): string[] {
  const keywords = state.keywords ?? heuristicKeywords(state.input.query);
  const plant = state.identifiedPlant?.identified
    ? state.identifiedPlant.name
    : keywords.plantName ?? UNKNOWN_PLANT.name;
  const subject = isKnownPlant(plant)
    ? plant
    : keywords.primaryKeywords.join(" ") || "plant";

  const candidates = [
    state.input.query.trim(),
    `${subject} care guide`,
    `${subject} growing conditions`,
    `how to care for ${subject}`,
    ...WEB_TOPICS.map((topic) => `${subject} ${topic} requirements`),
  ];

  const seen = new Set<string>();
  const queries: string[] = [];
  for (const q of candidates) {
    const key = q.toLowerCase();
    if (q === "" || seen.has(key)) continue;
    seen.add(key);
    queries.push(q);
  }
  return queries.slice(0, Math.max(0, maxQueries));
}

interface WebSearchRun extends Tally {
  results: WebSnippet[];
  urls: Set<string>;
}

export const webSearchStage: Stage = async (state, ctx) => {
  const queries = buildWebQueries(state, ctx.config.maxWebQueries);
  if (queries.length === 0) return;

  const run: WebSearchRun = { results: [], urls: new Set(), succeeded: 0, durationMs: 0 };
  const flow = new FlowBuilder<WebSearchRun>()
    .use(withRateLimit({ intervalMs: ctx.config.webSearchDelayMs }))
    .use(withStepLogging(ctx.logger));

  for (const query of queries) {
    flow.then(
      async (r) => {
        const out = await callCapability(
          "search_web",
          { query, maxResults: ctx.config.webResultsPerQuery },
          ctx,
        );
        r.durationMs += out.durationMs;
        if (!out.ok) {
          r.lastError = out.error;
          return;
        }
        r.succeeded++;
        for (const hit of out.data) {
          if (r.urls.has(hit.url)) continue;
          r.urls.add(hit.url);
          r.results.push({ ...hit, sourceQuery: query });
        }
      },
      { label: `search_web "${query}"` },
    );
  }

  await flow.run(run);

  state.webResults = run.results;
  settle(state, "search_web", run, ctx.config.defaultConfidence);
};

// ---------------------------------------------------------------------------
// GetWeather
// ---------------------------------------------------------------------------

export const weatherStage: Stage = async (state, ctx) => {
  const input = projectInput("get_weather", state, ctx.config);
  if (!input) {
    setOnce(state, "weather", { kind: "error", error: WEATHER_NO_LOCATION });
    return;
  }

  const out = await callCapability("get_weather", input, ctx);
  if (out.ok) {
    setOnce(state, "weather", { kind: "ok", ...out.data });
    recordSuccess(state, "get_weather", ctx.config.defaultConfidence, out.durationMs);
  } else {
    setOnce(state, "weather", { kind: "error", error: WEATHER_UNAVAILABLE });
    recordFailure(state, out.error, out.durationMs);
  }
};

// ---------------------------------------------------------------------------
// Synthesize
// ---------------------------------------------------------------------------

/**
 * Produce the final response and the provenance record. A failure here is
 * terminal: the response becomes an apology carrying the error.
 */
export const synthesizeStage: Stage = async (state, ctx) => {
  const input = projectInput("synthesize_advice", state, ctx.config);
  if (input) {
    const out = await callCapability("synthesize_advice", input, ctx);
    if (out.ok && out.data.trim() !== "") {
      setOnce(state, "finalResponse", out.data);
      recordSuccess(state, "synthesize_advice", ctx.config.defaultConfidence, out.durationMs);
    } else {
      const error = out.ok
        ? new CapabilityError("synthesize_advice", "empty response")
        : out.error;
      recordFailure(state, error, out.durationMs, "synthesis_failure");
      setOnce(state, "finalResponse", `${SYNTHESIS_APOLOGY}: ${error.message}`);
    }
  }
  setOnce(state, "provenance", buildProvenance(state));
};

/** The stage that exercises each capability. */
export const STAGES: Record<CapabilityId, Stage> = {
  identify: identifyStage,
  detect_disease: detectDiseaseStage,
  search_knowledge: knowledgeStage,
  search_web: webSearchStage,
  get_weather: weatherStage,
  synthesize_advice: synthesizeStage,
};
