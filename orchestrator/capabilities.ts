import type winston from "winston";
import { TimeoutError, withTimeout } from "../src";
import type { OrchestratorConfig } from "../utils/config";
import { CapabilityError, errorMessage } from "./errors";
import {
  collectHealthIssues,
  effectivePlantName,
  type DiseaseInfo,
  type HealthIssue,
  type IdentifiedPlant,
  type KeywordAnalysis,
  type KnowledgeSnippet,
  type TurnState,
  type WeatherReading,
  type WeatherRecord,
  type WebSnippet,
} from "./state";

// ---------------------------------------------------------------------------
// Identifiers and contracts
// ---------------------------------------------------------------------------

export const CAPABILITY_IDS = [
  "identify",
  "detect_disease",
  "search_knowledge",
  "search_web",
  "get_weather",
  "synthesize_advice",
] as const;

export type CapabilityId = (typeof CAPABILITY_IDS)[number];

export type CapabilityResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: string };

export interface IdentifyInput {
  image: string;
  description?: string;
}

export interface DetectDiseaseInput {
  image: string;
  plantName: string;
  description?: string;
}

export interface SearchKnowledgeInput {
  query: string;
  k: number;
}

export interface SearchWebInput {
  query: string;
  maxResults: number;
}

export interface GetWeatherInput {
  location: string;
}

/** Everything advice synthesis sees about the turn. */
export interface AdviceContext {
  query: string;
  plant: {
    name: string;
    scientificName: string;
    confidence: number;
    identified: boolean;
  };
  healthIssues: HealthIssue[];
  diseaseInfo?: DiseaseInfo;
  knowledge: KnowledgeSnippet[];
  webResults: WebSnippet[];
  weather?: WeatherRecord;
  location?: string;
  image?: { data: string; description?: string };
  keywords?: KeywordAnalysis;
}

export interface CapabilityContracts {
  identify: { input: IdentifyInput; output: IdentifiedPlant };
  detect_disease: { input: DetectDiseaseInput; output: DiseaseInfo };
  search_knowledge: { input: SearchKnowledgeInput; output: KnowledgeSnippet[] };
  search_web: { input: SearchWebInput; output: WebSnippet[] };
  get_weather: { input: GetWeatherInput; output: WeatherReading };
  synthesize_advice: { input: AdviceContext; output: string };
}

export type CapabilityInput<K extends CapabilityId> = CapabilityContracts[K]["input"];
export type CapabilityOutput<K extends CapabilityId> = CapabilityContracts[K]["output"];

export type CapabilityFn<K extends CapabilityId> = (
  input: CapabilityInput<K>,
) => Promise<CapabilityResult<CapabilityOutput<K>>>;

/** Exactly one implementation per capability identifier. */
export type CapabilitySet = { [K in CapabilityId]: CapabilityFn<K> };

// ---------------------------------------------------------------------------
// Input projection
// ---------------------------------------------------------------------------

type Projector<K extends CapabilityId> = (
  state: TurnState,
  config: OrchestratorConfig,
) => CapabilityInput<K> | undefined;

function knowledgeQuery(state: TurnState): string {
  const text = state.keywords?.optimizedQuery || state.input.query;
  const plant = effectivePlantName(state);
  return `${plant} ${text}`.trim();
}

const projectors: { [K in CapabilityId]: Projector<K> } = {
  identify: (s) =>
    s.input.image
      ? { image: s.input.image, description: s.input.imageDescription }
      : undefined,
  detect_disease: (s) =>
    s.input.image
      ? {
          image: s.input.image,
          plantName: effectivePlantName(s),
          description: s.input.imageDescription,
        }
      : undefined,
  search_knowledge: (s, config) => ({
    query: knowledgeQuery(s),
    k: config.knowledgeK,
  }),
  search_web: (s, config) => ({
    query: s.input.query,
    maxResults: config.webResultsPerQuery,
  }),
  get_weather: (s) => {
    const location = s.input.location?.trim();
    return location ? { location } : undefined;
  },
  synthesize_advice: (s) => {
    const plant = s.identifiedPlant;
    return {
      query: s.input.query,
      plant: {
        name: effectivePlantName(s),
        scientificName: plant?.scientificName ?? "",
        confidence: plant?.confidence ?? 0,
        identified: plant?.identified ?? false,
      },
      healthIssues: collectHealthIssues(s),
      diseaseInfo: s.diseaseInfo,
      knowledge: s.knowledge,
      webResults: s.webResults,
      weather: s.weather,
      location: s.input.location,
      image: s.input.image
        ? { data: s.input.image, description: s.input.imageDescription }
        : undefined,
      keywords: s.keywords,
    };
  },
};

/**
 * Build a capability's input from turn state. Pure; `undefined` means the
 * state lacks what the capability needs (no image, no location).
 */
export function projectInput<K extends CapabilityId>(
  id: K,
  state: TurnState,
  config: OrchestratorConfig,
): CapabilityInput<K> | undefined {
  const project: Projector<K> = projectors[id];
  return project(state, config);
}

// ---------------------------------------------------------------------------
// Invocation
// ---------------------------------------------------------------------------

export interface InvokeContext {
  capabilities: CapabilitySet;
  config: OrchestratorConfig;
  logger: winston.Logger;
}

export type CallOutcome<T> =
  | { ok: true; data: T; durationMs: number }
  | { ok: false; error: CapabilityError; durationMs: number };

/**
 * Call one capability under its configured timeout. Never throws: thrown
 * errors, `ok: false` results and timeouts all come back as a failed
 * outcome carrying a `CapabilityError`.
 */
export async function callCapability<K extends CapabilityId>(
  id: K,
  input: CapabilityInput<K>,
  ctx: InvokeContext,
): Promise<CallOutcome<CapabilityOutput<K>>> {
  const fn: CapabilityFn<K> = ctx.capabilities[id];
  const timeoutMs = ctx.config.timeouts[id];
  const started = Date.now();
  ctx.logger.debug("capability call", { capability: id });

  let error: CapabilityError;
  try {
    const result = await withTimeout(timeoutMs, () => fn(input), `capability ${id}`);
    const durationMs = Date.now() - started;
    if (result.ok) {
      ctx.logger.debug("capability ok", { capability: id, durationMs });
      return { ok: true, data: result.data, durationMs };
    }
    error = new CapabilityError(id, result.error);
  } catch (err) {
    error = new CapabilityError(id, errorMessage(err), err instanceof TimeoutError);
  }

  const durationMs = Date.now() - started;
  ctx.logger.warn("capability failed", {
    capability: id,
    error: error.message,
    timedOut: error.timedOut,
    durationMs,
  });
  return { ok: false, error, durationMs };
}
