import type { Strategy } from "../utils/config";
import type { Snippet } from "../store";
import type { CapabilityId } from "./capabilities";
import type { CapabilityError, IssueKind, TurnIssue } from "./errors";
import type { Provenance } from "./provenance";
import type { PlanningRecord } from "./tasks";

// ---------------------------------------------------------------------------
// Input
// ---------------------------------------------------------------------------

export interface TurnInput {
  query: string;
  /** Base64-encoded image. */
  image?: string;
  imageDescription?: string;
  location?: string;
}

// ---------------------------------------------------------------------------
// Derived records
// ---------------------------------------------------------------------------

export interface HealthIssueRecord {
  name: string;
  probability: number;
  description?: string;
  treatment?: string;
}

export interface HealthAssessment {
  isHealthy: boolean;
  healthConfidence: number;
  diseases: HealthIssueRecord[];
  pests: HealthIssueRecord[];
}

export interface IdentifiedPlant {
  identified: boolean;
  name: string;
  scientificName: string;
  confidence: number;
  family?: string;
  commonNames: string[];
  health?: HealthAssessment;
}

export type SeverityLevel =
  | "Healthy"
  | "Low"
  | "Moderate"
  | "High"
  | "Critical"
  | "Unknown";

export interface DiseaseInfo {
  isHealthy: boolean;
  /** 1 is perfectly healthy. */
  healthScore: number;
  diseases: HealthIssueRecord[];
  pests: HealthIssueRecord[];
  severity: SeverityLevel;
  recommendations: string[];
}

/** Flattened disease or pest entry handed to advice synthesis. */
export interface HealthIssue {
  type: "disease" | "pest";
  name: string;
  probability: number;
}

export type KnowledgeSnippet = Snippet;

export interface WebSnippet {
  title: string;
  url: string;
  snippet: string;
  sourceQuery: string;
}

export interface WeatherReading {
  temperature: number;
  humidity: number;
  description: string;
}

export type WeatherRecord =
  | ({ kind: "ok" } & WeatherReading)
  | { kind: "error"; error: string };

export const WEATHER_NO_LOCATION = "Location not provided";
export const WEATHER_UNAVAILABLE = "Weather data unavailable";

export interface KeywordAnalysis {
  optimizedQuery: string;
  primaryKeywords: string[];
  secondaryKeywords: string[];
  careCategories: string[];
  /** Plant named directly in the query text, if any. */
  plantName?: string;
  source: "llm" | "heuristic";
}

export const UNKNOWN_PLANT: Readonly<IdentifiedPlant> = Object.freeze({
  identified: false,
  name: "Unknown",
  scientificName: "",
  confidence: 0,
  commonNames: [],
});

// ---------------------------------------------------------------------------
// Turn state
// ---------------------------------------------------------------------------

export type InvocationRecord =
  | { status: "ok"; durationMs: number }
  | { status: "failed"; error: string; timedOut: boolean; durationMs: number };

/**
 * Everything one turn knows. Owned by a single orchestration run and never
 * shared between concurrent turns.
 */
export interface TurnState {
  readonly turnId: string;
  readonly strategy: Strategy;
  readonly input: Readonly<TurnInput>;

  identifiedPlant?: IdentifiedPlant;
  knowledge: KnowledgeSnippet[];
  webResults: WebSnippet[];
  weather?: WeatherRecord;
  keywords?: KeywordAnalysis;
  diseaseInfo?: DiseaseInfo;

  finalResponse?: string;
  confidence: number;
  provenance?: Provenance;
  errorMessage?: string;

  currentStep?: string;
  needsWebSearch: boolean;
  feedbackScore?: number;
  feedbackComments?: string;
  storeUpdated: boolean;

  issues: TurnIssue[];
  failedCapabilities: Set<CapabilityId>;
  confidenceScores: Partial<Record<CapabilityId, number>>;
  invocations: Partial<Record<CapabilityId, InvocationRecord>>;
  planning?: PlanningRecord;
}

export function createTurnState(
  turnId: string,
  strategy: Strategy,
  input: TurnInput,
): TurnState {
  return {
    turnId,
    strategy,
    input: Object.freeze({ ...input }),
    knowledge: [],
    webResults: [],
    confidence: 0,
    needsWebSearch: false,
    storeUpdated: false,
    issues: [],
    failedCapabilities: new Set(),
    confidenceScores: {},
    invocations: {},
  };
}

// ---------------------------------------------------------------------------
// Mutation helpers
// ---------------------------------------------------------------------------

export type SingleAssignmentField =
  | "identifiedPlant"
  | "weather"
  | "diseaseInfo"
  | "keywords"
  | "finalResponse"
  | "provenance";

/** Write a single-assignment field. Returns false if it was already set. */
export function setOnce<K extends SingleAssignmentField>(
  state: TurnState,
  field: K,
  value: NonNullable<TurnState[K]>,
): boolean {
  if (state[field] !== undefined) return false;
  state[field] = value;
  return true;
}

export function recordIssue(
  state: TurnState,
  kind: IssueKind,
  message: string,
  extra: Omit<TurnIssue, "kind" | "message"> = {},
): void {
  state.issues.push({ kind, message, ...extra });
}

/** Append to the error slot; earlier messages are kept. */
export function recordError(state: TurnState, message: string): void {
  state.errorMessage = state.errorMessage
    ? `${state.errorMessage}; ${message}`
    : message;
}

export function recordSuccess(
  state: TurnState,
  id: CapabilityId,
  confidence: number,
  durationMs: number,
): void {
  state.invocations[id] = { status: "ok", durationMs };
  state.confidenceScores[id] = confidence;
}

export function recordFailure(
  state: TurnState,
  error: CapabilityError,
  durationMs: number,
  kind: IssueKind = error.kind,
): void {
  const id = error.capability;
  state.failedCapabilities.add(id);
  state.invocations[id] = {
    status: "failed",
    error: error.message,
    timedOut: error.timedOut,
    durationMs,
  };
  recordIssue(state, kind, error.message, {
    capability: id,
    timedOut: error.timedOut,
  });
  recordError(state, `${id} failed: ${error.message}`);
}

// ---------------------------------------------------------------------------
// Derived views
// ---------------------------------------------------------------------------

/** Identified name, else a name found in the query text, else "Unknown". */
export function effectivePlantName(state: TurnState): string {
  if (state.identifiedPlant?.identified) return state.identifiedPlant.name;
  return state.keywords?.plantName ?? UNKNOWN_PLANT.name;
}

export function isKnownPlant(name: string): boolean {
  return name !== UNKNOWN_PLANT.name;
}

/**
 * Disease and pest entries, preferring a dedicated health check over the
 * health assessment that came back with identification.
 */
export function collectHealthIssues(state: TurnState): HealthIssue[] {
  const source = state.diseaseInfo ?? state.identifiedPlant?.health;
  if (!source) return [];
  return [
    ...source.diseases.map((d) => ({
      type: "disease" as const,
      name: d.name,
      probability: d.probability,
    })),
    ...source.pests.map((p) => ({
      type: "pest" as const,
      name: p.name,
      probability: p.probability,
    })),
  ];
}
