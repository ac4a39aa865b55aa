import type { CapabilityId } from "./capabilities";
import type { TurnState } from "./state";

export type StepStatus = "completed" | "skipped" | "failed" | "no_results";

export type StepKey =
  | "identification"
  | "disease_detection"
  | "knowledge_base"
  | "web_search"
  | "weather"
  | "image_analysis"
  | "advice_synthesis";

export type ProvenanceDetails = Record<string, string | number | boolean>;

export interface ProvenanceStep {
  key: StepKey;
  name: string;
  status: StepStatus;
  details: ProvenanceDetails;
}

/** What the turn checked, in pipeline order. Frozen once emitted. */
export interface Provenance {
  steps: ProvenanceStep[];
  summary: string[];
  details: Partial<Record<StepKey, ProvenanceDetails>>;
}

const KNOWLEDGE_PREVIEW = 150;
const WEB_PREVIEW = 200;
const IMAGE_PREVIEW = 100;

function preview(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function invocationStatus(
  state: TurnState,
  id: CapabilityId,
  hasOutput: boolean,
): StepStatus {
  const inv = state.invocations[id];
  if (!inv) return "skipped";
  if (inv.status === "failed") return "failed";
  return hasOutput ? "completed" : "no_results";
}

function identificationStep(state: TurnState): ProvenanceStep {
  const plant = state.identifiedPlant;
  const status = invocationStatus(state, "identify", plant?.identified === true);
  const details: ProvenanceDetails = {};
  if (plant && status === "completed") {
    details.plant_name = plant.name;
    details.scientific_name = plant.scientificName || "Not available";
    details.confidence = percent(plant.confidence);
    details.health_status = plant.health
      ? plant.health.isHealthy
        ? "Healthy"
        : "Issues detected"
      : "Not assessed";
  } else if (plant && status === "no_results") {
    details.confidence = percent(plant.confidence);
  }
  return { key: "identification", name: "Plant Identification", status, details };
}

function diseaseStep(state: TurnState): ProvenanceStep {
  const info = state.diseaseInfo;
  const status = invocationStatus(state, "detect_disease", info !== undefined);
  const details: ProvenanceDetails = {};
  if (info) {
    details.is_healthy = info.isHealthy;
    details.health_score = info.healthScore;
    details.severity = info.severity;
    details.issues_found = info.diseases.length + info.pests.length;
  }
  return { key: "disease_detection", name: "Disease Detection", status, details };
}

function knowledgeStep(state: TurnState): ProvenanceStep {
  const status = invocationStatus(state, "search_knowledge", state.knowledge.length > 0);
  const details: ProvenanceDetails = {};
  if (status === "completed") {
    details.sources_found = state.knowledge.length;
    state.knowledge.slice(0, 2).forEach((k, i) => {
      details[`preview_${i + 1}`] = preview(k.content, KNOWLEDGE_PREVIEW);
    });
  }
  return { key: "knowledge_base", name: "Knowledge Base Search", status, details };
}

function webStep(state: TurnState): ProvenanceStep {
  const status = invocationStatus(state, "search_web", state.webResults.length > 0);
  const details: ProvenanceDetails = {};
  if (status === "completed") {
    details.results_found = state.webResults.length;
    state.webResults.slice(0, 2).forEach((w, i) => {
      details[`source_${i + 1}`] = `${w.title} - ${w.url}`;
      details[`snippet_${i + 1}`] = preview(w.snippet, WEB_PREVIEW);
    });
  }
  return { key: "web_search", name: "Web Research", status, details };
}

function weatherStep(state: TurnState): ProvenanceStep {
  const w = state.weather;
  const details: ProvenanceDetails = {};
  let status: StepStatus;
  if (w?.kind === "ok") {
    status = "completed";
    details.temperature = `${w.temperature}°C`;
    details.humidity = `${w.humidity}%`;
    details.description = w.description;
  } else {
    status = state.invocations.get_weather?.status === "failed" ? "failed" : "skipped";
    if (w) details.reason = w.error;
  }
  return { key: "weather", name: "Weather Analysis", status, details };
}

function imageStep(state: TurnState): ProvenanceStep {
  const { image, imageDescription } = state.input;
  const details: ProvenanceDetails = {};
  if (image) {
    details.description_available = Boolean(imageDescription);
    details.preview = imageDescription
      ? preview(imageDescription, IMAGE_PREVIEW)
      : "Image processed";
  }
  return {
    key: "image_analysis",
    name: "Image Analysis",
    status: image ? "completed" : "skipped",
    details,
  };
}

function synthesisStep(state: TurnState): ProvenanceStep {
  const status = invocationStatus(state, "synthesize_advice", Boolean(state.finalResponse));
  const sourcesCombined =
    state.knowledge.length +
    state.webResults.length +
    (state.weather?.kind === "ok" ? 1 : 0) +
    (state.input.image ? 1 : 0) +
    (state.identifiedPlant?.identified ? 1 : 0);
  const details: ProvenanceDetails = { total_sources_used: sourcesCombined };
  const inv = state.invocations.synthesize_advice;
  if (inv?.status === "failed") details.error = inv.error;
  return { key: "advice_synthesis", name: "Advice Generation", status, details };
}

function summaryLine(step: ProvenanceStep, state: TurnState): string | undefined {
  if (step.status !== "completed") return undefined;
  switch (step.key) {
    case "identification":
      return `Plant ID: ${state.identifiedPlant?.name ?? "Unknown"}`;
    case "disease_detection":
      return `Health Check: ${state.diseaseInfo?.severity ?? "Unknown"}`;
    case "knowledge_base":
      return `Knowledge Base (${state.knowledge.length} sources)`;
    case "web_search":
      return `Web Search (${state.webResults.length} results)`;
    case "weather":
      return "Weather Data";
    case "image_analysis":
      return "Image Analysis";
    case "advice_synthesis":
      return undefined;
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

/**
 * Build the provenance record from what the turn's state shows. Disease
 * detection appears only when it was invoked.
 */
export function buildProvenance(state: TurnState): Provenance {
  const steps = [
    identificationStep(state),
    ...(state.invocations.detect_disease ? [diseaseStep(state)] : []),
    knowledgeStep(state),
    webStep(state),
    weatherStep(state),
    imageStep(state),
    synthesisStep(state),
  ];

  const summary: string[] = [];
  const details: Provenance["details"] = {};
  for (const step of steps) {
    const line = summaryLine(step, state);
    if (line) summary.push(line);
    details[step.key] = step.details;
  }

  return deepFreeze({ steps, summary, details });
}
