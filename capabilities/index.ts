import type { CapabilitySet } from "../orchestrator/capabilities";
import type { SemanticStore } from "../store";
import type { ServiceKeys } from "../utils/config";
import type { LlmClient } from "../utils/callLlm";
import { createAdviceSynthesizer } from "./advice";
import type { FetchFn } from "./http";
import { createKnowledgeSearch } from "./knowledge";
import { createPlantIdClient } from "./plantId";
import { createWeatherClient } from "./weather";
import { createWebSearchClient } from "./webSearch";

export interface CapabilityDeps {
  services: Partial<ServiceKeys>;
  store: SemanticStore;
  llm?: LlmClient;
  fetch?: FetchFn;
}

/**
 * Wire the production clients into a complete `CapabilitySet`. A client
 * whose key is missing still exists; it reports itself unavailable when
 * called.
 */
export function createCapabilities(deps: CapabilityDeps): CapabilitySet {
  const { services, fetch } = deps;
  const plantId = createPlantIdClient({ apiKey: services.plantIdApiKey, fetch });
  return {
    identify: plantId.identify,
    detect_disease: plantId.detectDisease,
    search_knowledge: createKnowledgeSearch(deps.store),
    search_web: createWebSearchClient({ apiKey: services.tavilyApiKey, fetch }),
    get_weather: createWeatherClient({ apiKey: services.openWeatherApiKey, fetch }),
    synthesize_advice: createAdviceSynthesizer({ llm: deps.llm }),
  };
}

export { buildAdvicePrompt, createAdviceSynthesizer } from "./advice";
export type { AdviceOptions } from "./advice";
export { requestJson, missingKey } from "./http";
export type { FetchFn, HttpOptions } from "./http";
export { createKnowledgeSearch } from "./knowledge";
export {
  MIN_IDENTIFICATION_CONFIDENCE,
  createPlantIdClient,
  healthScore,
  mapHealthAssessment,
  mapIdentification,
  recommendations,
  severityLevel,
} from "./plantId";
export type { PlantIdClient, PlantIdOptions } from "./plantId";
export { createWeatherClient } from "./weather";
export type { WeatherOptions } from "./weather";
export { createWebSearchClient } from "./webSearch";
export type { WebSearchOptions } from "./webSearch";
