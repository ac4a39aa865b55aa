// ---------------------------------------------------------------------------
// Wiring: environment -> config -> clients -> orchestrator
// ---------------------------------------------------------------------------

import { createCapabilities } from "./capabilities";
import { PlantCareOrchestrator } from "./orchestrator";
import {
  EmbeddingSemanticStore,
  InMemorySemanticStore,
  seedDefaultKnowledge,
  type SemanticStore,
} from "./store";
import { OpenAiEmbedder, OpenAiLlmClient, type LlmClient } from "./utils/callLlm";
import { loadConfig, type AppConfig } from "./utils/config";
import { getLogger } from "./utils/logger";

export interface PlantCareApp {
  config: AppConfig;
  store: SemanticStore;
  llm?: LlmClient;
  orchestrator: PlantCareOrchestrator;
}

/**
 * Build a ready-to-use orchestrator from environment variables. Without an
 * OpenAI key the store falls back to lexical matching and keyword
 * extraction, intent and synthesis run without a model.
 */
export async function createPlantCareApp(
  env: Record<string, string | undefined> = process.env,
): Promise<PlantCareApp> {
  const config = loadConfig(env);
  const logger = getLogger();
  const { openaiApiKey, openaiModel, openaiEmbeddingModel } = config.services;

  let llm: LlmClient | undefined;
  let store: SemanticStore;
  if (openaiApiKey) {
    llm = new OpenAiLlmClient({ apiKey: openaiApiKey, model: openaiModel });
    store = new EmbeddingSemanticStore({
      embedder: new OpenAiEmbedder({ apiKey: openaiApiKey, embeddingModel: openaiEmbeddingModel }),
      logger,
    });
  } else {
    logger.warn("OPENAI_API_KEY not set; running without a language model");
    store = new InMemorySemanticStore();
  }

  const seeded = await seedDefaultKnowledge(store);
  logger.info("knowledge store ready", { documents: seeded });

  const orchestrator = new PlantCareOrchestrator({
    capabilities: createCapabilities({ services: config.services, store, llm }),
    store,
    llm,
    config: config.orchestrator,
    logger,
  });
  return { config, store, llm, orchestrator };
}
