import "dotenv/config";
import { z } from "zod";

// ---------------------------------------------------------------------------
// Orchestration parameters
// ---------------------------------------------------------------------------

export const STRATEGIES = ["fixed_pipeline", "dynamic_planner"] as const;
export type Strategy = (typeof STRATEGIES)[number];

export const WEB_SEARCH_MODES = ["conditional", "always"] as const;
export type WebSearchMode = (typeof WEB_SEARCH_MODES)[number];

const timeoutsSchema = z.object({
  identify: z.number().int().positive().default(30_000),
  detect_disease: z.number().int().positive().default(30_000),
  search_knowledge: z.number().int().positive().default(10_000),
  search_web: z.number().int().positive().default(15_000),
  get_weather: z.number().int().positive().default(10_000),
  synthesize_advice: z.number().int().positive().default(60_000),
});

const limitsSchema = z.object({
  /** Max characters of the query persisted by a feedback write. */
  query: z.number().int().positive().default(500),
  /** Max characters of the response persisted by a feedback write. */
  response: z.number().int().positive().default(2_000),
  /** Max characters of the stringified provenance details. */
  details: z.number().int().positive().default(1_000),
  comments: z.number().int().positive().default(500),
});

export const orchestratorConfigSchema = z.object({
  strategy: z.enum(STRATEGIES).default("fixed_pipeline"),
  webSearchMode: z.enum(WEB_SEARCH_MODES).default("conditional"),
  feedbackThreshold: z.number().min(0).max(100).default(70),
  completenessThreshold: z.number().min(0).max(1).default(0.8),
  minIntentConfidence: z.number().min(0).max(1).default(0.4),
  minKnowledgeResults: z.number().int().nonnegative().default(2),
  knowledgeK: z.number().int().positive().default(5),
  maxKnowledgeResults: z.number().int().positive().default(5),
  maxKeywordQueries: z.number().int().nonnegative().default(2),
  maxWebQueries: z.number().int().nonnegative().default(5),
  webResultsPerQuery: z.number().int().positive().default(3),
  webSearchDelayMs: z.number().int().nonnegative().default(500),
  defaultConfidence: z.number().min(0).max(1).default(0.8),
  planningPasses: z.number().int().positive().default(1),
  useKeywordExtraction: z.boolean().default(true),
  timeouts: timeoutsSchema.default({}),
  truncation: limitsSchema.default({}),
});

export type OrchestratorConfig = z.infer<typeof orchestratorConfigSchema>;
export type OrchestratorConfigInput = z.input<typeof orchestratorConfigSchema>;

/** Fill defaults and validate a partial orchestrator configuration. */
export function resolveOrchestratorConfig(
  input: OrchestratorConfigInput = {},
): OrchestratorConfig {
  return orchestratorConfigSchema.parse(input);
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== "" ? v.trim() : undefined));

const envSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  PLANT_ID_API_KEY: optionalString,
  OPENWEATHER_API_KEY: optionalString,
  TAVILY_API_KEY: optionalString,
  LOG_LEVEL: z.string().default("info"),
  STRATEGY: z.enum(STRATEGIES).optional(),
  WEB_SEARCH_MODE: z.enum(WEB_SEARCH_MODES).optional(),
  FEEDBACK_THRESHOLD: z.coerce.number().min(0).max(100).optional(),
  COMPLETENESS_THRESHOLD: z.coerce.number().min(0).max(1).optional(),
});

export interface ServiceKeys {
  openaiApiKey?: string;
  openaiModel: string;
  openaiEmbeddingModel: string;
  plantIdApiKey?: string;
  openWeatherApiKey?: string;
  tavilyApiKey?: string;
}

export interface AppConfig {
  services: ServiceKeys;
  logLevel: string;
  orchestrator: OrchestratorConfig;
}

/**
 * Validate the environment and build the application configuration.
 * `dotenv/config` has already merged `.env` into `process.env` on import.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;

  return {
    services: {
      openaiApiKey: e.OPENAI_API_KEY,
      openaiModel: e.OPENAI_MODEL,
      openaiEmbeddingModel: e.OPENAI_EMBEDDING_MODEL,
      plantIdApiKey: e.PLANT_ID_API_KEY,
      openWeatherApiKey: e.OPENWEATHER_API_KEY,
      tavilyApiKey: e.TAVILY_API_KEY,
    },
    logLevel: e.LOG_LEVEL,
    orchestrator: resolveOrchestratorConfig({
      strategy: e.STRATEGY,
      webSearchMode: e.WEB_SEARCH_MODE,
      feedbackThreshold: e.FEEDBACK_THRESHOLD,
      completenessThreshold: e.COMPLETENESS_THRESHOLD,
    }),
  };
}
