// ── Flow engine ─────────────────────────────────────────────────────────────

export { FlowBuilder, FlowError, TimeoutError, withTimeout } from "./src";
export type {
  FlowHooks,
  FlowParams,
  NodeFn,
  NodeOptions,
  RunOptions,
  StepMeta,
  Validator,
} from "./src";

// ── Plugins ─────────────────────────────────────────────────────────────────

export {
  graph,
  FlowGraph,
  withStepLogging,
  withCurrentStep,
  withRateLimit,
  parseJsonOutput,
} from "./plugins";
export type { RateLimitOptions, StepTracking } from "./plugins";

// ── Orchestration ───────────────────────────────────────────────────────────

export * from "./orchestrator";

// ── Capabilities & knowledge ────────────────────────────────────────────────

export * from "./capabilities";
export * from "./store";

// ── Configuration, LLM, logging ─────────────────────────────────────────────

export { createPlantCareApp } from "./bootstrap";
export type { PlantCareApp } from "./bootstrap";
export { OpenAiEmbedder, OpenAiLlmClient } from "./utils/callLlm";
export type { CompleteOptions, Embedder, LlmClient } from "./utils/callLlm";
export {
  STRATEGIES,
  WEB_SEARCH_MODES,
  loadConfig,
  resolveOrchestratorConfig,
} from "./utils/config";
export type {
  AppConfig,
  OrchestratorConfig,
  OrchestratorConfigInput,
  ServiceKeys,
  Strategy,
  WebSearchMode,
} from "./utils/config";
export { getLogger } from "./utils/logger";
