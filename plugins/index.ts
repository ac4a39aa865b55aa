// Graph composition
export { graph, FlowGraph } from "./graph/index";
export type { EdgeCondition, GraphEdge, GraphNode } from "./graph/index";

// Observability
export { withStepLogging, withCurrentStep } from "./observability/index";
export type { StepTracking } from "./observability/index";

// LLM
export { withRateLimit } from "./llm/index";
export type { RateLimitOptions } from "./llm/index";

// Output parsing
export { parseJsonOutput } from "./output/index";
