// ---------------------------------------------------------------------------
// Fixed pipeline
// ---------------------------------------------------------------------------
//
//   identify → search_knowledge ─┬─[needs web search]→ web_search ─┐
//                                └────────────────────────────────┴→ get_weather
//   → synthesize → collect_feedback ─[score ≥ threshold]→ update_store
// ---------------------------------------------------------------------------

import { FlowBuilder } from "../src";
import { graph, withCurrentStep, withStepLogging, type FlowGraph } from "../plugins";
import type { SemanticStore } from "../store";
import { persistFeedback } from "./feedback";
import {
  identifyStage,
  knowledgeStage,
  synthesizeStage,
  weatherStage,
  webSearchStage,
  type StageContext,
} from "./stages";
import type { TurnState } from "./state";

export interface PipelineContext extends StageContext {
  store: SemanticStore;
}

function instrumented(ctx: StageContext): FlowBuilder<TurnState> {
  return new FlowBuilder<TurnState>()
    .use(withStepLogging(ctx.logger))
    .use(withCurrentStep());
}

/** Filled in by the update_store node of a feedback re-entry run. */
export interface FeedbackWrite {
  stored: boolean;
}

/** collect_feedback → update_store, gated on the feedback threshold. */
function addFeedbackNodes(
  g: FlowGraph<TurnState>,
  ctx: PipelineContext,
  write?: FeedbackWrite,
): FlowGraph<TurnState> {
  return g
    .addNode("collect_feedback", () => {
      // Scores arrive later through the feedback re-entry point.
    })
    .addNode("update_store", async (s) => {
      const stored = await persistFeedback(s, ctx.store, ctx.config, ctx.logger);
      if (write) write.stored = stored;
    })
    .addEdge(
      "collect_feedback",
      "update_store",
      (s) => s.feedbackScore !== undefined && s.feedbackScore >= ctx.config.feedbackThreshold,
    );
}

/** The seven-stage turn graph. */
export function buildPipeline(ctx: PipelineContext): FlowBuilder<TurnState> {
  const g = graph<TurnState>()
    .addNode("identify", (s) => identifyStage(s, ctx))
    .addNode("search_knowledge", (s) => knowledgeStage(s, ctx))
    .addNode("web_search", (s) => webSearchStage(s, ctx))
    .addNode("get_weather", (s) => weatherStage(s, ctx))
    .addNode("synthesize", (s) => synthesizeStage(s, ctx))
    .addEdge("identify", "search_knowledge")
    .addEdge("search_knowledge", "web_search", (s) => s.needsWebSearch)
    .addEdge("search_knowledge", "get_weather", (s) => !s.needsWebSearch)
    .addEdge("web_search", "get_weather")
    .addEdge("get_weather", "synthesize")
    .addEdge("synthesize", "collect_feedback");

  return addFeedbackNodes(g, ctx).compile(instrumented(ctx));
}

/** Re-entry for feedback on a finished turn: the last two stages only. */
export function buildFeedbackFlow(
  ctx: PipelineContext,
  write?: FeedbackWrite,
): FlowBuilder<TurnState> {
  return addFeedbackNodes(graph<TurnState>(), ctx, write).compile(instrumented(ctx));
}
