// ---------------------------------------------------------------------------
// Dynamic planner: Analyze-Intent → Build-Plan → Execute-Plan →
// Assess-Completeness
// ---------------------------------------------------------------------------

import { FlowBuilder } from "../src";
import { withCurrentStep, withStepLogging } from "../plugins";
import { classifyIntent, type HistoryEntry } from "./intent";
import { buildProvenance } from "./provenance";
import { STAGES, type StageContext } from "./stages";
import type { CapabilityId } from "./capabilities";
import {
  UNKNOWN_PLANT,
  WEATHER_NO_LOCATION,
  recordIssue,
  setOnce,
  type TurnState,
} from "./state";
import {
  assessCompleteness,
  buildPlan,
  checkPreconditions,
  executionWaves,
  unsatisfiedRequirements,
  type ExecutionPlan,
  type PlanningRecord,
  type Task,
} from "./tasks";

export const INCOMPLETE_RESPONSE =
  "I apologize, but I was unable to provide a complete response to your query.";

/**
 * Whether a capability that returned without failing produced what its
 * fallbacks stand in for. An identification below the confidence floor
 * succeeds but names no plant.
 */
function fulfilled(capability: CapabilityId, state: TurnState): boolean {
  if (state.failedCapabilities.has(capability)) return false;
  if (capability === "identify") return state.identifiedPlant?.identified === true;
  return true;
}

/**
 * Run one task: re-check every precondition, invoke the capability's stage,
 * record the outcome, and activate reserved fallbacks if it failed or came
 * back empty-handed.
 */
async function runTask(
  task: Task,
  plan: ExecutionPlan,
  state: TurnState,
  record: PlanningRecord,
  ctx: StageContext,
  fallback = false,
): Promise<void> {
  const { capability } = task;

  if (state.failedCapabilities.has(capability) || state.invocations[capability]) {
    record.runs.push({ capability, status: "skipped", fallback, reason: "already ran" });
    return;
  }

  const unmet = checkPreconditions(task.preconditions, state);
  if (unmet.length > 0) {
    const reason = `unmet: ${unmet.join(", ")}`;
    record.runs.push({ capability, status: "skipped", fallback, reason });
    if (task.required) {
      recordIssue(state, "plan_unsatisfiable", `${capability} skipped (${reason})`, {
        capability,
      });
    }
    return;
  }

  await STAGES[capability](state, ctx);
  const failed = state.failedCapabilities.has(capability);
  record.runs.push({ capability, status: failed ? "failed" : "ok", fallback });

  if (fulfilled(capability, state)) return;
  for (const substitute of plan.reserve.filter((t) => t.fallbackFor === capability)) {
    ctx.logger.debug("activating fallback", {
      capability: substitute.capability,
      fallbackFor: capability,
    });
    await runTask(substitute, plan, state, record, ctx, true);
  }
}

/**
 * Ungrouped tasks run one at a time in priority order; each parallel group
 * runs as one settled fan-out at the position of its earliest member.
 */
export async function executePlan(
  plan: ExecutionPlan,
  state: TurnState,
  record: PlanningRecord,
  ctx: StageContext,
  signal?: AbortSignal,
): Promise<void> {
  const flow = new FlowBuilder<TurnState>()
    .use(withStepLogging(ctx.logger))
    .use(withCurrentStep());

  for (const wave of executionWaves(plan.tasks)) {
    const [first] = wave;
    if (!first) continue;
    if (first.parallelGroup) {
      flow.parallel(
        wave.map((t) => (s: TurnState) => runTask(t, plan, s, record, ctx)),
        { settle: true, label: first.parallelGroup },
      );
    } else {
      flow.then((s) => runTask(first, plan, s, record, ctx), { label: first.capability });
    }
  }

  await flow.run(state, undefined, { signal });
}

export interface PlannerRequest {
  history?: HistoryEntry[];
  /** Checked before classification and between plan steps. */
  signal?: AbortSignal;
}

/** Run the planner strategy over one turn's state. */
export async function runPlanner(
  state: TurnState,
  ctx: StageContext,
  request: PlannerRequest = {},
): Promise<void> {
  const { config, logger } = ctx;
  request.signal?.throwIfAborted();

  state.currentStep = "analyze_intent";
  const intent = await classifyIntent(
    {
      query: state.input.query,
      hasImage: Boolean(state.input.image),
      hasLocation: Boolean(state.input.location?.trim()),
      history: request.history,
    },
    { llm: ctx.llm, minConfidence: config.minIntentConfidence, logger },
  );
  if (intent.ambiguity) {
    recordIssue(state, "classification_ambiguous", intent.ambiguity);
  }
  logger.info("intent classified", {
    intent: intent.intent,
    confidence: intent.confidence,
  });

  const record: PlanningRecord = {
    intent: intent.intent,
    intentConfidence: intent.confidence,
    plans: [],
    runs: [],
  };
  state.planning = record;

  // No template can fetch weather without a location.
  if (!state.input.location?.trim()) {
    setOnce(state, "weather", { kind: "error", error: WEATHER_NO_LOCATION });
  }

  // One pass unless configured otherwise; later passes only pick up tasks
  // that have not run yet.
  for (let pass = 1; pass <= config.planningPasses; pass++) {
    state.currentStep = "build_plan";
    const plan = buildPlan(intent.intent, state, {
      completenessThreshold: config.completenessThreshold,
      maxIterations: config.planningPasses,
    });
    record.plans.push(plan);
    for (const { task, reason } of unsatisfiedRequirements(plan)) {
      recordIssue(state, "plan_unsatisfiable", `${task.capability} excluded (${reason})`, {
        capability: task.capability,
      });
    }
    logger.debug("plan built", {
      pass,
      template: plan.template,
      tasks: plan.tasks.map((t) => t.capability),
      reserve: plan.reserve.map((t) => t.capability),
    });

    await executePlan(plan, state, record, ctx, request.signal);

    state.currentStep = "assess_completeness";
    record.completeness = assessCompleteness(
      intent.intent,
      state,
      config.completenessThreshold,
    );
    if (record.completeness.complete || plan.tasks.length === 0) break;
  }

  setOnce(state, "identifiedPlant", { ...UNKNOWN_PLANT });
  setOnce(state, "finalResponse", INCOMPLETE_RESPONSE);
  setOnce(state, "provenance", buildProvenance(state));
}
