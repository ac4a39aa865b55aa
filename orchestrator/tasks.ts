import type { CapabilityId } from "./capabilities";
import type { Intent } from "./intent";
import type { TurnState } from "./state";

// ---------------------------------------------------------------------------
// Preconditions
// ---------------------------------------------------------------------------

/**
 * `input` predicates depend only on what the user sent and are settled when
 * the plan is built. `derived` predicates depend on capability output and
 * are evaluated right before the task runs.
 */
export type PredicateScope = "input" | "derived";

interface Predicate {
  scope: PredicateScope;
  test: (state: TurnState) => boolean;
}

const hasResults = (s: TurnState) => s.knowledge.length + s.webResults.length > 0;

export const PREDICATES = {
  image_present: { scope: "input", test: (s) => Boolean(s.input.image) },
  location_present: {
    scope: "input",
    test: (s) => Boolean(s.input.location?.trim()),
  },
  no_plant_identified: {
    scope: "derived",
    test: (s) => s.identifiedPlant?.identified !== true,
  },
  has_results: { scope: "derived", test: hasResults },
  has_plant_or_results: {
    scope: "derived",
    test: (s) => s.identifiedPlant?.identified === true || hasResults(s),
  },
} satisfies Record<string, Predicate>;

export type PredicateName = keyof typeof PREDICATES;

export function checkPreconditions(
  names: readonly PredicateName[],
  state: TurnState,
  scope?: PredicateScope,
): PredicateName[] {
  return names.filter((name) => {
    const p: Predicate = PREDICATES[name];
    return (scope === undefined || p.scope === scope) && !p.test(state);
  });
}

// ---------------------------------------------------------------------------
// Task and plan model
// ---------------------------------------------------------------------------

export interface Task {
  capability: CapabilityId;
  /** Lower runs earlier. */
  priority: number;
  required: boolean;
  preconditions: readonly PredicateName[];
  /** Tasks sharing a group run concurrently. */
  parallelGroup?: string;
  /** Capability this task substitutes when that one is excluded or fails. */
  fallbackFor?: CapabilityId;
}

export type ExecutionStrategy =
  | "sequential"
  | "parallel"
  | "conditional"
  | "fallback_chain";

export interface PlanTemplate {
  strategy: ExecutionStrategy;
  tasks: readonly Task[];
}

export interface DroppedTask {
  task: Task;
  reason: string;
}

export interface ExecutionPlan {
  intent: Intent;
  template: Exclude<Intent, "unknown">;
  strategy: ExecutionStrategy;
  /** Tasks to run, ascending priority. */
  tasks: Task[];
  /** Fallbacks held back until their target fails. */
  reserve: Task[];
  dropped: DroppedTask[];
  completenessThreshold: number;
  /** Planning passes allowed for this turn. */
  maxIterations: number;
}

export type TaskRunStatus = "ok" | "failed" | "skipped";

export interface TaskRun {
  capability: CapabilityId;
  status: TaskRunStatus;
  fallback: boolean;
  reason?: string;
}

export interface CompletenessReport {
  /** Fraction of the intent's required fields that are present. */
  coverage: number;
  /** Mean capability confidence, 0.5 when nothing reported one. */
  meanConfidence: number;
  score: number;
  complete: boolean;
  missing: RequiredField[];
}

export interface PlanningRecord {
  intent: Intent;
  intentConfidence: number;
  plans: ExecutionPlan[];
  runs: TaskRun[];
  completeness?: CompletenessReport;
}

// ---------------------------------------------------------------------------
// Templates
// ---------------------------------------------------------------------------

function task(
  capability: CapabilityId,
  priority: number,
  required: boolean,
  extra: Partial<Omit<Task, "capability" | "priority" | "required">> = {},
): Task {
  return { capability, priority, required, preconditions: [], ...extra };
}

export const PLAN_TEMPLATES: Record<Exclude<Intent, "unknown">, PlanTemplate> = {
  plant_identification: {
    strategy: "fallback_chain",
    tasks: [
      task("identify", 1, true, { preconditions: ["image_present"] }),
      task("search_knowledge", 2, false, {
        fallbackFor: "identify",
        preconditions: ["no_plant_identified"],
      }),
      task("synthesize_advice", 3, true, { preconditions: ["has_plant_or_results"] }),
    ],
  },
  disease_diagnosis: {
    strategy: "parallel",
    tasks: [
      task("identify", 1, false, { preconditions: ["image_present"] }),
      task("detect_disease", 2, true, { preconditions: ["image_present"] }),
      task("search_knowledge", 3, true, { parallelGroup: "research" }),
      task("search_web", 3, false, { parallelGroup: "research" }),
      task("synthesize_advice", 4, true),
    ],
  },
  care_advice: {
    strategy: "parallel",
    tasks: [
      task("identify", 1, false, { preconditions: ["image_present"] }),
      task("search_knowledge", 2, true, { parallelGroup: "research" }),
      task("search_web", 2, false, { parallelGroup: "research" }),
      task("get_weather", 2, false, {
        parallelGroup: "research",
        preconditions: ["location_present"],
      }),
      task("synthesize_advice", 3, true),
    ],
  },
  watering_schedule: {
    strategy: "parallel",
    tasks: [
      task("identify", 1, false, { preconditions: ["image_present"] }),
      task("search_knowledge", 2, true, { parallelGroup: "context" }),
      task("get_weather", 2, false, {
        parallelGroup: "context",
        preconditions: ["location_present"],
      }),
      task("search_web", 3, false, { fallbackFor: "search_knowledge" }),
      task("synthesize_advice", 4, true),
    ],
  },
  general_info: {
    strategy: "sequential",
    tasks: [
      task("search_knowledge", 1, true),
      task("search_web", 2, false),
      task("synthesize_advice", 3, true),
    ],
  },
  troubleshooting: {
    strategy: "conditional",
    tasks: [
      task("identify", 1, false, { preconditions: ["image_present"] }),
      task("detect_disease", 2, false, { preconditions: ["image_present"] }),
      task("search_knowledge", 3, true, { parallelGroup: "research" }),
      task("search_web", 3, false, { parallelGroup: "research" }),
      task("synthesize_advice", 4, true, { preconditions: ["has_results"] }),
    ],
  },
  seasonal_care: {
    strategy: "parallel",
    tasks: [
      task("get_weather", 1, false, {
        parallelGroup: "seasonal",
        preconditions: ["location_present"],
      }),
      task("search_knowledge", 1, true, { parallelGroup: "seasonal" }),
      task("search_web", 1, false, { parallelGroup: "seasonal" }),
      task("synthesize_advice", 2, true),
    ],
  },
};

/** `unknown` intents are served by the general information template. */
export function templateFor(intent: Intent): Exclude<Intent, "unknown"> {
  return intent === "unknown" ? "general_info" : intent;
}

// ---------------------------------------------------------------------------
// Plan building
// ---------------------------------------------------------------------------

export interface BuildPlanOptions {
  completenessThreshold: number;
  maxIterations: number;
}

/**
 * Filter an intent's template against the turn. Capabilities that already
 * ran (or failed) this turn are excluded; input-scoped preconditions decide
 * inclusion; fallbacks replace excluded targets or wait in reserve.
 */
export function buildPlan(
  intent: Intent,
  state: TurnState,
  options: BuildPlanOptions,
): ExecutionPlan {
  const templateName = templateFor(intent);
  const template = PLAN_TEMPLATES[templateName];
  const ordered = [...template.tasks].sort((a, b) => a.priority - b.priority);

  const included = new Set<CapabilityId>();
  const tasks: Task[] = [];
  const reserve: Task[] = [];
  const dropped: DroppedTask[] = [];

  const exclusion = (t: Task): string | undefined => {
    if (state.failedCapabilities.has(t.capability))
      return "capability failed earlier this turn";
    if (state.invocations[t.capability]) return "capability already ran this turn";
    const unmet = checkPreconditions(t.preconditions, state, "input");
    return unmet.length > 0 ? `unmet: ${unmet.join(", ")}` : undefined;
  };

  for (const t of ordered.filter((t) => !t.fallbackFor)) {
    const reason = exclusion(t);
    if (reason) {
      dropped.push({ task: t, reason });
      continue;
    }
    tasks.push(t);
    included.add(t.capability);
  }

  for (const t of ordered.filter((t) => t.fallbackFor)) {
    const reason = exclusion(t);
    if (reason) {
      dropped.push({ task: t, reason });
    } else if (t.fallbackFor && !included.has(t.fallbackFor)) {
      tasks.push(t);
      included.add(t.capability);
    } else {
      reserve.push(t);
    }
  }

  tasks.sort((a, b) => a.priority - b.priority);

  return {
    intent,
    template: templateName,
    strategy: template.strategy,
    tasks,
    reserve,
    dropped,
    completenessThreshold: options.completenessThreshold,
    maxIterations: options.maxIterations,
  };
}

/**
 * Required tasks that were dropped with no fallback standing in for them.
 */
export function unsatisfiedRequirements(plan: ExecutionPlan): DroppedTask[] {
  const covered = new Set(
    [...plan.tasks, ...plan.reserve].flatMap((t) => (t.fallbackFor ? [t.fallbackFor] : [])),
  );
  return plan.dropped.filter(
    (d) => d.task.required && !d.task.fallbackFor && !covered.has(d.task.capability),
  );
}

/**
 * Group tasks into execution waves: each ungrouped task is its own wave;
 * a parallel group forms one wave at the position of its earliest member.
 */
export function executionWaves(tasks: readonly Task[]): Task[][] {
  const waves: Task[][] = [];
  const groups = new Map<string, Task[]>();
  for (const t of [...tasks].sort((a, b) => a.priority - b.priority)) {
    if (!t.parallelGroup) {
      waves.push([t]);
      continue;
    }
    const wave = groups.get(t.parallelGroup);
    if (wave) {
      wave.push(t);
    } else {
      const fresh = [t];
      groups.set(t.parallelGroup, fresh);
      waves.push(fresh);
    }
  }
  return waves;
}

// ---------------------------------------------------------------------------
// Completeness
// ---------------------------------------------------------------------------

export type RequiredField = "identified_plant" | "disease_info" | "final_response";

const REQUIRED_FIELDS: Partial<Record<Intent, RequiredField[]>> = {
  plant_identification: ["identified_plant"],
  disease_diagnosis: ["disease_info", "final_response"],
};

export function requiredFields(intent: Intent): RequiredField[] {
  return REQUIRED_FIELDS[intent] ?? ["final_response"];
}

const FIELD_PRESENT: Record<RequiredField, (s: TurnState) => boolean> = {
  identified_plant: (s) => s.identifiedPlant?.identified === true,
  disease_info: (s) => s.diseaseInfo !== undefined,
  final_response: (s) =>
    Boolean(s.finalResponse) && !s.failedCapabilities.has("synthesize_advice"),
};

/** 0.7 × required-field coverage + 0.3 × mean capability confidence. */
export function assessCompleteness(
  intent: Intent,
  state: TurnState,
  threshold: number,
): CompletenessReport {
  const fields = requiredFields(intent);
  const missing = fields.filter((f) => !FIELD_PRESENT[f](state));
  const coverage = fields.length ? (fields.length - missing.length) / fields.length : 1;

  const scores = Object.values(state.confidenceScores).filter(
    (v): v is number => typeof v === "number",
  );
  const meanConfidence = scores.length
    ? scores.reduce((a, b) => a + b, 0) / scores.length
    : 0.5;

  const score = coverage * 0.7 + meanConfidence * 0.3;
  return { coverage, meanConfidence, score, complete: score >= threshold, missing };
}
