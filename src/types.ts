// ---------------------------------------------------------------------------
// Flow engine — public type definitions
// ---------------------------------------------------------------------------

/**
 * Generic validator interface — structurally compatible with Zod or any
 * implementation that exposes `.parse(input)`. Used by `parseJsonOutput`.
 */
export interface Validator<T = unknown> {
  parse(input: unknown): T;
}

/** Parameters passed to every step alongside the shared state. */
export type FlowParams = Record<string, unknown>;

/**
 * Function signature for all step logic. Steps mutate `shared` directly;
 * the return value is ignored.
 */
export type NodeFn<S, P extends FlowParams = FlowParams> = (
  shared: S,
  params: P,
) => Promise<void> | void;

/**
 * Routing function for `.branch()`. Returns the key of the branch to run;
 * `undefined` selects `"default"`.
 */
export type RouterFn<S, P extends FlowParams = FlowParams> = (
  shared: S,
  params: P,
) => Promise<string | undefined> | string | undefined;

export interface NodeOptions {
  /** Human-readable step name, surfaced to hooks as `meta.label`. */
  label?: string;
}

export interface ParallelOptions extends NodeOptions {
  /**
   * Wait for every function and tolerate individual failures. Failures are
   * reported through `onError` hooks and never reject the step.
   */
  settle?: boolean;
}

export interface RunOptions {
  /** Checked before every step; an aborted signal stops the flow. */
  signal?: AbortSignal;
}

/** Metadata exposed to hooks. */
export interface StepMeta {
  index: number;
  type: "fn" | "branch" | "parallel";
  label?: string;
  /** Position inside a `.parallel()` step, set only for per-function errors. */
  fnIndex?: number;
}

/** Lifecycle hooks. Plugins are factories that return a set of these. */
export interface FlowHooks<S, P extends FlowParams = FlowParams> {
  /** Fires once before the first step runs. */
  beforeFlow?: (shared: S, params: P) => void | Promise<void>;
  beforeStep?: (meta: StepMeta, shared: S, params: P) => void | Promise<void>;
  /**
   * Wraps step execution — call `next()` to invoke the step body.
   * Multiple registrations are composed innermost-first.
   */
  wrapStep?: (
    meta: StepMeta,
    next: () => Promise<void>,
    shared: S,
    params: P,
  ) => Promise<void>;
  afterStep?: (meta: StepMeta, shared: S, params: P) => void | Promise<void>;
  onError?: (meta: StepMeta, error: unknown, shared: S, params: P) => void;
  afterFlow?: (shared: S, params: P) => void | Promise<void>;
}
