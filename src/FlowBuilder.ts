// ---------------------------------------------------------------------------
// Flow engine — FlowBuilder class
// ---------------------------------------------------------------------------

import type {
  FlowHooks,
  FlowParams,
  NodeFn,
  NodeOptions,
  ParallelOptions,
  RouterFn,
  RunOptions,
  StepMeta,
} from "./types";
import type { ParallelStep, Step } from "./steps";
import { FlowError, TimeoutError } from "./errors";

// ---------------------------------------------------------------------------
// Hook cache
// ---------------------------------------------------------------------------

type ResolvedHooks<S, P extends FlowParams> = {
  [K in keyof FlowHooks<S, P>]-?: NonNullable<FlowHooks<S, P>[K]>[];
};

function buildHookCache<S, P extends FlowParams>(
  list: FlowHooks<S, P>[],
): ResolvedHooks<S, P> {
  const cache: ResolvedHooks<S, P> = {
    beforeFlow: [],
    beforeStep: [],
    wrapStep: [],
    afterStep: [],
    onError: [],
    afterFlow: [],
  };
  for (const h of list) {
    if (h.beforeFlow) cache.beforeFlow.push(h.beforeFlow);
    if (h.beforeStep) cache.beforeStep.push(h.beforeStep);
    if (h.wrapStep) cache.wrapStep.push(h.wrapStep);
    if (h.afterStep) cache.afterStep.push(h.afterStep);
    if (h.onError) cache.onError.push(h.onError);
    if (h.afterFlow) cache.afterFlow.push(h.afterFlow);
  }
  return cache;
}

// ---------------------------------------------------------------------------
// Pure utility functions
// ---------------------------------------------------------------------------

/**
 * Race `fn` against a timer. Rejects with `TimeoutError` when the timer
 * wins; the timer is always cleared.
 */
export function withTimeout<T>(
  ms: number,
  fn: () => Promise<T>,
  what = "step",
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  return Promise.race([
    fn().finally(() => clearTimeout(timer)),
    new Promise<T>((_, reject) => {
      timer = setTimeout(() => reject(new TimeoutError(what, ms)), ms);
    }),
  ]);
}

function describeStep<S, P extends FlowParams>(
  step: Step<S, P>,
  index: number,
): string {
  if (step.label) return `"${step.label}" (step ${index})`;
  return step.type === "fn" ? `step ${index}` : `${step.type} (step ${index})`;
}

// ---------------------------------------------------------------------------
// FlowBuilder
// ---------------------------------------------------------------------------

/**
 * Fluent builder for composable flows.
 *
 * Steps execute sequentially in the order added. Call `.run(shared)` to
 * execute. All steps operate on the same shared object: mutate it directly
 * rather than replacing it.
 */
export class FlowBuilder<S, P extends FlowParams = FlowParams> {
  private steps: Step<S, P>[] = [];

  private hooksList: FlowHooks<S, P>[] = [];
  private hooksCache: ResolvedHooks<S, P> | null = null;

  // -------------------------------------------------------------------------
  // Hooks & plugins
  // -------------------------------------------------------------------------

  private hooks(): ResolvedHooks<S, P> {
    return (this.hooksCache ??= buildHookCache(this.hooksList));
  }

  /**
   * Register a plugin — any set of lifecycle hooks. Plugins apply to this
   * instance only, in registration order.
   *
   * @example
   * new FlowBuilder<TurnState>()
   *   .use(withStepLogging(logger))
   *   .use(withRateLimit({ intervalMs: 500 }))
   */
  use(hooks: FlowHooks<S, P>): this {
    this.hooksList.push(hooks);
    this.hooksCache = null;
    return this;
  }

  // -------------------------------------------------------------------------
  // Builder API
  // -------------------------------------------------------------------------

  /** Append a sequential step. */
  then(fn: NodeFn<S, P>, options?: NodeOptions): this {
    this.steps.push({ type: "fn", fn, ...this.baseOptions(options) });
    return this;
  }

  /**
   * Append a routing step.
   * `router` returns a key; the matching branch (or `"default"`) executes,
   * then the chain continues. A key without a branch is a no-op.
   */
  branch(
    router: RouterFn<S, P>,
    branches: Record<string, NodeFn<S, P>>,
    options?: NodeOptions,
  ): this {
    this.steps.push({
      type: "branch",
      router,
      branches,
      ...this.baseOptions(options),
    });
    return this;
  }

  /**
   * Append a parallel step. Runs all `fns` concurrently against the same
   * shared state; each fn merges its own results as it completes.
   */
  parallel(fns: NodeFn<S, P>[], options?: ParallelOptions): this {
    this.steps.push({
      type: "parallel",
      fns,
      settle: options?.settle ?? false,
      ...this.baseOptions(options),
    });
    return this;
  }

  /** Number of steps currently in the chain. */
  get size(): number {
    return this.steps.length;
  }

  // -------------------------------------------------------------------------
  // Execution API
  // -------------------------------------------------------------------------

  /** Execute the flow. */
  async run(shared: S, params?: P, options?: RunOptions): Promise<void> {
    const p = params ?? ({} as P);
    const hooks = this.hooks();
    for (const h of hooks.beforeFlow) await h(shared, p);
    try {
      await this.execute(shared, p, options?.signal);
    } finally {
      for (const h of hooks.afterFlow) await h(shared, p);
    }
  }

  // -------------------------------------------------------------------------
  // Internal execution engine
  // -------------------------------------------------------------------------

  protected async execute(
    shared: S,
    params: P,
    signal?: AbortSignal,
  ): Promise<void> {
    const hooks = this.hooks();

    for (let i = 0; i < this.steps.length; i++) {
      signal?.throwIfAborted();

      const step = this.steps[i];
      if (!step) continue;
      const meta: StepMeta = { index: i, type: step.type, label: step.label };

      try {
        for (const h of hooks.beforeStep) await h(meta, shared, params);
        await this.runStep(step, meta, shared, params, hooks);
        for (const h of hooks.afterStep) await h(meta, shared, params);
      } catch (err) {
        for (const h of hooks.onError) h(meta, err, shared, params);
        if (err instanceof FlowError) throw err;
        throw new FlowError(describeStep(step, i), err);
      }
    }
  }

  /** Apply `wrapStep` middleware around a single step. */
  private async runStep(
    step: Step<S, P>,
    meta: StepMeta,
    shared: S,
    params: P,
    hooks: ResolvedHooks<S, P>,
  ): Promise<void> {
    const execute = () => this.dispatchStep(step, meta, shared, params, hooks);
    const wrapped = hooks.wrapStep.reduceRight<() => Promise<void>>(
      (next, wrap) => () => wrap(meta, next, shared, params),
      execute,
    );
    await wrapped();
  }

  /** Pure step dispatch, no `wrapStep`. */
  private async dispatchStep(
    step: Step<S, P>,
    meta: StepMeta,
    shared: S,
    params: P,
    hooks: ResolvedHooks<S, P>,
  ): Promise<void> {
    switch (step.type) {
      case "fn": {
        await step.fn(shared, params);
        return;
      }

      case "branch": {
        const action = await step.router(shared, params);
        const fn = step.branches[action ?? "default"] ?? step.branches["default"];
        if (fn) await fn(shared, params);
        return;
      }

      case "parallel": {
        await this.runParallel(step, meta, shared, params, hooks);
        return;
      }
    }
  }

  private async runParallel(
    step: ParallelStep<S, P>,
    meta: StepMeta,
    shared: S,
    params: P,
    hooks: ResolvedHooks<S, P>,
  ): Promise<void> {
    const outcomes = await Promise.allSettled(
      step.fns.map(async (fn) => fn(shared, params)),
    );

    let firstFailure: PromiseRejectedResult | undefined;
    for (const [fnIndex, outcome] of outcomes.entries()) {
      if (outcome.status === "fulfilled") continue;
      firstFailure ??= outcome;
      if (!step.settle) continue;
      for (const h of hooks.onError)
        h({ ...meta, fnIndex }, outcome.reason, shared, params);
    }

    if (firstFailure && !step.settle) throw firstFailure.reason;
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private baseOptions(options?: NodeOptions) {
    return { label: options?.label };
  }
}
