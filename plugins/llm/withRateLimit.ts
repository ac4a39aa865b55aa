import type { FlowHooks, FlowParams } from "../../src";

export interface RateLimitOptions {
  /** Minimum milliseconds between the end of one step and the start of the next. */
  intervalMs: number;
}

/**
 * Enforces a minimum delay (`intervalMs` ms) between consecutive step
 * executions to avoid hammering rate-limited APIs.
 *
 * @example
 * new FlowBuilder<SearchState>().use(withRateLimit({ intervalMs: 500 }));
 */
export function withRateLimit<S, P extends FlowParams = FlowParams>(
  opts: RateLimitOptions,
): FlowHooks<S, P> {
  const { intervalMs } = opts;
  let lastStepEnd = 0;

  return {
    beforeFlow: () => {
      lastStepEnd = 0;
    },
    beforeStep: async () => {
      if (lastStepEnd > 0 && intervalMs > 0) {
        const elapsed = Date.now() - lastStepEnd;
        if (elapsed < intervalMs) {
          await new Promise<void>((r) => setTimeout(r, intervalMs - elapsed));
        }
      }
    },
    afterStep: () => {
      lastStepEnd = Date.now();
    },
    onError: () => {
      lastStepEnd = Date.now();
    },
  };
}
