// ---------------------------------------------------------------------------
// Flow engine — src barrel
// ---------------------------------------------------------------------------

export { FlowBuilder, withTimeout } from "./FlowBuilder";
export { FlowError, TimeoutError } from "./errors";

export type { FnStep, BranchStep, ParallelStep, Step } from "./steps";

export type {
  Validator,
  FlowParams,
  NodeFn,
  RouterFn,
  NodeOptions,
  ParallelOptions,
  RunOptions,
  StepMeta,
  FlowHooks,
} from "./types";
