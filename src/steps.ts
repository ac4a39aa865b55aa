// ---------------------------------------------------------------------------
// Flow engine — internal step representations
// ---------------------------------------------------------------------------

import type { FlowParams, NodeFn, RouterFn } from "./types";

interface StepBase {
  label?: string;
}

export interface FnStep<S, P extends FlowParams> extends StepBase {
  type: "fn";
  fn: NodeFn<S, P>;
}

export interface BranchStep<S, P extends FlowParams> extends StepBase {
  type: "branch";
  router: RouterFn<S, P>;
  branches: Record<string, NodeFn<S, P>>;
}

export interface ParallelStep<S, P extends FlowParams> extends StepBase {
  type: "parallel";
  fns: NodeFn<S, P>[];
  settle: boolean;
}

export type Step<S, P extends FlowParams> =
  | FnStep<S, P>
  | BranchStep<S, P>
  | ParallelStep<S, P>;
