// =============================================================================
// SwitchRouter — Exclusive routing over an ordered list of predicates
// =============================================================================

import type { Envelope, ExecutorId } from "./envelope.js";

/** Must be pure: evaluated at most once per envelope, in declared order. */
export type RoutePredicate<P> = (payload: P) => boolean;

export interface SwitchCase<P> {
  readonly when: RoutePredicate<P>;
  readonly to: ExecutorId;
}

export class SwitchRouter<P> {
  readonly cases: ReadonlyArray<SwitchCase<P>>;
  readonly defaultTarget: ExecutorId;

  constructor(cases: ReadonlyArray<SwitchCase<P>>, defaultTarget: ExecutorId) {
    this.cases = Object.freeze([...cases]);
    this.defaultTarget = defaultTarget;
  }

  /** Every executor this router may select, cases first, without repeats. */
  get targets(): ExecutorId[] {
    return [...new Set([...this.cases.map((c) => c.to), this.defaultTarget])];
  }

  /** First case whose predicate holds wins; otherwise the default. Always exactly one target. */
  select(envelope: Envelope<P>): ExecutorId {
    for (const c of this.cases) {
      if (c.when(envelope.payload)) return c.to;
    }
    return this.defaultTarget;
  }
}
