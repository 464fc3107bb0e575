// =============================================================================
// RunContext — Private state of one workflow run
// =============================================================================

import { randomUUID } from "node:crypto";
import type { RunStatus } from "../domain/workflow.schema.js";
import type { ExecutorId } from "./envelope.js";
import { FanInBarrier } from "./fan-in-barrier.js";
import type { FanInEdge, WorkflowTopology } from "./topology.js";

const TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  pending: ["running"],
  running: ["completed", "failed", "cancelled"],
  completed: [],
  failed: [],
  cancelled: [],
};

export class RunContext<P, O> {
  readonly runId = randomUUID();
  readonly startedAt = Date.now();
  readonly outputs: O[] = [];
  /** Tasks scheduled whose outbound messages have not been routed yet. */
  pending = 0;

  private current: RunStatus = "pending";
  private readonly controller = new AbortController();
  private readonly barriers = new Map<ExecutorId, FanInBarrier<P>>();

  constructor(readonly topology: WorkflowTopology<P, O>) {}

  get status(): RunStatus {
    return this.current;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** True once the run reached a final status; nothing may be scheduled afterwards. */
  get isTerminated(): boolean {
    return this.current !== "pending" && this.current !== "running";
  }

  transition(next: RunStatus): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Invalid run transition ${this.current} -> ${next}`);
    }
    this.current = next;
  }

  abort(reason: unknown): void {
    this.controller.abort(reason);
  }

  /** Barrier for `join` in this run, created on first arrival. */
  barrierFor(join: FanInEdge): FanInBarrier<P> {
    let barrier = this.barriers.get(join.to);
    if (!barrier) {
      barrier = new FanInBarrier<P>(join);
      this.barriers.set(join.to, barrier);
    }
    return barrier;
  }

  partialBarriers(): FanInBarrier<P>[] {
    return [...this.barriers.values()].filter((b) => b.isPartial);
  }
}
