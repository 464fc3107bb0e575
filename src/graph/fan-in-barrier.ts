// =============================================================================
// FanInBarrier — Per-run set-completion barrier for one fan-in join
// =============================================================================

import { DuplicateDeliveryError, RoutingError } from "../errors.js";
import type { Envelope, ExecutorId } from "./envelope.js";
import type { FanInEdge } from "./topology.js";

export class FanInBarrier<P> {
  private readonly received = new Map<ExecutorId, Envelope<P>>();
  private fired = false;

  constructor(private readonly join: FanInEdge) {}

  get joinId(): ExecutorId {
    return this.join.to;
  }

  get isFired(): boolean {
    return this.fired;
  }

  /** Delivered at least once but not yet complete. */
  get isPartial(): boolean {
    return !this.fired && this.received.size > 0;
  }

  /** Declared predecessors that have not delivered yet, in declared order. */
  get missing(): ExecutorId[] {
    return this.join.from.filter((id) => !this.received.has(id));
  }

  /**
   * Records one arrival. Returns the batch, in declared-predecessor order, for
   * the arrival that completes the set; `undefined` otherwise. Synchronous, so
   * exactly one arrival can complete it.
   */
  offer(envelope: Envelope<P>): ReadonlyArray<Envelope<P>> | undefined {
    if (!this.join.from.includes(envelope.source)) {
      throw new RoutingError(
        envelope.source,
        this.join.to,
        `not a declared predecessor of join [${this.join.from.join(", ")}]`,
      );
    }
    if (this.fired || this.received.has(envelope.source)) {
      throw new DuplicateDeliveryError(this.join.to, envelope.source);
    }

    this.received.set(envelope.source, envelope);
    if (this.received.size < this.join.from.length) return undefined;

    this.fired = true;
    const batch = this.join.from.map((id) => this.received.get(id)).filter(isEnvelope);
    this.received.clear();
    return Object.freeze(batch);
  }
}

function isEnvelope<P>(value: Envelope<P> | undefined): value is Envelope<P> {
  return value !== undefined;
}
