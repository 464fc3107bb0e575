// =============================================================================
// WorkflowTopology — Immutable executors + edges, shared by every run
// =============================================================================

import type { ExecutorId } from "./envelope.js";
import type { Executor } from "./executor.js";
import type { SwitchRouter } from "./switch-router.js";

export interface DirectEdge {
  readonly kind: "direct";
  readonly from: ExecutorId;
  readonly to: ExecutorId;
}

export interface FanOutEdge {
  readonly kind: "fan-out";
  readonly from: ExecutorId;
  readonly to: readonly ExecutorId[];
}

export interface FanInEdge {
  readonly kind: "fan-in";
  /** Declared predecessor order; the batch handed to `to` follows it. */
  readonly from: readonly ExecutorId[];
  readonly to: ExecutorId;
}

export interface SwitchEdge<P> {
  readonly kind: "switch";
  readonly from: ExecutorId;
  readonly router: SwitchRouter<P>;
}

export type Edge<P> = DirectEdge | FanOutEdge | FanInEdge | SwitchEdge<P>;

export function describeEdge<P>(edge: Edge<P>): string {
  switch (edge.kind) {
    case "direct":
      return `edge ${edge.from} -> ${edge.to}`;
    case "fan-out":
      return `fan-out ${edge.from} -> [${edge.to.join(", ")}]`;
    case "fan-in":
      return `fan-in [${edge.from.join(", ")}] -> ${edge.to}`;
    case "switch": {
      const cases = edge.router.cases.map((c) => c.to).join(", ");
      return `switch ${edge.from} -> [${cases}${cases ? " | " : ""}default ${edge.router.defaultTarget}]`;
    }
  }
}

/** Executors an edge can deliver to. */
export function edgeTargets<P>(edge: Edge<P>): ExecutorId[] {
  switch (edge.kind) {
    case "direct":
    case "fan-in":
      return [edge.to];
    case "fan-out":
      return [...edge.to];
    case "switch":
      return edge.router.targets;
  }
}

/** Executors whose output travels along an edge. */
export function edgeSources<P>(edge: Edge<P>): readonly ExecutorId[] {
  return edge.kind === "fan-in" ? edge.from : [edge.from];
}

export class WorkflowTopology<P, O> {
  private readonly executors: ReadonlyMap<ExecutorId, Executor<P, O>>;
  private readonly outbound = new Map<ExecutorId, Edge<P>[]>();
  private readonly joins = new Map<ExecutorId, FanInEdge>();

  constructor(
    readonly name: string,
    readonly startId: ExecutorId,
    executors: ReadonlyArray<Executor<P, O>>,
    readonly edges: ReadonlyArray<Edge<P>>,
  ) {
    this.executors = new Map(executors.map((e) => [e.id, e]));
    for (const edge of edges) {
      for (const source of edgeSources(edge)) {
        const list = this.outbound.get(source) ?? [];
        list.push(edge);
        this.outbound.set(source, list);
      }
      if (edge.kind === "fan-in") this.joins.set(edge.to, edge);
    }
    Object.freeze(this.edges);
  }

  get executorIds(): ExecutorId[] {
    return [...this.executors.keys()];
  }

  executor(id: ExecutorId): Executor<P, O> | undefined {
    return this.executors.get(id);
  }

  /** Edges leaving `id`, in declaration order. Fan-in edges are listed under each predecessor. */
  edgesFrom(id: ExecutorId): ReadonlyArray<Edge<P>> {
    return this.outbound.get(id) ?? [];
  }

  /** The join that feeds `id`, when `id` is a fan-in target. */
  joinInto(id: ExecutorId): FanInEdge | undefined {
    return this.joins.get(id);
  }

  get fanIns(): FanInEdge[] {
    return [...this.joins.values()];
  }
}
