// =============================================================================
// Workflow — Declarative executor graph with builder API
// =============================================================================

import { WorkflowConfigSchema } from "../domain/workflow.schema.js";
import type {
  WorkflowConfig,
  WorkflowConfigInput,
  WorkflowEvent,
  WorkflowResult,
} from "../domain/workflow.schema.js";
import type { LoggingPort } from "../ports/logging.port.js";
import { ConsoleLoggingAdapter } from "../adapters/logging/console-logging.adapter.js";
import { TopologyError } from "../errors.js";
import type { ExecutorId } from "./envelope.js";
import { defineExecutor } from "./executor.js";
import type { BatchHandler, Executor, MessageHandler } from "./executor.js";
import { SwitchRouter } from "./switch-router.js";
import type { SwitchCase } from "./switch-router.js";
import { WorkflowTopology, describeEdge, edgeSources, edgeTargets } from "./topology.js";
import type { Edge } from "./topology.js";
import { WorkflowExecutor } from "./workflow-executor.js";
import type { WorkflowRun } from "./workflow-executor.js";

export class Workflow<P, O = unknown> {
  constructor(
    readonly topology: WorkflowTopology<P, O>,
    readonly config: WorkflowConfig,
    private readonly logger: LoggingPort,
  ) {}

  static create<P, O = unknown>(config?: WorkflowConfigInput): WorkflowBuilder<P, O> {
    return new WorkflowBuilder<P, O>(config);
  }

  get name(): string {
    return this.config.name;
  }

  /** Starts a run. The returned handle yields terminal outputs as they are produced. */
  run(input: P): WorkflowRun<O> {
    return new WorkflowExecutor(this.topology, this.config, this.logger).start(input);
  }

  /** Runs to completion and resolves with every yielded output. */
  async execute(input: P): Promise<WorkflowResult<O>> {
    return this.run(input).result();
  }

  /** Streams the full event log of one run. */
  async *stream(input: P): AsyncGenerator<WorkflowEvent<O>> {
    yield* this.run(input).events();
  }
}

export class WorkflowBuilder<P, O = unknown> {
  private readonly declaredExecutors: Executor<P, O>[] = [];
  private readonly declaredEdges: Edge<P>[] = [];
  private startId: ExecutorId | undefined;
  private readonly config: WorkflowConfig;
  private logger: LoggingPort | undefined;

  constructor(config?: WorkflowConfigInput) {
    this.config = WorkflowConfigSchema.parse(config ?? {});
  }

  addExecutor(executor: Executor<P, O>): this;
  addExecutor(
    id: ExecutorId,
    handlers: { handle?: MessageHandler<P, O>; handleBatch?: BatchHandler<P, O> },
  ): this;
  addExecutor(
    executorOrId: Executor<P, O> | ExecutorId,
    handlers?: { handle?: MessageHandler<P, O>; handleBatch?: BatchHandler<P, O> },
  ): this {
    this.declaredExecutors.push(
      typeof executorOrId === "string"
        ? defineExecutor<P, O>(executorOrId, handlers ?? {})
        : executorOrId,
    );
    return this;
  }

  addEdge(from: ExecutorId, to: ExecutorId): this {
    this.declaredEdges.push({ kind: "direct", from, to });
    return this;
  }

  addFanOut(from: ExecutorId, to: readonly ExecutorId[]): this {
    this.declaredEdges.push({ kind: "fan-out", from, to: [...to] });
    return this;
  }

  addFanIn(from: readonly ExecutorId[], to: ExecutorId): this {
    this.declaredEdges.push({ kind: "fan-in", from: [...from], to });
    return this;
  }

  addSwitch(from: ExecutorId, cases: ReadonlyArray<SwitchCase<P>>, defaultTarget: ExecutorId): this {
    this.declaredEdges.push({ kind: "switch", from, router: new SwitchRouter(cases, defaultTarget) });
    return this;
  }

  addConditional(from: ExecutorId, cases: ReadonlyArray<SwitchCase<P>>, defaultTarget: ExecutorId): this {
    return this.addSwitch(from, cases, defaultTarget);
  }

  setStart(id: ExecutorId): this {
    this.startId = id;
    return this;
  }

  withLogger(logger: LoggingPort): this {
    this.logger = logger;
    return this;
  }

  /** Validates every declaration; throws {@link TopologyError} and builds nothing on failure. */
  build(): Workflow<P, O> {
    const start = this.validate();
    const topology = new WorkflowTopology<P, O>(
      this.config.name,
      start,
      [...this.declaredExecutors],
      [...this.declaredEdges],
    );
    return new Workflow(
      topology,
      this.config,
      this.logger ?? new ConsoleLoggingAdapter({ level: this.config.logLevel, scope: this.config.name }),
    );
  }

  // ── Validation ──

  private validate(): ExecutorId {
    const executors = this.validateExecutors();
    const start = this.validateStart(executors);
    this.validateEdges(executors);
    this.validateRoutes();
    this.validateJoins(start);
    this.validateHandlers(executors, start);
    this.validateNoCycles(start);
    return start;
  }

  private validateExecutors(): Map<ExecutorId, Executor<P, O>> {
    const byId = new Map<ExecutorId, Executor<P, O>>();
    for (const executor of this.declaredExecutors) {
      if (byId.has(executor.id)) {
        throw new TopologyError(`executor "${executor.id}"`, "registered more than once");
      }
      byId.set(executor.id, executor);
    }
    return byId;
  }

  private validateStart(executors: Map<ExecutorId, Executor<P, O>>): ExecutorId {
    if (this.startId === undefined) {
      throw new TopologyError("start", "no start executor set");
    }
    if (!executors.has(this.startId)) {
      throw new TopologyError(`start "${this.startId}"`, "is not a registered executor");
    }
    return this.startId;
  }

  private validateEdges(executors: Map<ExecutorId, Executor<P, O>>): void {
    for (const edge of this.declaredEdges) {
      const label = describeEdge(edge);
      if (edge.kind === "fan-out" && edge.to.length === 0) {
        throw new TopologyError(label, "fan-out needs at least one target");
      }
      if (edge.kind === "fan-in" && edge.from.length === 0) {
        throw new TopologyError(label, "fan-in needs at least one predecessor");
      }
      const members = edge.kind === "fan-out" ? edge.to : edge.kind === "fan-in" ? edge.from : [];
      if (new Set(members).size !== members.length) {
        throw new TopologyError(label, "lists the same executor more than once");
      }
      for (const id of [...edgeSources(edge), ...edgeTargets(edge)]) {
        if (!executors.has(id)) {
          throw new TopologyError(label, `references unregistered executor "${id}"`);
        }
      }
    }
  }

  private validateRoutes(): void {
    const seen = new Set<string>();
    for (const edge of this.declaredEdges) {
      for (const from of edgeSources(edge)) {
        for (const to of edgeTargets(edge)) {
          const key = JSON.stringify([from, to]);
          if (seen.has(key)) {
            throw new TopologyError(describeEdge(edge), `duplicates the route "${from}" -> "${to}"`);
          }
          seen.add(key);
        }
      }
    }
  }

  private validateJoins(start: ExecutorId): void {
    const joinTargets = new Set<ExecutorId>();
    for (const edge of this.declaredEdges) {
      if (edge.kind !== "fan-in") continue;
      if (joinTargets.has(edge.to)) {
        throw new TopologyError(describeEdge(edge), `"${edge.to}" already has a fan-in`);
      }
      if (edge.to === start) {
        throw new TopologyError(describeEdge(edge), `start executor "${start}" cannot be a fan-in target`);
      }
      joinTargets.add(edge.to);
    }
    for (const edge of this.declaredEdges) {
      if (edge.kind === "fan-in") continue;
      for (const to of edgeTargets(edge)) {
        if (joinTargets.has(to)) {
          throw new TopologyError(
            describeEdge(edge),
            `"${to}" is a fan-in target and only accepts deliveries through its join`,
          );
        }
      }
    }
  }

  private validateHandlers(executors: Map<ExecutorId, Executor<P, O>>, start: ExecutorId): void {
    const single = new Set<ExecutorId>([start]);
    for (const edge of this.declaredEdges) {
      if (edge.kind === "fan-in") {
        if (!executors.get(edge.to)?.handleBatch) {
          throw new TopologyError(describeEdge(edge), `"${edge.to}" must implement handleBatch`);
        }
        continue;
      }
      for (const to of edgeTargets(edge)) single.add(to);
    }
    for (const id of single) {
      if (!executors.get(id)?.handle) {
        throw new TopologyError(`executor "${id}"`, "receives single envelopes but does not implement handle");
      }
    }
  }

  private validateNoCycles(start: ExecutorId): void {
    const successors = new Map<ExecutorId, Set<ExecutorId>>();
    for (const edge of this.declaredEdges) {
      for (const from of edgeSources(edge)) {
        const set = successors.get(from) ?? new Set<ExecutorId>();
        for (const to of edgeTargets(edge)) set.add(to);
        successors.set(from, set);
      }
    }

    const visited = new Set<ExecutorId>();
    const stack: ExecutorId[] = [];

    const visit = (id: ExecutorId): void => {
      const at = stack.indexOf(id);
      if (at >= 0) {
        const cycle = [...stack.slice(at), id].join(" -> ");
        throw new TopologyError(`cycle ${cycle}`, "graph must be acyclic from the start executor");
      }
      if (visited.has(id)) return;
      stack.push(id);
      for (const next of successors.get(id) ?? []) visit(next);
      stack.pop();
      visited.add(id);
    };

    visit(start);
  }
}
