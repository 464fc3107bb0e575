// =============================================================================
// WorkflowExecutor — Message-driven scheduler for one workflow run
// Uses TaskPool (bounded, one lane per executor), FanInBarrier (set completion),
// SwitchRouter (exclusive routing) and AsyncChannel (callback→AsyncIterable bridge).
// =============================================================================

import type {
  EdgeKind,
  RunStatus,
  WorkflowConfig,
  WorkflowEvent,
  WorkflowResult,
} from "../domain/workflow.schema.js";
import type { LoggingPort } from "../ports/logging.port.js";
import {
  HandlerError,
  RoutingError,
  RunCancelledError,
  RunError,
  RunTimeoutError,
  StalledRunError,
} from "../errors.js";
import { AsyncChannel } from "./async-channel.js";
import { WORKFLOW_INPUT_SOURCE, copyEnvelope, createEnvelope } from "./envelope.js";
import type { Envelope, ExecutorId } from "./envelope.js";
import type { WorkflowContext } from "./executor.js";
import { RunContext } from "./run-context.js";
import { TaskPool } from "./task-pool.js";
import type { Edge, FanInEdge, WorkflowTopology } from "./topology.js";

/** Handle on a started run. Iterating it yields terminal outputs; it can be iterated once. */
export interface WorkflowRun<O> extends AsyncIterable<O> {
  readonly runId: string;
  readonly status: RunStatus;
  /** Outputs yielded so far, including after a failure. */
  readonly outputs: readonly O[];
  /** Resolves when the run completes; rejects with the {@link RunError} that ended it. */
  result(): Promise<WorkflowResult<O>>;
  /** Full event log of the run. Single consumer. */
  events(): AsyncIterable<WorkflowEvent<O>>;
  /** Stops scheduling, aborts in-flight handlers' signal and fails the run with RunCancelledError. */
  cancel(reason?: string): void;
}

type Delivery<P> =
  | { kind: "single"; envelope: Envelope<P> }
  | { kind: "batch"; envelopes: ReadonlyArray<Envelope<P>> };

interface Outbound<P> {
  payload: P;
  target?: ExecutorId;
}

interface Invocation<P> {
  sends: Outbound<P>[];
  durationMs: number;
}

export class WorkflowExecutor<P, O> {
  constructor(
    private readonly topology: WorkflowTopology<P, O>,
    private readonly config: WorkflowConfig,
    private readonly logger: LoggingPort,
  ) {}

  start(input: P): WorkflowRun<O> {
    const execution = new RunExecution(this.topology, this.config, this.logger);
    execution.begin(input);
    return execution;
  }
}

class RunExecution<P, O> implements WorkflowRun<O> {
  private readonly run: RunContext<P, O>;
  private readonly pool: TaskPool;
  private readonly outputChannel = new AsyncChannel<O>();
  private readonly eventChannel = new AsyncChannel<WorkflowEvent<O>>();
  private readonly settled: Promise<void>;
  private markSettled: () => void = () => {};
  private failure: RunError | undefined;
  private timeoutTimer: ReturnType<typeof setTimeout> | undefined;
  private taskSeq = 0;

  constructor(
    private readonly topology: WorkflowTopology<P, O>,
    private readonly config: WorkflowConfig,
    private readonly logger: LoggingPort,
  ) {
    this.run = new RunContext(topology);
    this.pool = new TaskPool({ maxConcurrency: config.maxConcurrency });
    this.settled = new Promise<void>((resolve) => {
      this.markSettled = resolve;
    });
  }

  // ── WorkflowRun ──

  get runId(): string {
    return this.run.runId;
  }

  get status(): RunStatus {
    return this.run.status;
  }

  get outputs(): readonly O[] {
    return this.run.outputs;
  }

  [Symbol.asyncIterator](): AsyncIterator<O> {
    return this.outputChannel[Symbol.asyncIterator]();
  }

  events(): AsyncIterable<WorkflowEvent<O>> {
    return this.eventChannel;
  }

  async result(): Promise<WorkflowResult<O>> {
    await this.settled;
    if (this.failure) throw this.failure;
    return this.snapshot();
  }

  cancel(reason?: string): void {
    this.terminate(new RunCancelledError(reason), "cancelled");
  }

  // ── Lifecycle ──

  begin(input: P): void {
    const envelope = copyEnvelope(createEnvelope(WORKFLOW_INPUT_SOURCE, input));
    this.run.transition("running");
    this.emit({ type: "run:start", runId: this.runId, startExecutorId: this.topology.startId });
    this.logger.info("run started", { workflow: this.topology.name, runId: this.runId });

    const { timeoutMs } = this.config;
    if (timeoutMs !== undefined) {
      this.timeoutTimer = setTimeout(() => {
        this.terminate(new RunTimeoutError(timeoutMs), "cancelled");
      }, timeoutMs);
    }

    this.schedule(this.topology.startId, { kind: "single", envelope });
  }

  private complete(): void {
    this.run.transition("completed");
    this.clearTimer();
    this.pool.close();
    const result = this.snapshot();
    this.emit({ type: "run:complete", result });
    this.outputChannel.close();
    this.eventChannel.close();
    this.markSettled();
    this.logger.info("run completed", {
      runId: this.runId,
      outputs: result.outputs.length,
      tasks: this.pool.getMetrics().totalCompleted,
      durationMs: result.durationMs,
    });
  }

  private terminate(error: RunError, status: "failed" | "cancelled"): void {
    if (this.run.isTerminated) return;
    this.run.transition(status);
    error.attachRun(this.runId, this.run.outputs);
    this.failure = error;
    this.clearTimer();
    this.run.abort(error);
    this.pool.close();
    this.emit({
      type: "run:error",
      runId: this.runId,
      error,
      partialOutputs: [...this.run.outputs],
    });
    this.outputChannel.fail(error);
    this.eventChannel.close();
    this.markSettled();
    this.logger.error("run ended", {
      runId: this.runId,
      status,
      error: error.message,
      discardedTasks: this.pool.getMetrics().totalDiscarded,
    });
  }

  // ── Scheduling ──

  private schedule(executorId: ExecutorId, delivery: Delivery<P>): void {
    this.run.pending++;
    const taskId = `${executorId}#${++this.taskSeq}`;
    this.pool
      .submit(executorId, taskId, () => this.invoke(executorId, delivery))
      .then((invocation) => this.afterInvocation(executorId, invocation))
      .catch((error: unknown) => {
        if (this.run.isTerminated) return;
        this.terminate(error instanceof RunError ? error : new HandlerError(executorId, error), "failed");
      });
  }

  private async invoke(executorId: ExecutorId, delivery: Delivery<P>): Promise<Invocation<P> | undefined> {
    if (this.run.isTerminated) return undefined;
    const executor = this.topology.executor(executorId);
    if (!executor) {
      throw new HandlerError(executorId, new Error("executor is not registered"));
    }

    const sends: Outbound<P>[] = [];
    const ctx: WorkflowContext<P, O> = {
      runId: this.runId,
      executorId,
      signal: this.run.signal,
      logger: this.logger,
      send: (payload, options) => {
        sends.push({ payload, target: options?.target });
      },
      yieldOutput: (output) => this.publish(executorId, output),
    };

    const batchSize = delivery.kind === "batch" ? delivery.envelopes.length : undefined;
    this.emit({ type: "executor:invoked", runId: this.runId, executorId, batchSize });
    this.logger.debug("executor invoked", { runId: this.runId, executorId, batchSize });

    const startedAt = Date.now();
    try {
      if (delivery.kind === "batch") {
        if (!executor.handleBatch) throw new Error("executor cannot handle a batch");
        await executor.handleBatch(delivery.envelopes, ctx);
      } else {
        if (!executor.handle) throw new Error("executor cannot handle a single envelope");
        await executor.handle(delivery.envelope, ctx);
      }
    } catch (error) {
      throw error instanceof HandlerError ? error : new HandlerError(executorId, error);
    }
    return { sends, durationMs: Date.now() - startedAt };
  }

  private afterInvocation(executorId: ExecutorId, invocation: Invocation<P> | undefined): void {
    if (!invocation || this.run.isTerminated) return;
    this.emit({
      type: "executor:completed",
      runId: this.runId,
      executorId,
      durationMs: invocation.durationMs,
    });

    for (const outbound of invocation.sends) {
      this.dispatch(executorId, outbound);
    }

    this.run.pending--;
    if (this.run.pending === 0) this.quiesce();
  }

  private quiesce(): void {
    const [stalled] = this.run.partialBarriers();
    if (stalled) {
      this.terminate(new StalledRunError(stalled.joinId, stalled.missing), "failed");
      return;
    }
    this.complete();
  }

  // ── Routing ──

  private dispatch(source: ExecutorId, outbound: Outbound<P>): void {
    const envelope = createEnvelope(source, outbound.payload);
    const edges = this.topology.edgesFrom(source);

    if (outbound.target !== undefined) {
      this.dispatchTo(outbound.target, envelope, edges);
      return;
    }

    if (edges.length === 0) {
      this.logger.debug("payload dropped: no outgoing edge", { runId: this.runId, source });
      return;
    }

    for (const edge of edges) {
      switch (edge.kind) {
        case "direct":
          this.deliver(edge.to, envelope, "direct");
          break;
        case "fan-out":
          for (const to of edge.to) this.deliver(to, envelope, "fan-out");
          break;
        case "switch":
          this.deliver(edge.router.select(envelope), envelope, "switch");
          break;
        case "fan-in":
          this.offer(edge, envelope);
          break;
      }
    }
  }

  private dispatchTo(target: ExecutorId, envelope: Envelope<P>, edges: ReadonlyArray<Edge<P>>): void {
    const join = this.topology.joinInto(target);
    if (join) {
      this.offer(join, envelope);
      return;
    }
    for (const edge of edges) {
      if (edge.kind === "direct" && edge.to === target) {
        this.deliver(target, envelope, "direct");
        return;
      }
      if (edge.kind === "fan-out" && edge.to.includes(target)) {
        this.deliver(target, envelope, "fan-out");
        return;
      }
    }
    throw new RoutingError(envelope.source, target, "no direct or fan-out edge leads there");
  }

  private deliver(target: ExecutorId, envelope: Envelope<P>, via: EdgeKind): void {
    this.emit({ type: "message:sent", runId: this.runId, source: envelope.source, target, via });
    this.schedule(target, { kind: "single", envelope: copyEnvelope(envelope) });
  }

  private offer(join: FanInEdge, envelope: Envelope<P>): void {
    const batch = this.run.barrierFor(join).offer(copyEnvelope(envelope));
    this.emit({ type: "message:sent", runId: this.runId, source: envelope.source, target: join.to, via: "fan-in" });
    if (batch) this.schedule(join.to, { kind: "batch", envelopes: batch });
  }

  // ── Helpers ──

  private publish(executorId: ExecutorId, output: O): void {
    if (this.run.isTerminated) {
      this.logger.warn("output discarded: run already ended", { runId: this.runId, executorId });
      return;
    }
    this.run.outputs.push(output);
    this.outputChannel.push(output);
    this.emit({ type: "output", runId: this.runId, executorId, output });
  }

  private emit(event: WorkflowEvent<O>): void {
    this.eventChannel.push(event);
  }

  private snapshot(): WorkflowResult<O> {
    return {
      runId: this.runId,
      status: this.run.status,
      outputs: [...this.run.outputs],
      durationMs: Date.now() - this.run.startedAt,
    };
  }

  private clearTimer(): void {
    if (this.timeoutTimer !== undefined) {
      clearTimeout(this.timeoutTimer);
      this.timeoutTimer = undefined;
    }
  }
}
