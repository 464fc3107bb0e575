// =============================================================================
// Executor — Named graph node and the context it runs in
// =============================================================================

import type { LoggingPort } from "../ports/logging.port.js";
import type { Envelope, ExecutorId } from "./envelope.js";

export interface SendOptions {
  /**
   * Restrict delivery to one downstream executor. The source must reach it over
   * a direct or fan-out edge, or be a declared predecessor of its join.
   */
  target?: ExecutorId;
}

/**
 * Per-invocation view of a run handed to a handler. Outputs are published as
 * soon as they are yielded; sends are routed once the handler returns, and are
 * dropped if it throws.
 */
export interface WorkflowContext<P, O> {
  readonly runId: string;
  readonly executorId: ExecutorId;
  /** Aborted when the run is cancelled, times out or fails elsewhere. */
  readonly signal: AbortSignal;
  readonly logger: LoggingPort;
  send(payload: P, options?: SendOptions): void;
  yieldOutput(output: O): void;
}

/**
 * A graph node. Ordinary nodes implement `handle`; fan-in targets implement
 * `handleBatch` and receive envelopes in declared-predecessor order. Handlers
 * must not keep references to the envelopes they were given.
 */
export interface Executor<P, O = unknown> {
  readonly id: ExecutorId;
  handle?(envelope: Envelope<P>, ctx: WorkflowContext<P, O>): Promise<void> | void;
  handleBatch?(batch: ReadonlyArray<Envelope<P>>, ctx: WorkflowContext<P, O>): Promise<void> | void;
}

export type MessageHandler<P, O> = NonNullable<Executor<P, O>["handle"]>;
export type BatchHandler<P, O> = NonNullable<Executor<P, O>["handleBatch"]>;

/** Builds an executor from plain functions. */
export function defineExecutor<P, O = unknown>(
  id: ExecutorId,
  handlers: { handle?: MessageHandler<P, O>; handleBatch?: BatchHandler<P, O> },
): Executor<P, O> {
  return { id, handle: handlers.handle, handleBatch: handlers.handleBatch };
}
