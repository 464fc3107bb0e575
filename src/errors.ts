/**
 * Structured error hierarchy for fanweave.
 *
 * Every error extends {@link WorkflowError} so callers can branch on the class
 * or on the stable `code`:
 *
 * ```ts
 * try {
 *   await workflow.run(input).result();
 * } catch (e) {
 *   if (e instanceof HandlerError) console.error(e.executorId, e.cause);
 *   if (e instanceof RunError) console.log(e.partialOutputs);
 * }
 * ```
 *
 * @module errors
 */

/** Base error for all fanweave errors. Includes an error code for programmatic matching. */
export class WorkflowError extends Error {
  readonly code: string;
  constructor(code: string, message: string) {
    super(message);
    this.name = "WorkflowError";
    this.code = code;
  }
}

/** Thrown by `WorkflowBuilder.build()` when the declared graph is malformed. */
export class TopologyError extends WorkflowError {
  /** Human readable description of the offending edge or executor. */
  readonly subject: string;
  constructor(subject: string, message: string) {
    super("TOPOLOGY_ERROR", `${subject}: ${message}`);
    this.name = "TopologyError";
    this.subject = subject;
  }
}

/** Thrown when environment or engine configuration fails validation. */
export class ConfigError extends WorkflowError {
  readonly field?: string;
  constructor(message: string, field?: string) {
    super("CONFIG_ERROR", field ? `Invalid "${field}": ${message}` : message);
    this.name = "ConfigError";
    this.field = field;
  }
}

/** Thrown by collaborator adapters when an external call fails. */
export class CollaboratorError extends WorkflowError {
  readonly collaborator: string;
  readonly status?: number;
  constructor(collaborator: string, message: string, status?: number) {
    super("COLLABORATOR_ERROR", `[${collaborator}] ${message}`);
    this.name = "CollaboratorError";
    this.collaborator = collaborator;
    this.status = status;
  }
}

/**
 * Base class for errors that end a run. The scheduler records the run id and the
 * outputs yielded before the failure; they are never discarded.
 */
export abstract class RunError extends WorkflowError {
  runId?: string;
  partialOutputs: readonly unknown[] = [];

  attachRun(runId: string, outputs: readonly unknown[]): this {
    this.runId = runId;
    this.partialOutputs = [...outputs];
    return this;
  }
}

/** An envelope was addressed to a target its source has no route to. */
export class RoutingError extends RunError {
  readonly source: string;
  readonly target: string;
  constructor(source: string, target: string, message: string) {
    super("ROUTING_ERROR", `"${source}" -> "${target}": ${message}`);
    this.name = "RoutingError";
    this.source = source;
    this.target = target;
  }
}

/** A predecessor delivered a second time into the same join during one run. */
export class DuplicateDeliveryError extends RunError {
  readonly joinId: string;
  readonly source: string;
  constructor(joinId: string, source: string) {
    super(
      "DUPLICATE_DELIVERY",
      `Join "${joinId}" already received a delivery from "${source}" in this run`,
    );
    this.name = "DuplicateDeliveryError";
    this.joinId = joinId;
    this.source = source;
  }
}

/** A handler (or the collaborator it awaited) failed. Wraps the underlying cause. */
export class HandlerError extends RunError {
  readonly executorId: string;
  override readonly cause: unknown;
  constructor(executorId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("HANDLER_ERROR", `Executor "${executorId}" failed: ${reason}`);
    this.name = "HandlerError";
    this.executorId = executorId;
    this.cause = cause;
  }
}

/** No task is left to run but a join is still waiting for predecessors. */
export class StalledRunError extends RunError {
  readonly joinId: string;
  readonly missing: readonly string[];
  constructor(joinId: string, missing: readonly string[]) {
    super(
      "STALLED_RUN",
      `Join "${joinId}" can never fire: no pending work can deliver from ${missing
        .map((m) => `"${m}"`)
        .join(", ")}`,
    );
    this.name = "StalledRunError";
    this.joinId = joinId;
    this.missing = missing;
  }
}

/** The run was cancelled through its handle. */
export class RunCancelledError extends RunError {
  readonly reason?: string;
  constructor(reason?: string) {
    super("RUN_CANCELLED", reason ? `Run cancelled: ${reason}` : "Run cancelled");
    this.name = "RunCancelledError";
    this.reason = reason;
  }
}

/** The run exceeded its configured `timeoutMs`. */
export class RunTimeoutError extends RunError {
  readonly timeoutMs: number;
  constructor(timeoutMs: number) {
    super("RUN_TIMEOUT", `Run exceeded timeout of ${timeoutMs}ms`);
    this.name = "RunTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}
