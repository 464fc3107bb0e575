export { Workflow, WorkflowBuilder } from "./workflow.js";
export { WorkflowExecutor } from "./workflow-executor.js";
export type { WorkflowRun } from "./workflow-executor.js";
export { WORKFLOW_INPUT_SOURCE, createEnvelope } from "./envelope.js";
export type { Envelope, ExecutorId } from "./envelope.js";
export { defineExecutor } from "./executor.js";
export type {
  BatchHandler,
  Executor,
  MessageHandler,
  SendOptions,
  WorkflowContext,
} from "./executor.js";
export { SwitchRouter } from "./switch-router.js";
export type { RoutePredicate, SwitchCase } from "./switch-router.js";
export { WorkflowTopology, describeEdge } from "./topology.js";
export type { DirectEdge, Edge, FanInEdge, FanOutEdge, SwitchEdge } from "./topology.js";
export { FanInBarrier } from "./fan-in-barrier.js";
export { TaskPool, TaskDiscardedError } from "./task-pool.js";
export type { TaskPoolConfig, TaskPoolMetrics } from "./task-pool.js";
export { AsyncChannel } from "./async-channel.js";
export { toMermaid } from "./mermaid.js";
