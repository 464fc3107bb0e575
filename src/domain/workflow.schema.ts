// =============================================================================
// Workflow Schema — Configuration, result & event types for Workflow runs
// =============================================================================

import { z } from "zod";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const WorkflowConfigSchema = z.object({
  name: z.string().min(1).default("workflow"),
  maxConcurrency: z.number().int().positive().default(8),
  timeoutMs: z.number().int().positive().optional(),
  logLevel: LogLevelSchema.default("warn"),
});

export type WorkflowConfig = z.infer<typeof WorkflowConfigSchema>;
export type WorkflowConfigInput = z.input<typeof WorkflowConfigSchema>;

export const RunStatusSchema = z.enum([
  "pending",
  "running",
  "completed",
  "failed",
  "cancelled",
]);

export type RunStatus = z.infer<typeof RunStatusSchema>;

export interface WorkflowResult<O> {
  runId: string;
  status: RunStatus;
  outputs: O[];
  durationMs: number;
}

export type WorkflowEvent<O> =
  | { type: "run:start"; runId: string; startExecutorId: string }
  | { type: "executor:invoked"; runId: string; executorId: string; batchSize?: number }
  | { type: "executor:completed"; runId: string; executorId: string; durationMs: number }
  | { type: "message:sent"; runId: string; source: string; target: string; via: EdgeKind }
  | { type: "output"; runId: string; executorId: string; output: O }
  | { type: "run:complete"; result: WorkflowResult<O> }
  | { type: "run:error"; runId: string; error: Error; partialOutputs: O[] };

export type EdgeKind = "direct" | "fan-out" | "fan-in" | "switch";
