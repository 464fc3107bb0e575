// =============================================================================
// CLI Format — ANSI color helpers and event rendering
// =============================================================================

import type { WorkflowEvent } from "../domain/workflow.schema.js";
import type { ResultPayload } from "../workflows/market-research/payloads.js";

const CODES = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
} as const;

// Honors NO_COLOR (https://no-color.org)
function useColor(): boolean {
  return !process.env.NO_COLOR && process.stdout.isTTY === true;
}

export function color(name: keyof typeof CODES, text: string): string {
  if (!useColor()) return text;
  return `${CODES[name]}${text}${CODES.reset}`;
}

export function bold(text: string): string {
  return color("bold", text);
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

export function formatEvent(event: WorkflowEvent<ResultPayload>): string {
  switch (event.type) {
    case "run:start":
      return color("cyan", `▶ run ${event.runId} started at ${event.startExecutorId}`);
    case "executor:invoked":
      return `  → ${event.executorId}${event.batchSize !== undefined ? ` (batch of ${event.batchSize})` : ""}`;
    case "executor:completed":
      return color("dim", `  ✓ ${event.executorId} ${formatDuration(event.durationMs)}`);
    case "message:sent":
      return color("gray", `    ${event.source} -[${event.via}]-> ${event.target}`);
    case "output":
      return `\n${event.output.text}\n`;
    case "run:complete":
      return color("green", `■ completed in ${formatDuration(event.result.durationMs)} with ${event.result.outputs.length} output(s)`);
    case "run:error":
      return color("red", `✗ ${event.error.message}`);
  }
}
