// =============================================================================
// fanweave CLI — argument handling and command dispatch
// =============================================================================

import { parseArgs } from "node:util";

import { ConsoleLoggingAdapter } from "../adapters/logging/console-logging.adapter.js";
import { loadResearchConfig } from "../config/research-config.js";
import type { ResearchConfig } from "../config/research-config.js";
import { ConfigError, WorkflowError } from "../errors.js";
import { toMermaid } from "../graph/mermaid.js";
import {
  createMarketResearchCollaborators,
  createResearchCollaborators,
} from "../workflows/market-research/collaborators.js";
import type { MarketResearchCollaborators } from "../workflows/market-research/collaborators.js";
import { prompt } from "../workflows/market-research/payloads.js";
import { createMarketResearchWorkflow } from "../workflows/market-research/workflow.js";
import { bold, color, formatDuration, formatEvent } from "./format.js";

export const VERSION = "0.1.0";

export const HELP = `
${bold("fanweave")} — Supplier market-research workflow

${bold("Usage:")}
  fanweave "<proposal>"            Run the workflow and print its outputs
  fanweave "<proposal>" --stream   Print every workflow event as it happens
  fanweave graph                   Print the workflow graph as Mermaid

${bold("Options:")}
  --stream    Show the full event stream
  --help      Show this help
  --version   Show version

${bold("Environment Variables:")}
  RESEARCH_COLLABORATORS (mock | http), OPENAI_API_KEY, OPENAI_BASE_URL,
  OPENAI_MODEL, SEARCH_ENDPOINT, SEARCH_API_KEY, SEARCH_INDEX,
  ANALYTICS_WORKSPACE_ID, ANALYTICS_ACCESS_TOKEN, GITHUB_TOKEN, LOG_LEVEL
`;

export interface CliIO {
  env: Record<string, string | undefined>;
  out: (line: string) => void;
  err: (line: string) => void;
  /** Overrides collaborator construction (default: from config). */
  collaborators?: (config: ResearchConfig) => MarketResearchCollaborators;
}

const defaultIO: CliIO = {
  env: process.env,
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/** Runs one CLI invocation and resolves with its exit code. */
export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      stream: { type: "boolean", short: "s" },
      help: { type: "boolean", short: "h" },
      version: { type: "boolean", short: "v" },
    },
    strict: false,
  });

  if (values.help === true) {
    io.out(HELP);
    return 0;
  }
  if (values.version === true) {
    io.out(`fanweave v${VERSION}`);
    return 0;
  }
  if (positionals.length === 0) {
    io.out(HELP);
    return 0;
  }

  try {
    const config = loadResearchConfig(io.env);
    if (positionals[0] === "graph" && positionals.length === 1) {
      return handleGraph(config, io);
    }
    return await handleRun(positionals.join(" "), values.stream === true, config, io);
  } catch (error) {
    if (error instanceof WorkflowError) {
      io.err(color("red", `✗ ${error.message}`));
      return 1;
    }
    throw error;
  }
}

function handleGraph(config: ResearchConfig, io: CliIO): number {
  const workflow = createMarketResearchWorkflow({
    ...createResearchCollaborators(config),
    chat: {
      complete: () => Promise.reject(new ConfigError("graph rendering does not call the chat model")),
    },
  });
  io.out(toMermaid(workflow));
  return 0;
}

async function handleRun(text: string, stream: boolean, config: ResearchConfig, io: CliIO): Promise<number> {
  const collaborators = io.collaborators?.(config) ?? createMarketResearchCollaborators(config);
  const logger = new ConsoleLoggingAdapter({
    level: config.logLevel,
    scope: "market-research",
    sink: (_entry, line) => io.err(line),
  });
  const workflow = createMarketResearchWorkflow(collaborators, { logger });

  if (stream) {
    let failed = false;
    for await (const event of workflow.stream(prompt(text))) {
      io.out(formatEvent(event));
      if (event.type === "run:error") failed = true;
    }
    return failed ? 1 : 0;
  }

  const run = workflow.run(prompt(text));
  for await (const output of run) {
    io.out(output.text);
  }
  const result = await run.result();
  io.out(color("dim", `Completed in ${formatDuration(result.durationMs)}`));
  return 0;
}
