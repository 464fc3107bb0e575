// =============================================================================
// Market-research executors — Dispatcher, experts, aggregator, closers
// =============================================================================

import type { ToolSet } from "ai";
import { z } from "zod";

import type { Envelope } from "../../graph/envelope.js";
import type { Executor, WorkflowContext } from "../../graph/executor.js";
import type { ChatPort } from "../../ports/chat.port.js";
import {
  expectPayload,
  formatDecision,
  formatInsights,
} from "./payloads.js";
import type { DecisionPayload, ExpertInsights, ResearchPayload, ResultPayload } from "./payloads.js";

export type ResearchContext = WorkflowContext<ResearchPayload, ResultPayload>;
export type ResearchExecutor = Executor<ResearchPayload, ResultPayload>;

export const EXECUTOR_IDS = {
  dispatcher: "dispatcher",
  compliance: "compliance-expert",
  commercial: "commercial-expert",
  procurement: "procurement-expert",
  aggregator: "aggregator",
  negotiator: "negotiator",
  reviewer: "reviewer",
} as const;

export const EXPERT_IDS = [EXECUTOR_IDS.compliance, EXECUTOR_IDS.commercial, EXECUTOR_IDS.procurement];

// ── Dispatcher ───────────────────────────────────────────────────────────────

/** Addresses the proposal to each expert by id. */
export function createDispatcher(expertIds: readonly string[]): ResearchExecutor {
  return {
    id: EXECUTOR_IDS.dispatcher,
    handle(envelope, ctx) {
      const { text } = expectPayload(envelope.payload, "prompt");
      for (const target of expertIds) {
        ctx.send({ kind: "prompt", text }, { target });
      }
    },
  };
}

// ── Expert agents ────────────────────────────────────────────────────────────

export interface AgentExecutorOptions {
  id: string;
  chat: ChatPort;
  instructions: string;
  tools?: ToolSet;
}

/** Answers a prompt with the chat capability and forwards the reply. */
export function createAgentExecutor(options: AgentExecutorOptions): ResearchExecutor {
  return {
    id: options.id,
    async handle(envelope, ctx) {
      const { text } = expectPayload(envelope.payload, "prompt");
      const reply = await options.chat.complete({
        instructions: options.instructions,
        transcript: [{ role: "user", content: text }],
        tools: options.tools,
        signal: ctx.signal,
      });
      ctx.send({ kind: "agent-response", executorId: ctx.executorId, text: reply });
    },
  };
}

// ── Aggregator ───────────────────────────────────────────────────────────────

const EVALUATOR_INSTRUCTIONS = [
  "You are an expert evaluator. Analyze the insights and determine if the proposal is competitive.",
  "Look for strong compliance, good financial metrics, and strategic value.",
  'Respond with a single JSON object: {"competitive": boolean, "reasoning": string}.',
].join(" ");

export const VerdictSchema = z.object({
  competitive: z.boolean(),
  reasoning: z.string(),
});

export type Verdict = z.infer<typeof VerdictSchema>;

/**
 * Reads the evaluator's JSON verdict, tolerating a surrounding code fence or
 * prose. Throws when no object matching {@link VerdictSchema} can be found.
 */
export function parseVerdict(text: string): Verdict {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start < 0 || end < start) {
    throw new Error("evaluator verdict contains no JSON object");
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text.slice(start, end + 1));
  } catch (error) {
    throw new Error(`evaluator verdict is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  const parsed = VerdictSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error("evaluator verdict must have a boolean \"competitive\" and a string \"reasoning\"");
  }
  return parsed.data;
}

export function collectInsights(batch: ReadonlyArray<Envelope<ResearchPayload>>): ExpertInsights {
  const bySource = new Map<string, string>();
  for (const envelope of batch) {
    bySource.set(envelope.source, expectPayload(envelope.payload, "agent-response").text);
  }
  return {
    compliance: bySource.get(EXECUTOR_IDS.compliance) ?? "",
    commercial: bySource.get(EXECUTOR_IDS.commercial) ?? "",
    procurement: bySource.get(EXECUTOR_IDS.procurement) ?? "",
  };
}

/** Joins the expert replies and asks the evaluator for a competitive verdict. */
export function createAggregator(chat: ChatPort): ResearchExecutor {
  return {
    id: EXECUTOR_IDS.aggregator,
    async handleBatch(batch, ctx) {
      const insights = collectInsights(batch);
      const consolidated = [
        "Based on these expert insights, determine if this proposal is COMPETITIVE:",
        "",
        formatInsights(insights),
        "",
        "Decision factors:",
        "- Compliance score and risk level",
        "- Commercial viability and market position",
        "- Procurement value and strategic fit",
      ].join("\n");

      const reply = await chat.complete({
        instructions: EVALUATOR_INSTRUCTIONS,
        transcript: [{ role: "user", content: consolidated }],
        signal: ctx.signal,
      });
      const verdict = parseVerdict(reply);
      ctx.logger.info("verdict reached", { runId: ctx.runId, competitive: verdict.competitive });
      ctx.send({ kind: "decision", ...verdict, insights });
    },
  };
}

/** Switch predicate for the negotiation branch. */
export function isCompetitive(payload: ResearchPayload): boolean {
  return payload.kind === "decision" && payload.competitive;
}

// ── Closers ──────────────────────────────────────────────────────────────────

export interface CloserOptions {
  id: string;
  chat: ChatPort;
  instructions: string;
  heading: string;
  request: (decision: DecisionPayload) => string;
  tools?: ToolSet;
}

/** Terminal agent: yields its answer to the caller and also forwards it. */
export function createCloser(options: CloserOptions): ResearchExecutor {
  return {
    id: options.id,
    async handle(envelope: Envelope<ResearchPayload>, ctx: ResearchContext) {
      const decision = expectPayload(envelope.payload, "decision");
      const reply = await options.chat.complete({
        instructions: options.instructions,
        transcript: [{ role: "user", content: options.request(decision) }],
        tools: options.tools,
        signal: ctx.signal,
      });
      ctx.yieldOutput({ kind: "result", executorId: ctx.executorId, text: `${options.heading}\n${reply}` });
      ctx.send({ kind: "agent-response", executorId: ctx.executorId, text: reply });
    },
  };
}

export function createNegotiator(chat: ChatPort, tools?: ToolSet): ResearchExecutor {
  return createCloser({
    id: EXECUTOR_IDS.negotiator,
    chat,
    tools,
    heading: "NEGOTIATION STRATEGY:",
    instructions:
      "You're a skilled negotiator. Create a winning negotiation strategy based on the competitive analysis. " +
      "Use the insights to identify leverage points and optimal terms.",
    request: (decision) => `Create negotiation strategy for this competitive proposal:\n${formatDecision(decision)}`,
  });
}

export function createReviewer(chat: ChatPort): ResearchExecutor {
  return createCloser({
    id: EXECUTOR_IDS.reviewer,
    chat,
    heading: "PROPOSAL REVIEW:",
    instructions:
      "You review non-competitive proposals. Provide clear reasons for rejection and suggest improvements. " +
      "Be constructive but decisive.",
    request: (decision) => `Review this non-competitive proposal:\n${formatDecision(decision)}`,
  });
}
