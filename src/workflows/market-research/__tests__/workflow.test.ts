// =============================================================================
// Tests — Market-research workflow end to end with scripted collaborators
// =============================================================================

import { describe, it, expect } from "vitest";
import { createMarketResearchWorkflow } from "../workflow.js";
import { prompt } from "../payloads.js";
import { HandlerError } from "../../../errors.js";
import { CollaboratorError } from "../../../errors.js";
import { SilentLoggingAdapter } from "../../../adapters/logging/console-logging.adapter.js";
import { toMermaid } from "../../../graph/mermaid.js";
import {
  COMPETITIVE_VERDICT,
  NOT_COMPETITIVE_VERDICT,
  createMockCollaborators,
  createScriptedChat,
  marketResearchScript,
} from "../../../__tests__/helpers/test-utils.js";

const logger = new SilentLoggingAdapter();

describe("market-research workflow", () => {
  it("routes a competitive verdict to the negotiator only", async () => {
    const chat = createScriptedChat(marketResearchScript(COMPETITIVE_VERDICT));
    const workflow = createMarketResearchWorkflow(createMockCollaborators(chat), { logger });

    const result = await workflow.execute(prompt("Bulk steel bolts at 4% under list"));

    expect(result.status).toBe("completed");
    expect(result.outputs).toEqual([
      { kind: "result", executorId: "negotiator", text: "NEGOTIATION STRATEGY:\npush for volume discount" },
    ]);
  });

  it("routes any other verdict to the reviewer", async () => {
    const chat = createScriptedChat(marketResearchScript(NOT_COMPETITIVE_VERDICT));
    const workflow = createMarketResearchWorkflow(createMockCollaborators(chat), { logger });

    const { outputs } = await workflow.execute(prompt("Premium bolts at list price"));

    expect(outputs).toEqual([
      { kind: "result", executorId: "reviewer", text: "PROPOSAL REVIEW:\nneeds better pricing" },
    ]);
  });

  it("asks each expert once and hands the evaluator their replies in declared order", async () => {
    const chat = createScriptedChat(marketResearchScript(COMPETITIVE_VERDICT));
    await createMarketResearchWorkflow(createMockCollaborators(chat), { logger }).execute(prompt("Proposal A"));

    const experts = chat.requests.slice(0, 3);
    expect(experts.map((r) => r.transcript)).toEqual([
      [{ role: "user", content: "Proposal A" }],
      [{ role: "user", content: "Proposal A" }],
      [{ role: "user", content: "Proposal A" }],
    ]);
    expect(experts.map((r) => Object.keys(r.tools ?? {}))).toEqual([
      ["complianceCheck"],
      ["financialAnalysis"],
      ["supplierResearch"],
    ]);

    const evaluator = chat.requests.find((r) => r.instructions.startsWith("You are an expert evaluator"));
    expect(evaluator?.transcript[0]?.content).toContain(
      "COMPLIANCE FINDINGS:\ncompliant\n\nCOMMERCIAL ANALYSIS:\npriced well\n\nPROCUREMENT ASSESSMENT:\ngood fit",
    );
    expect(chat.requests).toHaveLength(5);
  });

  it("fails the run when the verdict cannot be interpreted", async () => {
    const chat = createScriptedChat(marketResearchScript("Looks competitive to me"));
    const run = createMarketResearchWorkflow(createMockCollaborators(chat), { logger }).run(prompt("Proposal B"));

    const error = await run.result().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(HandlerError);
    if (!(error instanceof HandlerError)) return;
    expect(error.executorId).toBe("aggregator");
    expect(error.message).toBe('Executor "aggregator" failed: evaluator verdict contains no JSON object');
    expect(error.partialOutputs).toEqual([]);
  });

  it("surfaces a collaborator failure as a HandlerError", async () => {
    const script = marketResearchScript(COMPETITIVE_VERDICT).map(([prefix, reply]) =>
      prefix === "You're a commercial analyst"
        ? ([prefix, new CollaboratorError("chat", "rate limited")] as const)
        : ([prefix, reply] as const),
    );
    const chat = createScriptedChat(script);
    const run = createMarketResearchWorkflow(createMockCollaborators(chat), { logger }).run(prompt("Proposal C"));

    const error = await run.result().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(HandlerError);
    if (!(error instanceof HandlerError)) return;
    expect(error.executorId).toBe("commercial-expert");
    expect(error.cause).toBeInstanceOf(CollaboratorError);
    expect(error.message).toBe('Executor "commercial-expert" failed: [chat] rate limited');
  });

  it("renders the graph", () => {
    const chat = createScriptedChat([]);
    const lines = toMermaid(createMarketResearchWorkflow(createMockCollaborators(chat), { logger })).split("\n");

    expect(lines).toContain('  dispatcher(["dispatcher"])');
    expect(lines).toContain("  dispatcher -->|fan-out| commercial_expert");
    expect(lines).toContain("  procurement_expert ==>|fan-in| aggregator");
    expect(lines).toContain("  aggregator -->|case 1| negotiator");
    expect(lines).toContain("  aggregator -.->|default| reviewer");
  });
});
