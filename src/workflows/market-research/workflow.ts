// =============================================================================
// Market-research workflow — fan-out to experts, fan-in verdict, switch
// =============================================================================
//
//   dispatcher ─┬─▶ compliance-expert  ─┐
//               ├─▶ commercial-expert  ─┼─▶ aggregator ─┬─ competitive ─▶ negotiator
//               └─▶ procurement-expert ─┘               └─ default ─────▶ reviewer

import type { WorkflowConfigInput } from "../../domain/workflow.schema.js";
import { Workflow } from "../../graph/workflow.js";
import type { LoggingPort } from "../../ports/logging.port.js";
import type { MarketResearchCollaborators } from "./collaborators.js";
import {
  EXECUTOR_IDS,
  EXPERT_IDS,
  createAgentExecutor,
  createAggregator,
  createDispatcher,
  createNegotiator,
  createReviewer,
  isCompetitive,
} from "./executors.js";
import type { ResearchPayload, ResultPayload } from "./payloads.js";
import { createResearchTools } from "./tools.js";

export interface MarketResearchOptions {
  config?: WorkflowConfigInput;
  logger?: LoggingPort;
}

export function createMarketResearchWorkflow(
  collaborators: MarketResearchCollaborators,
  options: MarketResearchOptions = {},
): Workflow<ResearchPayload, ResultPayload> {
  const { chat } = collaborators;
  const tools = createResearchTools(collaborators);

  const builder = Workflow.create<ResearchPayload, ResultPayload>({ name: "market-research", ...options.config })
    .addExecutor(createDispatcher(EXPERT_IDS))
    .addExecutor(
      createAgentExecutor({
        id: EXECUTOR_IDS.compliance,
        chat,
        tools: { complianceCheck: tools.complianceCheck },
        instructions:
          "You're a compliance expert for a retail chain. Analyze supplier proposals for legal, regulatory, " +
          "and ESG compliance using the research tools.",
      }),
    )
    .addExecutor(
      createAgentExecutor({
        id: EXECUTOR_IDS.commercial,
        chat,
        tools: { financialAnalysis: tools.financialAnalysis },
        instructions:
          "You're a commercial analyst. Evaluate market competitiveness, pricing, and business value " +
          "using financial analysis and market intelligence.",
      }),
    )
    .addExecutor(
      createAgentExecutor({
        id: EXECUTOR_IDS.procurement,
        chat,
        tools: { supplierResearch: tools.supplierResearch },
        instructions:
          "You're a procurement specialist. Assess supplier proposals for cost-effectiveness, strategic fit, " +
          "and operational value using the research tools.",
      }),
    )
    .addExecutor(createAggregator(chat))
    .addExecutor(createNegotiator(chat, { supplierResearch: tools.supplierResearch }))
    .addExecutor(createReviewer(chat))
    .setStart(EXECUTOR_IDS.dispatcher)
    .addFanOut(EXECUTOR_IDS.dispatcher, EXPERT_IDS)
    .addFanIn(EXPERT_IDS, EXECUTOR_IDS.aggregator)
    .addSwitch(
      EXECUTOR_IDS.aggregator,
      [{ when: isCompetitive, to: EXECUTOR_IDS.negotiator }],
      EXECUTOR_IDS.reviewer,
    );

  if (options.logger) builder.withLogger(options.logger);
  return builder.build();
}
