export { createMarketResearchWorkflow } from "./workflow.js";
export type { MarketResearchOptions } from "./workflow.js";
export {
  createChat,
  createMarketResearchCollaborators,
  createResearchCollaborators,
} from "./collaborators.js";
export type { MarketResearchCollaborators } from "./collaborators.js";
export * from "./executors.js";
export * from "./payloads.js";
export * from "./tools.js";
