// =============================================================================
// fanweave — Public API
// =============================================================================

// Engine
export * from "./graph/index.js";
export {
  LogLevelSchema,
  RunStatusSchema,
  WorkflowConfigSchema,
} from "./domain/workflow.schema.js";
export type {
  EdgeKind,
  LogLevel,
  RunStatus,
  WorkflowConfig,
  WorkflowConfigInput,
  WorkflowEvent,
  WorkflowResult,
} from "./domain/workflow.schema.js";

// Errors
export {
  CollaboratorError,
  ConfigError,
  DuplicateDeliveryError,
  HandlerError,
  RoutingError,
  RunCancelledError,
  RunError,
  RunTimeoutError,
  StalledRunError,
  TopologyError,
  WorkflowError,
} from "./errors.js";

// Ports
export type { LogEntry, LoggingPort } from "./ports/logging.port.js";
export type { ChatMessage, ChatPort, ChatRequest } from "./ports/chat.port.js";
export type {
  DocumentSearchParams,
  DocumentSearchPort,
  DocumentSearchResult,
  SearchDocument,
} from "./ports/document-search.port.js";
export type {
  AnalyticsPort,
  AnalyticsQueryParams,
  AnalyticsQueryResult,
  DatasetSummary,
} from "./ports/analytics.port.js";
export type {
  OrganizationAnalysis,
  OrganizationAnalysisParams,
  RepositoryPort,
  RepositorySearchParams,
  RepositorySearchResult,
  RepositorySummary,
} from "./ports/repository.port.js";

// Adapters
export * from "./adapters/logging/index.js";
export * from "./adapters/chat/index.js";
export * from "./adapters/research/index.js";

// Config
export { loadResearchConfig, ResearchEnvSchema } from "./config/research-config.js";
export type { CollaboratorMode, ResearchConfig } from "./config/research-config.js";

// Market-research workflow
export * from "./workflows/market-research/index.js";
