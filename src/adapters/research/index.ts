export { HttpDocumentSearchAdapter } from "./http-document-search.adapter.js";
export type { HttpDocumentSearchOptions } from "./http-document-search.adapter.js";
export { HttpAnalyticsAdapter, DEFAULT_ANALYTICS_BASE_URL } from "./http-analytics.adapter.js";
export type { HttpAnalyticsOptions } from "./http-analytics.adapter.js";
export { GitHubRepositoryAdapter } from "./github-repository.adapter.js";
export type { GitHubRepositoryOptions } from "./github-repository.adapter.js";
export {
  MockAnalyticsAdapter,
  MockDocumentSearchAdapter,
  MockRepositoryAdapter,
} from "./mock-research.adapters.js";
export { requestJson } from "./http-json.js";
