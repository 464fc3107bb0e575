// =============================================================================
// AnalyticsPort — Queries against market and financial datasets
// =============================================================================

export interface AnalyticsQueryParams {
  /** Dataset name, e.g. "financials" or "market-insights". */
  dataset: string;
  query: string;
}

export interface AnalyticsQueryResult {
  dataset: string;
  rows: unknown[];
  elapsedMs: number;
}

export interface DatasetSummary {
  id: string;
  name: string;
  type: string;
}

export interface AnalyticsPort {
  query(params: AnalyticsQueryParams): Promise<AnalyticsQueryResult>;
  /** Datasets available in the workspace. */
  listDatasets(): Promise<DatasetSummary[]>;
}
