// =============================================================================
// HttpAnalyticsAdapter — Workspace dataset queries (POST .../executeQueries)
// =============================================================================

import { z } from "zod";
import type {
  AnalyticsPort,
  AnalyticsQueryParams,
  AnalyticsQueryResult,
  DatasetSummary,
} from "../../ports/analytics.port.js";
import { requestJson } from "./http-json.js";

export const DEFAULT_ANALYTICS_BASE_URL = "https://api.fabric.microsoft.com/v1";

export interface HttpAnalyticsOptions {
  workspaceId: string;
  accessToken: string;
  baseUrl?: string;
}

const QueryResponseSchema = z.object({
  results: z.array(z.unknown()).default([]),
});

const ItemsResponseSchema = z.object({
  value: z.array(z.object({ id: z.string(), displayName: z.string(), type: z.string() })).default([]),
});

export class HttpAnalyticsAdapter implements AnalyticsPort {
  private readonly baseUrl: string;

  constructor(private readonly options: HttpAnalyticsOptions) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_ANALYTICS_BASE_URL).replace(/\/+$/, "");
  }

  async query(params: AnalyticsQueryParams): Promise<AnalyticsQueryResult> {
    const dataset = encodeURIComponent(params.dataset);
    const { body, elapsedMs } = await requestJson(
      "analytics",
      `${this.workspaceUrl()}/items/${dataset}/executeQueries`,
      {
        method: "POST",
        headers: this.headers(),
        body: JSON.stringify({
          queries: [{ query: params.query }],
          serializerSettings: { includeNulls: false },
        }),
      },
      QueryResponseSchema,
    );
    return { dataset: params.dataset, rows: body.results, elapsedMs };
  }

  async listDatasets(): Promise<DatasetSummary[]> {
    const { body } = await requestJson(
      "analytics",
      `${this.workspaceUrl()}/items`,
      { method: "GET", headers: this.headers() },
      ItemsResponseSchema,
    );
    return body.value.map((item) => ({ id: item.id, name: item.displayName, type: item.type }));
  }

  private workspaceUrl(): string {
    return `${this.baseUrl}/workspaces/${encodeURIComponent(this.options.workspaceId)}`;
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.options.accessToken}`,
      "Content-Type": "application/json",
    };
  }
}
