// =============================================================================
// HttpDocumentSearchAdapter — Search-index REST API (POST .../docs/search)
// =============================================================================

import { z } from "zod";
import type {
  DocumentSearchParams,
  DocumentSearchPort,
  DocumentSearchResult,
} from "../../ports/document-search.port.js";
import { requestJson } from "./http-json.js";

export interface HttpDocumentSearchOptions {
  endpoint: string;
  apiKey: string;
  index: string;
  apiVersion?: string;
  /** Semantic ranker configuration used by `semantic` queries (default: "default") */
  semanticConfiguration?: string;
}

const HitSchema = z.object({
  id: z.string().optional(),
  title: z.string().nullish(),
  content: z.string().nullish(),
  "@search.score": z.number().default(0),
  "@search.captions": z.array(z.object({ text: z.string() })).nullish(),
});

const SearchResponseSchema = z.object({
  value: z.array(HitSchema).default([]),
  "@odata.count": z.number().optional(),
});

export class HttpDocumentSearchAdapter implements DocumentSearchPort {
  private readonly url: string;

  constructor(private readonly options: HttpDocumentSearchOptions) {
    const endpoint = options.endpoint.replace(/\/+$/, "");
    const version = options.apiVersion ?? "2023-11-01";
    this.url = `${endpoint}/indexes/${encodeURIComponent(options.index)}/docs/search?api-version=${version}`;
  }

  async search(params: DocumentSearchParams): Promise<DocumentSearchResult> {
    const { body, elapsedMs } = await requestJson(
      "document-search",
      this.url,
      {
        method: "POST",
        headers: { "Content-Type": "application/json", "api-key": this.options.apiKey },
        body: JSON.stringify({
          search: params.query,
          top: params.top ?? 5,
          includeTotalCount: true,
          ...(params.semantic
            ? {
                queryType: "semantic",
                semanticConfiguration: this.options.semanticConfiguration ?? "default",
                captions: "extractive",
              }
            : { queryType: "simple" }),
        }),
      },
      SearchResponseSchema,
    );
    return {
      documents: body.value.map((hit) => ({
        id: hit.id,
        title: hit.title ?? "",
        content: hit.content ?? "",
        score: hit["@search.score"],
        captions: (hit["@search.captions"] ?? []).map((caption) => caption.text),
      })),
      total: body["@odata.count"] ?? body.value.length,
      elapsedMs,
    };
  }
}
