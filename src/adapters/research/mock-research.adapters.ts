// =============================================================================
// Mock research adapters — Deterministic in-process collaborators
// =============================================================================

import type {
  AnalyticsPort,
  AnalyticsQueryParams,
  AnalyticsQueryResult,
  DatasetSummary,
} from "../../ports/analytics.port.js";
import type {
  DocumentSearchParams,
  DocumentSearchPort,
  DocumentSearchResult,
} from "../../ports/document-search.port.js";
import type {
  OrganizationAnalysis,
  OrganizationAnalysisParams,
  RepositoryPort,
  RepositorySearchParams,
  RepositorySearchResult,
} from "../../ports/repository.port.js";

const SAMPLE_DOCUMENTS = [
  {
    topic: "overview",
    content: "Supplier profile with production capacity and delivery regions.",
    score: 0.9,
    captions: ["capacity 40k units/month", "delivers to EU and NA"],
  },
  {
    topic: "certifications",
    content: "ISO 9001 and ISO 14001 certificates, renewed annually.",
    score: 0.8,
    captions: ["ISO 9001", "ISO 14001"],
  },
  {
    topic: "pricing",
    content: "Tiered volume pricing reviewed every quarter.",
    score: 0.7,
    captions: ["volume tiers"],
  },
];

const SAMPLE_ROWS: Record<string, Array<Record<string, unknown>>> = {
  financials: [{ metric: "revenue", value: 1000000, period: "Q4" }],
  "market-insights": [
    { trend: "growing", projectedGrowth: "15%", keyFactors: ["sustainability", "cost-effectiveness", "innovation"] },
  ],
  compliance: [{ esgScore: 72, openFindings: 1 }],
};

const SAMPLE_TOPICS = [
  "artificial-intelligence",
  "machine-learning",
  "sustainability",
  "cloud-computing",
  "blockchain",
  "iot",
  "cybersecurity",
];

export class MockDocumentSearchAdapter implements DocumentSearchPort {
  async search(params: DocumentSearchParams): Promise<DocumentSearchResult> {
    const documents = SAMPLE_DOCUMENTS.slice(0, params.top ?? 5).map((doc, i) => ({
      id: `doc-${i + 1}`,
      title: `${params.query} ${doc.topic}`,
      content: doc.content,
      score: doc.score,
      captions: params.semantic ? [...doc.captions] : [],
    }));
    return { documents, total: documents.length, elapsedMs: 0 };
  }
}

export class MockAnalyticsAdapter implements AnalyticsPort {
  async query(params: AnalyticsQueryParams): Promise<AnalyticsQueryResult> {
    const rows = SAMPLE_ROWS[params.dataset] ?? [{ query: params.query, score: 0.8 }];
    return {
      dataset: params.dataset,
      rows: rows.map((row) => ({ ...row })),
      elapsedMs: 0,
    };
  }

  async listDatasets(): Promise<DatasetSummary[]> {
    return Object.keys(SAMPLE_ROWS).map((name) => ({ id: `mock-${name}`, name, type: "SemanticModel" }));
  }
}

export class MockRepositoryAdapter implements RepositoryPort {
  async searchRepositories(params: RepositorySearchParams): Promise<RepositorySearchResult> {
    const slug = params.query.toLowerCase().replace(/\s+/g, "-");
    const repositories = [
      { fullName: `example/${slug}-sdk`, description: `Client SDK for ${params.query}`, stars: 120, language: "TypeScript" },
      { fullName: `example/${slug}-tools`, description: `Tooling for ${params.query}`, stars: 45, language: "Go" },
    ].slice(0, params.limit ?? 5);
    return { totalCount: repositories.length, repositories };
  }

  async analyzeOrganization(params: OrganizationAnalysisParams): Promise<OrganizationAnalysis> {
    const languageDistribution = { TypeScript: 3, Go: 1 };
    return {
      organization: params.organization,
      totalRepos: 4,
      totalStars: 165,
      languages: Object.keys(languageDistribution),
      languageDistribution,
    };
  }

  async trendingTopics(): Promise<string[]> {
    return [...SAMPLE_TOPICS];
  }
}
