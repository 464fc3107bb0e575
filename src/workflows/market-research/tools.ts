// =============================================================================
// Research tools — AI SDK tools combining the three data collaborators
// =============================================================================

import { tool } from "ai";
import { z } from "zod";

import type { AnalyticsPort } from "../../ports/analytics.port.js";
import type { DocumentSearchPort } from "../../ports/document-search.port.js";
import type { RepositoryPort } from "../../ports/repository.port.js";

export interface ResearchCollaborators {
  search: DocumentSearchPort;
  analytics: AnalyticsPort;
  repositories: RepositoryPort;
}

// ── Digests ──────────────────────────────────────────────────────────────────
// Each collaborator failure becomes an "Error:" line; a digest never throws.

const COMPLIANCE_TOPIC_WORDS = ["sustainability", "security", "compliance"];

export async function supplierResearchDigest(c: ResearchCollaborators, query: string): Promise<string> {
  const [docs, market, repos, stack] = await Promise.allSettled([
    c.search.search({ query: `supplier ${query}` }),
    c.analytics.query({ dataset: "market-insights", query: `category = ${quote(query)}` }),
    c.repositories.searchRepositories({ query: `${query} supplier` }),
    c.repositories.analyzeOrganization({ organization: slug(query) }),
  ]);

  return [
    `## Supplier research: ${query}`,
    ...section("Document search", docs, (r) => {
      if (r.documents.length === 0) return ["- No search results available"];
      return [
        `- Found ${r.total} documents`,
        ...r.documents.slice(0, 3).map((d) => `- ${d.title || "Document"}: ${snippet(d.content, 200)}`),
      ];
    }),
    ...section("Market analytics", market, (r) => rowLines(r.rows, "- No market data available")),
    ...section("Technology analysis", repos, (r) => {
      if (r.repositories.length === 0) return ["- No repository data available"];
      const lines = [
        `- Found ${r.totalCount} repositories`,
        ...r.repositories
          .slice(0, 2)
          .map((repo) => `- ${repo.fullName}: ${repo.description ?? "No description"} (★${repo.stars})`),
      ];
      if (stack.status === "fulfilled" && stack.value.languages.length > 0) {
        lines.push(`- Languages: ${stack.value.languages.slice(0, 3).join(", ")}`);
      }
      return lines;
    }),
  ].join("\n");
}

export async function financialAnalysisDigest(c: ResearchCollaborators, company: string): Promise<string> {
  const [datasets, metrics, market, docs, tech] = await Promise.allSettled([
    c.analytics.listDatasets(),
    c.analytics.query({ dataset: "financials", query: `company = ${quote(company)}` }),
    c.analytics.query({ dataset: "market-insights", query: `category = ${quote(`${company} financial`)}` }),
    c.search.search({ query: `${company} financial performance revenue` }),
    c.repositories.analyzeOrganization({ organization: slug(company) }),
  ]);

  return [
    `## Financial analysis: ${company}`,
    ...section("Available datasets", datasets, (r) =>
      r.length > 0
        ? [`- ${r.length} datasets: ${r.map((d) => d.name).join(", ")}`]
        : ["- No datasets available"],
    ),
    ...section("Financial data", metrics, (r) => rowLines(r.rows, "- No financial data available")),
    ...section("Market intelligence", market, (r) => rowLines(r.rows, "- No market data available")),
    ...section("Financial documents", docs, (r) =>
      r.documents.length > 0
        ? r.documents.slice(0, 2).map((d) => `- Score ${d.score.toFixed(2)}: ${snippet(d.content, 150)}`)
        : ["- No financial documents available"],
    ),
    ...section("Technology investment", tech, (r) => {
      const lines = [`- Analysis completed for ${r.organization}`];
      if (r.totalRepos > 0) {
        lines.push(`- Total repos: ${r.totalRepos}`, `- Total stars: ${r.totalStars}`);
        const ranked = Object.entries(r.languageDistribution)
          .sort(([, a], [, b]) => b - a)
          .slice(0, 3)
          .map(([language]) => language);
        if (ranked.length > 0) lines.push(`- Languages: ${ranked.join(", ")}`);
      }
      return lines;
    }),
  ].join("\n");
}

export async function complianceCheckDigest(c: ResearchCollaborators, supplier: string): Promise<string> {
  const [docs, metrics, repos, topics] = await Promise.allSettled([
    c.search.search({ query: `${supplier} compliance ESG sustainability`, semantic: true }),
    c.analytics.query({ dataset: "compliance", query: `supplier = ${quote(supplier)}` }),
    c.repositories.searchRepositories({ query: `${supplier} compliance OR ESG OR sustainability` }),
    c.repositories.trendingTopics(),
  ]);

  return [
    `## Compliance report: ${supplier}`,
    ...section("Compliance documents", docs, (r) => {
      if (r.documents.length === 0) return ["- No compliance documents available"];
      return r.documents.slice(0, 3).flatMap((d) => {
        const lines = [`- ${d.title || "Document"}: ${snippet(d.content, 200)}`];
        if (d.captions.length > 0) lines.push(`  Key points: ${d.captions.slice(0, 2).join(", ")}`);
        return lines;
      });
    }),
    ...section("Compliance metrics", metrics, (r) => rowLines(r.rows, "- No compliance metrics available")),
    ...section("Open-source compliance", repos, (r) =>
      r.repositories.length > 0
        ? r.repositories.slice(0, 2).map((repo) => `- ${repo.fullName}: ${repo.description ?? "No description"}`)
        : ["- No compliance repositories available"],
    ),
    ...section("Industry compliance trends", topics, (r) => {
      const relevant = r.filter((topic) => COMPLIANCE_TOPIC_WORDS.some((word) => topic.includes(word)));
      return relevant.length > 0 ? [`- Trending: ${relevant.join(", ")}`] : ["- No compliance topics trending"];
    }),
  ].join("\n");
}

// ── Tools ────────────────────────────────────────────────────────────────────

export function createResearchTools(c: ResearchCollaborators) {
  return {
    supplierResearch: tool({
      description: "Research suppliers in a category using document search, market analytics and repository data.",
      inputSchema: z.object({ query: z.string().min(1).describe("Supplier category or name") }),
      execute: async ({ query }) => supplierResearchDigest(c, query),
    }),
    financialAnalysis: tool({
      description: "Summarize financial datasets, market intelligence and technology investment for a company.",
      inputSchema: z.object({ company: z.string().min(1).describe("Company name") }),
      execute: async ({ company }) => financialAnalysisDigest(c, company),
    }),
    complianceCheck: tool({
      description: "Check compliance documents, ESG metrics, open-source compliance work and trending compliance topics for a supplier.",
      inputSchema: z.object({ supplier: z.string().min(1).describe("Supplier name") }),
      execute: async ({ supplier }) => complianceCheckDigest(c, supplier),
    }),
  };
}

export type ResearchTools = ReturnType<typeof createResearchTools>;

// ── Helpers ──────────────────────────────────────────────────────────────────

function section<T>(
  title: string,
  outcome: PromiseSettledResult<T>,
  describe: (value: T) => string[],
): string[] {
  const body =
    outcome.status === "fulfilled" ? describe(outcome.value) : [`- Error: ${reasonOf(outcome.reason)}`];
  return ["", `**${title}**`, ...body];
}

/** One line per row (at most three), `key: value` pairs joined by "; ". */
function rowLines(rows: unknown[], empty: string): string[] {
  if (rows.length === 0) return [empty];
  return rows.slice(0, 3).map((row) => `- ${describeRow(row)}`);
}

function describeRow(row: unknown): string {
  if (typeof row === "object" && row !== null && !Array.isArray(row)) {
    return Object.entries(row)
      .map(([key, value]) => `${key}: ${describeValue(value)}`)
      .join("; ");
  }
  return describeValue(row);
}

function describeValue(value: unknown): string {
  if (Array.isArray(value)) return value.map(describeValue).join(", ");
  if (typeof value === "object" && value !== null) return JSON.stringify(value);
  return String(value);
}

function snippet(text: string, max: number): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max).trimEnd()}...` : flat;
}

function reasonOf(reason: unknown): string {
  return reason instanceof Error ? reason.message : String(reason);
}

function quote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function slug(value: string): string {
  return value.trim().toLowerCase().replace(/\s+/g, "-");
}
