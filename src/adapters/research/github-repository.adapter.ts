// =============================================================================
// GitHubRepositoryAdapter — Repository search and organization language census
// =============================================================================

import { z } from "zod";
import { CollaboratorError } from "../../errors.js";
import type {
  OrganizationAnalysis,
  OrganizationAnalysisParams,
  RepositoryPort,
  RepositorySearchParams,
  RepositorySearchResult,
} from "../../ports/repository.port.js";
import { requestJson } from "./http-json.js";

export interface GitHubRepositoryOptions {
  /** Optional; unauthenticated requests are rate limited harder. */
  token?: string;
  apiUrl?: string;
}

const RepoSchema = z.object({
  full_name: z.string(),
  description: z.string().nullish(),
  stargazers_count: z.number().default(0),
  language: z.string().nullish(),
});

const SearchResponseSchema = z.object({
  total_count: z.number().default(0),
  items: z.array(RepoSchema).default([]),
});

const OrgReposSchema = z.array(
  z.object({
    stargazers_count: z.number().default(0),
    language: z.string().nullish(),
  }),
);

const TopicsResponseSchema = z.object({
  items: z.array(z.object({ name: z.string() })).default([]),
});

export class GitHubRepositoryAdapter implements RepositoryPort {
  private readonly apiUrl: string;

  constructor(private readonly options: GitHubRepositoryOptions = {}) {
    this.apiUrl = (options.apiUrl ?? "https://api.github.com").replace(/\/+$/, "");
  }

  async searchRepositories(params: RepositorySearchParams): Promise<RepositorySearchResult> {
    const query = new URLSearchParams({
      q: params.query,
      sort: "stars",
      order: "desc",
      per_page: String(params.limit ?? 5),
    });
    const { body } = await requestJson(
      "repository",
      `${this.apiUrl}/search/repositories?${query.toString()}`,
      { method: "GET", headers: this.headers() },
      SearchResponseSchema,
    );
    return {
      totalCount: body.total_count,
      repositories: body.items.map((item) => ({
        fullName: item.full_name,
        description: item.description ?? undefined,
        stars: item.stargazers_count,
        language: item.language ?? undefined,
      })),
    };
  }

  async analyzeOrganization(params: OrganizationAnalysisParams): Promise<OrganizationAnalysis> {
    const organization = params.organization.trim();
    if (!organization) {
      throw new CollaboratorError("repository", "organization name required");
    }
    const query = new URLSearchParams({ per_page: "50", sort: "updated" });
    const { body } = await requestJson(
      "repository",
      `${this.apiUrl}/orgs/${encodeURIComponent(organization)}/repos?${query.toString()}`,
      { method: "GET", headers: this.headers() },
      OrgReposSchema,
    );

    const languageDistribution: Record<string, number> = {};
    let totalStars = 0;
    for (const repo of body) {
      totalStars += repo.stargazers_count;
      if (repo.language) {
        languageDistribution[repo.language] = (languageDistribution[repo.language] ?? 0) + 1;
      }
    }
    return {
      organization,
      totalRepos: body.length,
      totalStars,
      languages: Object.keys(languageDistribution),
      languageDistribution,
    };
  }

  async trendingTopics(): Promise<string[]> {
    const query = new URLSearchParams({ q: "is:featured", per_page: "30" });
    const { body } = await requestJson(
      "repository",
      `${this.apiUrl}/search/topics?${query.toString()}`,
      { method: "GET", headers: this.headers() },
      TopicsResponseSchema,
    );
    return body.items.map((item) => item.name);
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: "application/vnd.github.v3+json",
      "User-Agent": "fanweave",
    };
    if (this.options.token) headers.Authorization = `token ${this.options.token}`;
    return headers;
  }
}
