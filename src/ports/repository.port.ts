// =============================================================================
// RepositoryPort — Source-hosting lookups used for technology analysis
// =============================================================================

export interface RepositorySummary {
  fullName: string;
  description?: string;
  stars: number;
  language?: string;
}

export interface RepositorySearchParams {
  query: string;
  /** Maximum number of repositories returned (default: 5) */
  limit?: number;
}

export interface RepositorySearchResult {
  totalCount: number;
  repositories: RepositorySummary[];
}

export interface OrganizationAnalysisParams {
  organization: string;
}

export interface OrganizationAnalysis {
  organization: string;
  totalRepos: number;
  totalStars: number;
  /** Languages in order of first appearance. */
  languages: string[];
  languageDistribution: Record<string, number>;
}

export interface RepositoryPort {
  searchRepositories(params: RepositorySearchParams): Promise<RepositorySearchResult>;
  analyzeOrganization(params: OrganizationAnalysisParams): Promise<OrganizationAnalysis>;
  /** Topic names the host currently features. */
  trendingTopics(): Promise<string[]>;
}
