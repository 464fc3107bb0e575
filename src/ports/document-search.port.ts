// =============================================================================
// DocumentSearchPort — Full-text search over supplier documents
// =============================================================================

export interface DocumentSearchParams {
  query: string;
  /** Maximum number of documents returned (default: 5) */
  top?: number;
  /** Rank by meaning rather than keywords; fills `captions`. */
  semantic?: boolean;
}

export interface SearchDocument {
  id?: string;
  title: string;
  content: string;
  /** Relevance score assigned by the index. */
  score: number;
  /** Passages the index extracted as most relevant; empty for keyword queries. */
  captions: string[];
}

export interface DocumentSearchResult {
  documents: SearchDocument[];
  /** Total number of matches reported by the index, which may exceed `documents.length`. */
  total: number;
  elapsedMs: number;
}

export interface DocumentSearchPort {
  search(params: DocumentSearchParams): Promise<DocumentSearchResult>;
}
