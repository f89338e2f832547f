export const RECENCY_CATEGORIES = ['Evergreen', 'Realtime'] as const;
export type RecencyCategory = (typeof RECENCY_CATEGORIES)[number];

export const DOMAIN_CATEGORIES = ['Health', 'Finance', 'General', 'Other'] as const;
export type DomainCategory = (typeof DOMAIN_CATEGORIES)[number];

export interface Claim {
  readonly id?: string;
  readonly text: string;
  readonly recencyCategory: RecencyCategory;
  readonly domainCategory: DomainCategory;
}

export interface SearchHit {
  readonly link: string;
  readonly position: number;
}

export interface ScrapeResult {
  readonly url: string;
  readonly content?: string;
  readonly proxy?: string;
  readonly attempts: number;
  readonly failure?: string;
}

/**
 * Terminal state of a fact-check run.
 *
 * `no_sources` and `no_content` are early exits without an error; `failed` means
 * a stage threw. Only `completed` carries `success: true`.
 */
export type FactCheckStatus = 'completed' | 'no_sources' | 'no_content' | 'failed' | 'unsupported';

export interface FactCheckDebugData {
  readonly savedFile?: string;
}

export interface FactCheckReport {
  readonly claimId?: string;
  readonly recencyCategory?: RecencyCategory;
  readonly domainCategory: DomainCategory;
  readonly trustedUrls: readonly string[];
  readonly sourcesUsed: readonly string[];
  readonly scrapedContents: readonly string[];
  readonly scrapedContentCount: number;
  readonly summarizedAnswer: string;
  readonly factCheckAssessment: string;
  readonly furtherEducationSuggestions: string;
  readonly trustScore: number;
  readonly processingErrors: readonly string[];
  readonly status: FactCheckStatus;
  readonly success: boolean;
  readonly debugData: FactCheckDebugData;
}

export interface FactCheckReportRecord {
  readonly news_id: string | null;
  readonly trusted_urls: readonly string[];
  readonly scraped_content_count: number;
  readonly summarized_answer: string;
  readonly fact_check_assessment: string;
  readonly further_education_suggestions: string;
  readonly trust_score: number;
  readonly processing_errors: readonly string[];
  readonly sources_used: readonly string[];
  readonly fact_check_status: FactCheckStatus;
  readonly success: boolean;
  readonly debug_data: { readonly saved_file?: string };
}

export interface DebugArtifact {
  readonly inputNewsText: string;
  readonly recencyCategory: RecencyCategory;
  readonly domainCategory: DomainCategory;
  readonly trustedUrlsFound: readonly string[];
  readonly scrapedContents: readonly string[];
  readonly summarizedAnswer: string;
  readonly factCheckAssessment: string;
  readonly furtherEducationSuggestions: string;
  readonly trustScore: number;
  readonly timestamp: string;
}
