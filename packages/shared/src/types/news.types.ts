import type { DomainCategory, FactCheckReportRecord, RecencyCategory } from './fact-check.types.js';

export interface NewsItemInput {
  readonly id?: string;
  readonly text?: string;
  readonly url?: string;
}

export interface NewsClassification {
  readonly recencyCategory?: RecencyCategory;
  readonly domainCategory: DomainCategory;
  readonly newsTypeLabel: string;
  readonly domainLabel: string;
  readonly rawOutput: string;
}

export interface FailedNewsItemResult {
  readonly id: string;
  readonly status: 'failed';
  readonly error: string;
}

export interface ProcessedNewsItemResult extends Partial<FactCheckReportRecord> {
  readonly id: string;
  readonly status: 'processed';
  readonly original_text: string;
  readonly original_url: string;
  readonly processed_content: string;
  readonly raw_classifier_output: string;
  readonly news_type: string;
  readonly misinformation_domain: string;
  readonly timestamp: string;
  readonly fact_check_completed: boolean;
  readonly fact_check_result?: string;
  readonly fact_check_error?: string;
}

export type NewsItemResult = FailedNewsItemResult | ProcessedNewsItemResult;

export interface NewsBatchResult {
  readonly processed_count: number;
  readonly results: readonly NewsItemResult[];
  readonly status: 'completed';
  readonly timestamp: string;
  readonly results_file?: string;
}

export interface ResultFileInfo {
  readonly filename: string;
  readonly sizeBytes: number;
  readonly modified: Date;
}
