import type {
  Claim,
  DomainCategory,
  FactCheckReport,
  FactCheckReportRecord,
  FactCheckStatus,
} from '@newscheck/shared/src/types/fact-check.types.js';
import type { FactCheckGraphState } from './fact-check-state.js';

export const RECENCY_NOT_RECOGNIZED = 'Recency category not recognized; fact-check not performed.';

function freezeReport(report: FactCheckReport): FactCheckReport {
  return Object.freeze({
    ...report,
    trustedUrls: Object.freeze([...report.trustedUrls]),
    sourcesUsed: Object.freeze([...report.sourcesUsed]),
    scrapedContents: Object.freeze([...report.scrapedContents]),
    processingErrors: Object.freeze([...report.processingErrors]),
    debugData: Object.freeze({ ...report.debugData }),
  });
}

export function unsupportedReport(domainCategory: DomainCategory, claimId?: string): FactCheckReport {
  return freezeReport({
    claimId,
    recencyCategory: undefined,
    domainCategory,
    trustedUrls: [],
    sourcesUsed: [],
    scrapedContents: [],
    scrapedContentCount: 0,
    summarizedAnswer: '',
    factCheckAssessment: RECENCY_NOT_RECOGNIZED,
    furtherEducationSuggestions: '',
    trustScore: 0,
    processingErrors: [],
    status: 'unsupported',
    success: false,
    debugData: {},
  });
}

export function reportFromState(state: FactCheckGraphState): FactCheckReport {
  const status: FactCheckStatus = state.status ?? 'failed';

  return freezeReport({
    claimId: state.claim.id,
    recencyCategory: state.claim.recencyCategory,
    domainCategory: state.claim.domainCategory,
    trustedUrls: state.trustedUrls,
    sourcesUsed: state.trustedUrls,
    scrapedContents: state.scrapedContents,
    scrapedContentCount: state.scrapedContents.length,
    summarizedAnswer: state.summarizedAnswer,
    factCheckAssessment: state.factCheckAssessment,
    furtherEducationSuggestions: state.furtherEducationSuggestions,
    trustScore: state.trustScore,
    processingErrors: state.processingErrors,
    status,
    success: status === 'completed',
    debugData: state.savedFile ? { savedFile: state.savedFile } : {},
  });
}

/** Report for a run that threw outside any stage. */
export function failedReport(claim: Claim, message: string): FactCheckReport {
  return freezeReport({
    claimId: claim.id,
    recencyCategory: claim.recencyCategory,
    domainCategory: claim.domainCategory,
    trustedUrls: [],
    sourcesUsed: [],
    scrapedContents: [],
    scrapedContentCount: 0,
    summarizedAnswer: '',
    factCheckAssessment: '',
    furtherEducationSuggestions: '',
    trustScore: 0,
    processingErrors: [`Fact-checking failed: ${message}`],
    status: 'failed',
    success: false,
    debugData: {},
  });
}

/** Public JSON shape of a report. Scraped page texts stay in the debug artifact. */
export function toReportRecord(report: FactCheckReport): FactCheckReportRecord {
  return {
    news_id: report.claimId ?? null,
    trusted_urls: [...report.trustedUrls],
    scraped_content_count: report.scrapedContentCount,
    summarized_answer: report.summarizedAnswer,
    fact_check_assessment: report.factCheckAssessment,
    further_education_suggestions: report.furtherEducationSuggestions,
    trust_score: report.trustScore,
    processing_errors: [...report.processingErrors],
    sources_used: [...report.sourcesUsed],
    fact_check_status: report.status,
    success: report.success,
    debug_data: report.debugData.savedFile ? { saved_file: report.debugData.savedFile } : {},
  };
}
