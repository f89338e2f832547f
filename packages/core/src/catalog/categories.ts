import type { DomainCategory, RecencyCategory } from '@newscheck/shared/src/types/fact-check.types.js';
import { DOMAIN_CATEGORIES } from '@newscheck/shared/src/types/fact-check.types.js';

const RECENCY_ALIASES: ReadonlyMap<string, RecencyCategory> = new Map([
  ['evergreen', 'Evergreen'],
  ['evergreen news', 'Evergreen'],
  ['realtime', 'Realtime'],
  ['real-time', 'Realtime'],
  ['real-time news', 'Realtime'],
]);

function normalizeLabel(label: string): string {
  return label.trim().replace(/\s+/g, ' ').toLowerCase();
}

/** Accepts the classifier's labels as well as the bare category names. */
export function parseRecencyCategory(label: string): RecencyCategory | undefined {
  return RECENCY_ALIASES.get(normalizeLabel(label));
}

export function parseDomainCategory(label: string): DomainCategory | undefined {
  const normalized = normalizeLabel(label);
  return DOMAIN_CATEGORIES.find((domain) => domain.toLowerCase() === normalized);
}
