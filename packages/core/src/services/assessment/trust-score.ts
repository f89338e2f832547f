import type { RecencyCategory } from '@newscheck/shared/src/types/fact-check.types.js';

interface ScoreRule {
  readonly label: string;
  readonly score: number;
}

interface ScoreTable {
  readonly caseSensitive: boolean;
  readonly rules: readonly ScoreRule[];
}

// Order matters: the first label found anywhere in the verdict wins.
const SCORE_TABLES: Readonly<Record<RecencyCategory, ScoreTable>> = {
  Evergreen: {
    caseSensitive: true,
    rules: [
      { label: 'True', score: 9.0 },
      { label: 'Potentially Misleading', score: 5.0 },
      { label: 'False', score: 1.0 },
    ],
  },
  Realtime: {
    caseSensitive: false,
    rules: [
      { label: 'true', score: 8.0 },
      { label: 'needs verification', score: 4.0 },
      { label: 'false', score: 1.0 },
    ],
  },
};

export const UNSCORED = 0.0;

export function computeTrustScore(recencyCategory: RecencyCategory, verdict: string): number {
  const table = SCORE_TABLES[recencyCategory];
  const haystack = table.caseSensitive ? verdict : verdict.toLowerCase();

  const match = table.rules.find((rule) => haystack.includes(rule.label));
  return match?.score ?? UNSCORED;
}
