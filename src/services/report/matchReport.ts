import type { MatchMethod, MatchResult } from '../../types/players';

export interface MatchCounts {
  total: number;
  matched: number;
  unmatched: number;
  ambiguous: number;
}

export interface MatchReport {
  matched: MatchResult[];
  unmatched: MatchResult[];
  ambiguous: MatchResult[];
  counts: MatchCounts;
  byMethod: Record<MatchMethod, number>;
  /** Percentage of records matched; 0 for an empty batch. */
  matchRate: number;
}

export function buildMatchReport(results: readonly MatchResult[]): MatchReport {
  const report: MatchReport = {
    matched: [],
    unmatched: [],
    ambiguous: [],
    counts: { total: results.length, matched: 0, unmatched: 0, ambiguous: 0 },
    byMethod: { exact_crosswalk: 0, alias_lookup: 0, fuzzy_match: 0 },
    matchRate: 0,
  };

  for (const result of results) {
    report[result.status].push(result);
    report.counts[result.status]++;
    if (result.status === 'matched' && result.method) {
      report.byMethod[result.method]++;
    }
  }

  report.matchRate = results.length === 0 ? 0 : (100 * report.counts.matched) / results.length;
  return report;
}

export function summarizeReport(report: MatchReport): string {
  const { total, matched, unmatched, ambiguous } = report.counts;
  return `Matched ${matched}/${total} (${report.matchRate.toFixed(1)}%), unmatched ${unmatched}, ambiguous ${ambiguous}`;
}
