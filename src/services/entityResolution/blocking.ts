/**
 * Candidate blocking for the fuzzy scan.
 *
 * A candidate is skipped only when an upper bound on its score is already
 * below the acceptance threshold, so blocking never changes which player is
 * accepted or whether a record is ambiguous.
 */

import { CONTAINMENT_BONUS } from '../../config/constants';

function countCharacters(value: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const char of value) {
    counts.set(char, (counts.get(char) ?? 0) + 1);
  }
  return counts;
}

/**
 * Upper bound on sequenceRatio from shared character counts alone.
 */
export function quickRatioBound(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;

  const counts = countCharacters(a);
  let shared = 0;
  for (const char of b) {
    const remaining = counts.get(char) ?? 0;
    if (remaining > 0) {
      shared++;
      counts.set(char, remaining - 1);
    }
  }
  return (2 * shared) / total;
}

/**
 * Upper bound on sequenceRatio from lengths alone.
 */
export function lengthRatioBound(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * Math.min(a.length, b.length)) / total;
}

export function canReachThreshold(normalizedA: string, normalizedB: string, threshold: number): boolean {
  if (normalizedA === '' || normalizedB === '') return false;
  if (normalizedA === normalizedB) return true;
  if (Math.min(1, lengthRatioBound(normalizedA, normalizedB) + CONTAINMENT_BONUS) < threshold) {
    return false;
  }
  return Math.min(1, quickRatioBound(normalizedA, normalizedB) + CONTAINMENT_BONUS) >= threshold;
}

export interface BlockingStats {
  considered: number;
  scored: number;
  blocked: number;
}

export function createBlockingStats(): BlockingStats {
  return { considered: 0, scored: 0, blocked: 0 };
}
