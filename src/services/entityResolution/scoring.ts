/**
 * Name similarity for entity resolution.
 *
 * Ratcliff/Obershelp sequence ratio over normalized names, plus a fixed bonus
 * when one name contains the other or matches its first-initial form, which is
 * how the stats provider abbreviates names ("J.Chase").
 */

import { CONTAINMENT_BONUS } from '../../config/constants';
import { abbreviatedForm, normalizeName } from './normalize';

interface MatchingBlock {
  aStart: number;
  bStart: number;
  size: number;
}

/**
 * Longest common substring of a[aLo:aHi] and b[bLo:bHi]. On ties the block
 * ending earliest in `a`, then earliest in `b`, wins.
 */
function findLongestMatch(
  a: string,
  aLo: number,
  aHi: number,
  b: string,
  bLo: number,
  bHi: number
): MatchingBlock {
  let best: MatchingBlock = { aStart: aLo, bStart: bLo, size: 0 };
  let previous = new Array<number>(bHi - bLo + 1).fill(0);

  for (let i = aLo; i < aHi; i++) {
    const current = new Array<number>(bHi - bLo + 1).fill(0);
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;
      const size = previous[j - bLo] + 1;
      current[j - bLo + 1] = size;
      if (size > best.size) {
        best = { aStart: i - size + 1, bStart: j - size + 1, size };
      }
    }
    previous = current;
  }

  return best;
}

/**
 * Total characters in the matching blocks found by recursively taking the
 * longest common substring and repeating on both remainders.
 */
export function countMatchingCharacters(a: string, b: string): number {
  let total = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (queue.length > 0) {
    const next = queue.pop();
    if (!next) break;
    const [aLo, aHi, bLo, bHi] = next;
    const block = findLongestMatch(a, aLo, aHi, b, bLo, bHi);
    if (block.size === 0) continue;

    total += block.size;
    if (aLo < block.aStart && bLo < block.bStart) {
      queue.push([aLo, block.aStart, bLo, block.bStart]);
    }
    const aEnd = block.aStart + block.size;
    const bEnd = block.bStart + block.size;
    if (aEnd < aHi && bEnd < bHi) {
      queue.push([aEnd, aHi, bEnd, bHi]);
    }
  }

  return total;
}

/**
 * 2 * M / (|a| + |b|). The pair is put in a fixed order first so the result
 * does not depend on argument order.
 */
export function sequenceRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  const [first, second] = a <= b ? [a, b] : [b, a];
  return (2 * countMatchingCharacters(first, second)) / total;
}

/**
 * True when the shorter name is contained in the longer one, either literally
 * or in the longer name's first-initial form.
 */
export function hasContainment(normalizedA: string, normalizedB: string): boolean {
  if (normalizedA === '' || normalizedB === '') return false;
  const [shorter, longer] =
    normalizedA.length <= normalizedB.length ? [normalizedA, normalizedB] : [normalizedB, normalizedA];

  if (longer.includes(shorter)) return true;
  return abbreviatedForm(longer).includes(shorter);
}

/**
 * Similarity of two raw names in [0, 1]. Identical normalized forms score
 * exactly 1; an empty normalized name scores 0 against everything.
 */
export function similarity(nameA: string, nameB: string): number {
  return similarityOfNormalized(normalizeName(nameA), normalizeName(nameB));
}

export function similarityOfNormalized(normalizedA: string, normalizedB: string): number {
  if (normalizedA === '' || normalizedB === '') return 0;
  if (normalizedA === normalizedB) return 1.0;

  let score = sequenceRatio(normalizedA, normalizedB);
  if (hasContainment(normalizedA, normalizedB)) {
    score += CONTAINMENT_BONUS;
  }
  return Math.min(1, score);
}
