/**
 * Name, team and position canonicalization.
 *
 * Every function here is pure and total: garbage in, garbage (usually the empty
 * string) out, never an exception.
 */

const GENERATIONAL_SUFFIXES = new Set(['jr', 'sr', 'ii', 'iii', 'iv', 'v']);

// Characters that separate name tokens ("C.McCaffrey", "Amon-Ra") become spaces.
const TOKEN_SEPARATORS = /[._-]+/g;
const NON_LETTERS = /[^\p{L}\s]/gu;

/**
 * Canonicalize a display name into a comparable key.
 *
 * "C.McCaffrey" -> "c mccaffrey", "Ja'Marr Chase" -> "jamarr chase",
 * "Mike Williams Jr." -> "mike williams".
 */
export function normalizeName(raw: string | null | undefined): string {
  if (!raw) return '';

  const cleaned = raw
    .normalize('NFKD')
    .toLowerCase()
    .replace(TOKEN_SEPARATORS, ' ')
    .replace(NON_LETTERS, '')
    .replace(/\s+/g, ' ')
    .trim();

  if (cleaned === '') return '';

  const tokens = cleaned.split(' ');
  while (tokens.length > 1 && GENERATIONAL_SUFFIXES.has(tokens[tokens.length - 1])) {
    tokens.pop();
  }
  return tokens.join(' ');
}

/**
 * First initial plus the remaining tokens: "jamarr chase" -> "j chase".
 * Single-token names are returned unchanged.
 */
export function abbreviatedForm(normalized: string): string {
  const tokens = normalized.split(' ').filter(Boolean);
  if (tokens.length < 2) return normalized;
  return `${tokens[0][0]} ${tokens.slice(1).join(' ')}`;
}

export function splitDisplayName(raw: string): { firstName: string | null; lastName: string | null } {
  const parts = raw.trim().split(/\s+/).filter(Boolean);
  if (parts.length === 0) return { firstName: null, lastName: null };
  if (parts.length === 1) return { firstName: parts[0], lastName: null };
  return { firstName: parts[0], lastName: parts.slice(1).join(' ') };
}

// ========== Teams ==========

export const TEAM_ALIASES: Record<string, string> = {
  JAX: 'JAC',
  WSH: 'WAS',
  LA: 'LAR',
  ARZ: 'ARI',
  SD: 'LAC',
  STL: 'LAR',
  TAM: 'TB',
  GNB: 'GB',
  SFO: 'SF',
  SFN: 'SF',
  KAN: 'KC',
  NOR: 'NO',
  NWE: 'NE',
};

export function normalizeTeam(team: string | null | undefined): string | null {
  if (!team) return null;
  const code = team.trim().toUpperCase();
  if (code === '') return null;
  return TEAM_ALIASES[code] ?? code;
}

// ========== Positions ==========

const DEFENSE_POSITIONS = new Set(['DEF', 'D', 'D/ST', 'DST', 'DEFENSE', 'D-ST']);

/** Primary position of values like "RB/FLEX"; defense variants become "DST". */
export function normalizePosition(position: string | null | undefined): string | null {
  if (!position) return null;
  const value = position.trim().toUpperCase();
  if (value === '') return null;
  if (DEFENSE_POSITIONS.has(value)) return 'DST';

  const primary = value.split('/')[0].trim();
  if (primary === '') return null;
  return DEFENSE_POSITIONS.has(primary) ? 'DST' : primary;
}

/** Bootstrap identity of a player: normalized name, position and team. */
export function playerFingerprint(
  name: string,
  position: string | null | undefined,
  team: string | null | undefined
): string {
  return [normalizeName(name), normalizePosition(position) ?? '', normalizeTeam(team) ?? ''].join('|');
}
