/**
 * Deterministic player-name resolution.
 * Precedence: exact > alias > edit distance (bounded) > no match.
 */

import type { PlayerMatchLevel } from "../types";

/** Case-fold, strip accents and punctuation, collapse spaces. */
export function normalizeName(name: string): string {
  return name
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

/** Alias table keyed and valued by normalized names. */
export type AliasTable = ReadonlyMap<string, string>;

export function buildAliasTable(raw: Record<string, string>): AliasTable {
  const table = new Map<string, string>();
  for (const [alias, canonical] of Object.entries(raw)) {
    table.set(normalizeName(alias), normalizeName(canonical));
  }
  return table;
}

function canonical(normalized: string, aliases: AliasTable): string {
  return aliases.get(normalized) ?? normalized;
}

/**
 * Levenshtein distance, or maxDistance + 1 as soon as it is certain to exceed maxDistance.
 */
export function boundedEditDistance(a: string, b: string, maxDistance: number): number {
  if (a === b) return 0;
  if (Math.abs(a.length - b.length) > maxDistance) return maxDistance + 1;

  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const curr = [i];
    let rowMin = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      const value = Math.min(prev[j - 1] + cost, prev[j] + 1, curr[j - 1] + 1);
      curr.push(value);
      if (value < rowMin) rowMin = value;
    }
    if (rowMin > maxDistance) return maxDistance + 1;
    prev = curr;
  }
  const distance = prev[b.length];
  return distance > maxDistance ? maxDistance + 1 : distance;
}

export interface NameMatchOptions {
  aliases: AliasTable;
  maxEditDistance: number;
}

/**
 * How two player names match, or null. Edit distance is measured on the
 * canonical (alias-resolved) forms.
 */
export function matchPlayerName(
  propName: string,
  quoteName: string,
  options: NameMatchOptions
): PlayerMatchLevel | null {
  const a = normalizeName(propName);
  const b = normalizeName(quoteName);
  if (!a || !b) return null;
  if (a === b) return "exact";

  const ca = canonical(a, options.aliases);
  const cb = canonical(b, options.aliases);
  if (ca === cb) return "alias";

  if (options.maxEditDistance > 0 && boundedEditDistance(ca, cb, options.maxEditDistance) <= options.maxEditDistance) {
    return "fuzzy";
  }
  return null;
}

const LEVEL_RANK: Record<PlayerMatchLevel, number> = { exact: 0, alias: 1, fuzzy: 2 };

export function compareMatchLevel(a: PlayerMatchLevel, b: PlayerMatchLevel): number {
  return LEVEL_RANK[a] - LEVEL_RANK[b];
}
