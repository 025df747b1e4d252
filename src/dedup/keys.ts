/**
 * Deterministic dedup key for repeat-alert suppression.
 * Same player + stat + line + favored side + calendar date -> same key.
 * No Date.now() inside; the calendar date comes from the game start in a fixed timezone.
 */

import { normalizeName } from "../matching/names";
import type { Prop, QuoteSide } from "../types";

/** YYYY-MM-DD of `at` in `timeZone`. */
export function calendarDate(at: Date, timeZone: string): string {
  const formatter = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  });
  return formatter.format(at);
}

function formatLine(line: number): string {
  return Number.isInteger(line) ? line.toFixed(1) : String(line);
}

export function computeDedupKey(prop: Prop, favoredSide: QuoteSide, timeZone: string): string {
  return [
    normalizeName(prop.player),
    prop.statCategory.trim().toLowerCase(),
    formatLine(prop.line),
    favoredSide,
    calendarDate(prop.gameStartTime, timeZone),
  ].join("|");
}
