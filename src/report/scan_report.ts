import { formatAmerican, probabilityToAmerican } from "../odds/converter";
import type { ManualCheck } from "../scan/manual";
import type { Recommendation, ScanSummary } from "../types";

function formatSection(title: string, lines: string[]): string {
  return `\n## ${title}\n${lines.join("\n")}\n`;
}

function pct(p: number): string {
  return `${(p * 100).toFixed(1)}%`;
}

function fairOdds(p: number): string {
  return formatAmerican(probabilityToAmerican(p));
}

function signedPct(v: number): string {
  return `${v >= 0 ? "+" : ""}${v.toFixed(1)}%`;
}

export function formatManualCheck(check: ManualCheck): string {
  const { fair, evaluation, slips } = check;
  const lines: string[] = [];
  lines.push("# Manual line check");
  lines.push(`Over ${formatAmerican(check.overOdds)} | Under ${formatAmerican(check.underOdds)}`);
  lines.push(`Vig: ${pct(fair.vig)}`);
  lines.push(formatSection("Fair probabilities", [
    `  Over:  ${pct(fair.probA)} (fair ${fairOdds(fair.probA)}, EV ${signedPct(check.overEv)})`,
    `  Under: ${pct(fair.probB)} (fair ${fairOdds(fair.probB)}, EV ${signedPct(check.underEv)})`,
    `  Favored: ${evaluation.favoredSide.toUpperCase()} ${pct(evaluation.favoredProbability)}`,
  ]).trim());

  const slipLines = slips.qualifying.length
    ? slips.qualifying.map((s) => `  ${s.type} (break-even ${(s.breakEven * 100).toFixed(2)}%)${s.discouraged ? " [avoid]" : ""}`)
    : ["  SKIP: below every slip break-even"];
  lines.push(formatSection("Slips", slipLines).trim());
  return lines.join("\n");
}

export function formatScanSummary(summary: ScanSummary): string {
  return formatSection("Scan summary", [
    `Props in: ${summary.propsIn} (quotes: ${summary.quotesIn})`,
    `Out of game window: ${summary.outOfWindow}`,
    `Matched: ${summary.matched}`,
    `Unmatched: ${summary.unmatched}`,
    `Invalid odds: ${summary.invalidOdds}`,
    `Below min EV: ${summary.belowMinEv}`,
    `No qualifying slip: ${summary.noQualifyingSlip}`,
    `Suppressed (already alerted): ${summary.suppressed}`,
    `Purged alert records: ${summary.purgedRecords}`,
    `Recommended: ${summary.recommended}`,
    `Alert store: ${summary.storeMode}`,
  ]).trim();
}

/** Console fallback when no webhook is configured. */
export function formatRecommendationsText(recs: readonly Recommendation[]): string {
  if (recs.length === 0) return "No +EV plays found.";
  return recs
    .map((r) =>
      [
        `${r.prop.player} ${r.favoredSide.toUpperCase()} ${r.prop.line} ${r.prop.statCategory}${r.optimalWindow ? " [optimal]" : ""}`,
        `   Fair: ${pct(r.favoredProbability)} | EV: ${signedPct(r.ev)} | ${r.bookmaker} ${r.line} | ${r.hoursUntilGame.toFixed(1)}h`,
        `   Slips: ${r.qualifyingSlipTypes.join(", ")}`,
      ].join("\n")
    )
    .join("\n\n");
}
