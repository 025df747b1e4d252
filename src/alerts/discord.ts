/**
 * Discord webhook delivery: one embed per scan, optimal-window plays first.
 */

import { request } from "undici";
import { formatAmerican, probabilityToAmerican } from "../odds/converter";
import { slipHeadline, UNIT_POLICY } from "../strategy/slips";
import type { Recommendation } from "../types";

export interface DiscordEmbed {
  title: string;
  description: string;
  color: number;
  timestamp: string;
  footer?: { text: string };
}

export interface DiscordPayload {
  embeds: DiscordEmbed[];
}

export interface ReportFormatOptions {
  now: Date;
  maxPerSection: number;
  optimalHours: number;
  sharpBook: string | null;
}

const TITLE = "🎯 Prop +EV Scanner";
const COLOR_PLAYS = 0x00ff00;
const COLOR_EMPTY = 0x808080;
const RULE = "━━━━━━━━━━━━━━━━━━━━━━";

const SPORT_EMOJI: Array<[RegExp, string]> = [
  [/^(basketball|nba|wnba|ncaab)/i, "🏀"],
  [/^(americanfootball|nfl|ncaaf)/i, "🏈"],
  [/^(baseball|mlb)/i, "⚾"],
  [/^(icehockey|nhl)/i, "🏒"],
];

export function sportEmoji(sport: string | undefined): string {
  if (sport) {
    for (const [pattern, emoji] of SPORT_EMOJI) {
      if (pattern.test(sport)) return emoji;
    }
  }
  return "🎯";
}

export function timeBadge(hoursUntilGame: number): string {
  if (hoursUntilGame <= 2) return "🔥";
  if (hoursUntilGame <= 6) return "⏰";
  return "📅";
}

export function formatPlay(rec: Recommendation): string {
  const { prop } = rec;
  const headline = slipHeadline(rec.qualifyingSlipTypes);
  const slipMark = headline === "5/6 Flex" || headline === "4+ Flex" || headline === "4 Power" ? "✅" : "⚠️";
  const bookLine = rec.lineDelta > 0 ? `${rec.bookmaker} ${rec.line} (Δ${rec.lineDelta.toFixed(1)})` : `${rec.bookmaker} ${rec.line}`;
  const lines = [
    `${sportEmoji(prop.sport)} **${prop.player}** ${rec.favoredSide.toUpperCase()} ${prop.line} ${prop.statCategory}`,
    `   ${prop.matchup || "matchup n/a"} | ${bookLine}`,
    `   📊 **${(rec.favoredProbability * 100).toFixed(1)}%** fair (${formatAmerican(probabilityToAmerican(rec.favoredProbability))}) | **+${rec.ev.toFixed(1)}%** EV`,
    `   ${slipMark} ${headline} | ${timeBadge(rec.hoursUntilGame)} ${rec.hoursUntilGame.toFixed(1)}h`,
  ];
  if (rec.discouraged) {
    const avoid = rec.qualifyingSlipTypes.filter((_, i) => rec.discouragedFlags[i]);
    lines.push(`   ⚠️ Avoid: ${avoid.join(", ")}`);
  }
  return lines.join("\n");
}

function formatSection(title: string, recs: Recommendation[], cap: number): string[] {
  if (recs.length === 0) return [];
  const shown = recs.slice(0, cap);
  const lines = [`**${title}**`, ...shown.map((r) => formatPlay(r) + "\n")];
  if (recs.length > shown.length) lines.push(`…and ${recs.length - shown.length} more`);
  return lines;
}

function unitPolicyLines(): string[] {
  return ["💰 **Unit sizing:**", ...UNIT_POLICY.map((u) => `• ${u.slips}: ${u.units}`)];
}

/** Recommendations are expected in ranked order; each section keeps it. */
export function formatReport(recs: readonly Recommendation[], options: ReportFormatOptions): DiscordPayload {
  const timestamp = options.now.toISOString();
  if (recs.length === 0) {
    return {
      embeds: [
        {
          title: TITLE,
          description: [
            "**No +EV plays found at this time.**",
            "",
            `Check back closer to game time (within ${options.optimalHours}h is optimal).`,
            "",
            ...unitPolicyLines(),
          ].join("\n"),
          color: COLOR_EMPTY,
          timestamp,
        },
      ],
    };
  }

  const optimal = recs.filter((r) => r.optimalWindow);
  const upcoming = recs.filter((r) => !r.optimalWindow);
  const lines = [
    `Found **${recs.length}** +EV plays!`,
    `🔥 = optimal window (≤ ${options.optimalHours}h until game)`,
    RULE,
    ...formatSection(`🔥 Optimal window (${optimal.length})`, optimal, options.maxPerSection),
    ...formatSection(`⏰ Upcoming (${upcoming.length})`, upcoming, options.maxPerSection),
    RULE,
    ...unitPolicyLines(),
  ];
  return {
    embeds: [
      {
        title: TITLE,
        description: lines.join("\n"),
        color: COLOR_PLAYS,
        timestamp,
        footer: { text: `Line comparison | Sharp book: ${options.sharpBook ?? "best available"}` },
      },
    ],
  };
}

/** POST the payload. True on 200/204; anything else is logged and reported as false. */
export async function postToDiscord(webhookUrl: string, payload: DiscordPayload, timeoutMs = 30_000): Promise<boolean> {
  try {
    const { statusCode, body } = await request(webhookUrl, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(payload),
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
    });
    await body.dump();
    if (statusCode === 200 || statusCode === 204) {
      console.log("[alerts] Posted to Discord");
      return true;
    }
    console.warn(`[alerts] Discord webhook returned ${statusCode}`);
    return false;
  } catch (e) {
    console.warn("[alerts] Discord post failed:", e instanceof Error ? e.message : String(e));
    return false;
  }
}
