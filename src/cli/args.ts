import { parseArgs } from "util";

export const USAGE = [
  "Usage:",
  "  prop-ev-scanner [--demo] [--sport <key>] [--props <file>] [--api-key <key>] [--webhook <url>] [--no-post]",
  "  prop-ev-scanner --manual <over_odds> <under_odds>",
].join("\n");

export type CliCommand =
  | { mode: "help" }
  | { mode: "manual"; overOdds: number; underOdds: number }
  | {
      mode: "scan";
      demo: boolean;
      sport: string | null;
      propsPath: string | null;
      apiKey: string | null;
      webhook: string | null;
      post: boolean;
    };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/** Signed integer only: "-110", "+120", "150". */
export function parseOddsArg(raw: string | undefined): number {
  if (raw === undefined || !/^[+-]?\d+$/.test(raw.trim())) {
    throw new UsageError(`Odds must be signed integers, got ${raw === undefined ? "nothing" : JSON.stringify(raw)}`);
  }
  return Number(raw.trim());
}

function parseOptions(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: false,
    strict: true,
    options: {
      demo: { type: "boolean", default: false },
      sport: { type: "string" },
      props: { type: "string" },
      "api-key": { type: "string" },
      webhook: { type: "string" },
      "no-post": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}

/**
 * Parse argv (without node and script). `--manual` takes its two values raw,
 * since "-110" would otherwise read as an option.
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const manualAt = argv.indexOf("--manual");
  if (manualAt !== -1) {
    const overOdds = parseOddsArg(argv[manualAt + 1]);
    const underOdds = parseOddsArg(argv[manualAt + 2]);
    return { mode: "manual", overOdds, underOdds };
  }

  let values: ReturnType<typeof parseOptions>["values"];
  try {
    values = parseOptions(argv).values;
  } catch (e) {
    throw new UsageError(e instanceof Error ? e.message : String(e));
  }

  if (values.help) return { mode: "help" };
  return {
    mode: "scan",
    demo: values.demo ?? false,
    sport: values.sport ?? null,
    propsPath: values.props ?? null,
    apiKey: values["api-key"] ?? null,
    webhook: values.webhook ?? null,
    post: !(values["no-post"] ?? false),
  };
}
