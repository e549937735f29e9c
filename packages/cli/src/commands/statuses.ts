import {
  MastodonClient,
  parseDateRange,
  parseMastodonSourceConfig,
  runTimelineFilter,
} from "@timeline-range/connectors";
import { isTimelineFilterError, loadRuntimeEnv } from "@timeline-range/shared";

import { CREDENTIALS_HINT, type CredentialArgs, readCredentialFlag, readFlagValue } from "../args";
import {
  formatDay,
  renderRunFooter,
  renderRunHeader,
  renderStatusItem,
} from "../ui/render";

export interface StatusesOptions extends CredentialArgs {
  start: string;
  end: string;
  full: boolean;
  json: boolean;
  timezone?: string;
  pageSize?: number;
}

export interface CommandDeps {
  env?: NodeJS.ProcessEnv;
  fetchImpl?: typeof fetch;
}

const DATE_HINT = "DD.MM.YYYY or YYYY-MM-DD";

export function parseStatusesArgs(args: string[]): StatusesOptions {
  let start: string | undefined;
  let end: string | undefined;
  let full = false;
  let json = false;
  let timezone: string | undefined;
  let pageSize: number | undefined;
  const credentials: CredentialArgs = {};

  for (let i = 0; i < args.length; i += 1) {
    const a = args[i];
    const consumed = readCredentialFlag(args, i, credentials);
    if (consumed >= 0) {
      i += consumed;
      continue;
    }
    if (a === "--start") {
      start = readFlagValue(args, i, a, DATE_HINT);
      i += 1;
      continue;
    }
    if (a === "--end") {
      end = readFlagValue(args, i, a, DATE_HINT);
      i += 1;
      continue;
    }
    if (a === "--timezone") {
      timezone = readFlagValue(args, i, a, "an IANA zone such as Europe/Berlin");
      i += 1;
      continue;
    }
    if (a === "--page-size") {
      const raw = readFlagValue(args, i, a, "an integer between 1 and 40");
      const parsed = Number.parseInt(raw, 10);
      if (!/^\d+$/.test(raw) || parsed < 1 || parsed > 40) {
        throw new Error("Invalid --page-size (expected an integer between 1 and 40)");
      }
      pageSize = parsed;
      i += 1;
      continue;
    }
    if (a === "--full") {
      full = true;
      continue;
    }
    if (a === "--json") {
      json = true;
      continue;
    }
    if (a === "--help" || a === "-h") {
      throw new Error("help");
    }
    throw new Error(`Unknown option: ${a}`);
  }

  if (!start) throw new Error(`Missing --start (expected ${DATE_HINT})`);
  if (!end) throw new Error(`Missing --end (expected ${DATE_HINT})`);

  return { start, end, full, json, timezone, pageSize, ...credentials };
}

export function printStatusesUsage(): void {
  console.log("Usage:");
  console.log(
    "  statuses --start <date> --end <date> [--full] [--json] [--instance URL] [--token TOKEN] [--timezone TZ] [--page-size N]",
  );
  console.log("");
  console.log("Examples:");
  console.log("  statuses --start 01.07.2023 --end 31.07.2023");
  console.log("  statuses --start 2023-07-01 --end 2023-07-31 --full");
  console.log("");
  console.log(CREDENTIALS_HINT);
}

export async function statusesCommand(args: string[] = [], deps: CommandDeps = {}): Promise<void> {
  let opts: StatusesOptions;
  try {
    opts = parseStatusesArgs(args);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (message === "help") {
      printStatusesUsage();
      return;
    }
    console.error(message);
    console.log("");
    printStatusesUsage();
    process.exitCode = 1;
    return;
  }

  try {
    const env = loadRuntimeEnv(deps.env);
    const instance = opts.instance ?? env.mastodonInstance;
    const token = opts.token ?? env.mastodonToken;
    if (!instance || !token) {
      console.error("Error: a Mastodon instance and an access token are required.");
      console.error(CREDENTIALS_HINT);
      process.exitCode = 1;
      return;
    }

    const timeZone = opts.timezone ?? env.timezone;
    const range = parseDateRange(opts.start, opts.end, { timeZone });
    const config = parseMastodonSourceConfig({
      instanceUrl: instance,
      accessToken: token,
      pageSize: opts.pageSize ?? env.pageSize,
      excerptChars: env.excerptChars,
      timeoutMs: env.requestTimeoutMs,
    });
    const client = new MastodonClient({
      instanceUrl: config.instanceUrl,
      accessToken: config.accessToken,
      timeoutMs: config.timeoutMs,
      fetchImpl: deps.fetchImpl,
    });

    if (!opts.json) {
      console.log(
        `Searching statuses between ${formatDay(range.start, timeZone)} and ${formatDay(range.end, timeZone)}...`,
      );
    }

    const run = await runTimelineFilter({
      client,
      range,
      fullContent: opts.full,
      excerptChars: config.excerptChars,
      pageSize: config.pageSize,
    });

    if (opts.json) {
      console.log(
        JSON.stringify(
          {
            account: { id: run.account.id, acct: run.account.acct },
            range: { start: range.start.toISOString(), end: range.end.toISOString() },
            stats: run.stats,
            items: run.items,
          },
          null,
          2,
        ),
      );
      return;
    }

    console.log(renderRunHeader(run.items.length));
    for (const item of run.items) {
      console.log(renderStatusItem(item, timeZone));
    }
    console.log(renderRunFooter(run.items.length));
  } catch (err) {
    if (isTimelineFilterError(err)) {
      console.error(`Error: ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}
