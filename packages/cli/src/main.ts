import { loadDotEnvIfPresent } from "@timeline-range/shared";

import { statusesCommand } from "./commands/statuses";
import { whoamiCommand } from "./commands/whoami";

type CommandResult = void | Promise<void>;

function printHelp(): void {
  console.log("timeline-range CLI");
  console.log("");
  console.log("Commands:");
  console.log("  statuses --start <date> --end <date> [--full] [--json] [--instance URL] [--token TOKEN]");
  console.log("           [--timezone TZ] [--page-size N]");
  console.log("  whoami [--instance URL] [--token TOKEN]");
  console.log("");
  console.log("Dates: DD.MM.YYYY or YYYY-MM-DD. Credentials fall back to MASTODON_INSTANCE / MASTODON_TOKEN.");
}

async function main(): Promise<void> {
  loadDotEnvIfPresent();

  let [cmd, ...rest] = process.argv.slice(2);
  // npm forwards the argument separator through to the script as a literal "--".
  if (cmd === "--") {
    [cmd, ...rest] = rest;
  }

  let result: CommandResult;
  switch (cmd) {
    case "statuses":
      result = statusesCommand(rest);
      break;
    case "whoami":
      result = whoamiCommand(rest);
      break;
    default:
      printHelp();
      result = undefined;
      break;
  }

  await result;
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
