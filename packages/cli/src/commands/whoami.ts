import { MastodonClient, parseMastodonSourceConfig } from "@timeline-range/connectors";
import { isTimelineFilterError, loadRuntimeEnv } from "@timeline-range/shared";

import { CREDENTIALS_HINT, type CredentialArgs, readCredentialFlag } from "../args";
import type { CommandDeps } from "./statuses";

export async function whoamiCommand(args: string[] = [], deps: CommandDeps = {}): Promise<void> {
  const credentials: CredentialArgs = {};
  try {
    for (let i = 0; i < args.length; i += 1) {
      const consumed = readCredentialFlag(args, i, credentials);
      if (consumed < 0) throw new Error(`Unknown option: ${args[i]}`);
      i += consumed;
    }
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    console.log("Usage:");
    console.log("  whoami [--instance URL] [--token TOKEN]");
    process.exitCode = 1;
    return;
  }

  try {
    const env = loadRuntimeEnv(deps.env);
    const instance = credentials.instance ?? env.mastodonInstance;
    const token = credentials.token ?? env.mastodonToken;
    if (!instance || !token) {
      console.error("Error: a Mastodon instance and an access token are required.");
      console.error(CREDENTIALS_HINT);
      process.exitCode = 1;
      return;
    }

    const config = parseMastodonSourceConfig({
      instanceUrl: instance,
      accessToken: token,
      timeoutMs: env.requestTimeoutMs,
    });
    const client = new MastodonClient({
      instanceUrl: config.instanceUrl,
      accessToken: config.accessToken,
      timeoutMs: config.timeoutMs,
      fetchImpl: deps.fetchImpl,
    });
    const account = await client.verifyCredentials();

    console.log(`@${account.acct} (id ${account.id})`);
    if (account.displayName) console.log(`- name: ${account.displayName}`);
    if (account.url) console.log(`- url:  ${account.url}`);
  } catch (err) {
    if (isTimelineFilterError(err)) {
      console.error(`Error: ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}
