export interface CredentialArgs {
  instance?: string;
  token?: string;
}

export function readFlagValue(args: string[], index: number, flag: string, expected: string): string {
  const next = args[index + 1];
  if (next === undefined || next.trim().length === 0 || next.startsWith("--")) {
    throw new Error(`Missing ${flag} value (expected ${expected})`);
  }
  return next.trim();
}

/**
 * Consume `--instance` / `--token` at `index`. Returns how many extra args were read,
 * or -1 when the arg is not a credential flag.
 */
export function readCredentialFlag(args: string[], index: number, out: CredentialArgs): number {
  const a = args[index];
  if (a === "--instance") {
    out.instance = readFlagValue(args, index, a, "an instance URL");
    return 1;
  }
  if (a === "--token") {
    out.token = readFlagValue(args, index, a, "an access token");
    return 1;
  }
  return -1;
}

export const CREDENTIALS_HINT =
  "Set --instance and --token or the MASTODON_INSTANCE and MASTODON_TOKEN environment variables.";
