import { ConfigError } from "../errors";

/**
 * Canonical base URL of an instance: lower-cased scheme/host, no path suffix
 * slashes, no query or fragment. `mastodon.social` is read as https.
 */
export function canonicalizeInstanceUrl(input: string): string {
  const trimmed = input.trim();
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;

  let url: URL;
  try {
    url = new URL(withScheme);
  } catch (err) {
    throw new ConfigError(`Invalid instance URL: ${input}`, { cause: err });
  }
  if (url.protocol !== "https:" && url.protocol !== "http:") {
    throw new ConfigError(`Instance URL must use http or https: ${input}`);
  }

  url.hash = "";
  url.search = "";
  url.hostname = url.hostname.toLowerCase();

  return `${url.origin}${url.pathname.replace(/\/+$/, "")}`;
}
