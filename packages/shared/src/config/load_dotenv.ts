import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { createLogger } from "../logging";

const log = createLogger({ component: "config" });

function hasWorkspaces(pkgPath: string): boolean {
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf8"));
    return typeof pkg === "object" && pkg !== null && "workspaces" in pkg;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.debug({ pkgPath, err: message }, "Skipping unreadable package.json");
    return false;
  }
}

/**
 * Find the project root by searching up for a directory containing .env or package.json with workspaces.
 */
function findProjectRoot(startDir: string): string {
  let dir = startDir;

  for (;;) {
    if (existsSync(resolve(dir, ".env"))) return dir;
    const pkgPath = resolve(dir, "package.json");
    if (existsSync(pkgPath) && hasWorkspaces(pkgPath)) return dir;

    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  return startDir;
}

function stripInlineComment(value: string): string {
  // " # ..." starts a comment for unquoted values; a bare "#" belongs to the value.
  for (let i = 0; i < value.length; i += 1) {
    if (value[i] !== "#") continue;
    const prev = i > 0 ? value[i - 1] : "";
    if (prev === " " || prev === "\t") {
      return value.slice(0, i).trimEnd();
    }
  }
  return value;
}

export function parseEnvValue(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return "";

  const quote = trimmed[0];
  if (quote === '"' || quote === "'") {
    let out = "";
    let escaped = false;
    for (const ch of trimmed.slice(1)) {
      if (escaped) {
        out += ch;
        escaped = false;
        continue;
      }
      if (ch === "\\") {
        escaped = true;
        continue;
      }
      if (ch === quote) return out;
      out += ch;
    }
    // Unclosed quote
    return stripInlineComment(trimmed);
  }

  return stripInlineComment(trimmed);
}

/**
 * Parse dotenv-style text into key/value pairs. Later keys win.
 */
export function parseDotEnv(raw: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const body = trimmed.startsWith("export ") ? trimmed.slice(7) : trimmed;
    const idx = body.indexOf("=");
    if (idx <= 0) continue;
    out[body.slice(0, idx).trim()] = parseEnvValue(body.slice(idx + 1));
  }
  return out;
}

/**
 * Load environment variables from .env and .env.local files.
 * Does not override existing environment variables.
 * Call before loadRuntimeEnv().
 */
export function loadDotEnvIfPresent(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): void {
  const projectRoot = findProjectRoot(cwd);
  for (const filename of [".env", ".env.local"]) {
    const fullPath = resolve(projectRoot, filename);
    if (!existsSync(fullPath)) continue;
    let raw: string;
    try {
      raw = readFileSync(fullPath, "utf8");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.warn({ filename, err: message }, "Failed to read env file");
      continue;
    }
    for (const [key, value] of Object.entries(parseDotEnv(raw))) {
      if (env[key] === undefined) env[key] = value;
    }
  }
}
