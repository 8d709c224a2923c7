/**
 * `.env.local` support: KEY=value lines copied into `process.env` without
 * replacing variables that are already set.
 */
import { existsSync, readFileSync } from "node:fs";

export function parseEnvFile(content: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eq = trimmed.indexOf("=");
    if (eq < 0) continue;
    const key = trimmed.slice(0, eq).trim();
    out[key] = trimmed.slice(eq + 1).trim().replace(/^["']|["']$/g, "");
  }
  return out;
}

export function loadEnvFile(path = ".env.local"): void {
  if (!existsSync(path)) return;
  for (const [key, val] of Object.entries(parseEnvFile(readFileSync(path, "utf8")))) {
    if (!process.env[key]) process.env[key] = val;
  }
}
