// apps/engine/src/config/dotenv.ts
//
// Minimal .env support: KEY=value lines, '#' comments, optional matching quotes.
// Variables already present in the environment are never overwritten.

import fs from "node:fs";

const ASSIGNMENT = /^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/;

function unquote(v: string): string {
  const q = v[0];
  return v.length >= 2 && (q === '"' || q === "'") && v.endsWith(q) ? v.slice(1, -1) : v;
}

export function parseDotEnv(text: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of text.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const m = ASSIGNMENT.exec(s);
    if (m) out[m[1]] = unquote(m[2].trim());
  }
  return out;
}

/** Applies `fp` to `env` when the file exists; returns the names that were set. */
export function applyDotEnvFile(fp: string, env: NodeJS.ProcessEnv = process.env): string[] {
  if (!fs.existsSync(fp)) return [];
  const applied: string[] = [];
  for (const [key, value] of Object.entries(parseDotEnv(fs.readFileSync(fp, "utf8")))) {
    if (env[key] != null) continue;
    env[key] = value;
    applied.push(key);
  }
  return applied;
}
