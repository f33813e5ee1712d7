import { createHash, randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

export function nowMs(): number {
  return Date.now();
}

export function newId(prefix: string): string {
  return `${prefix}_${randomUUID().replace(/-/g, "").slice(0, 24)}`;
}

export function stableStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

export function sha256Hex(s: string): string {
  return createHash("sha256").update(s).digest("hex");
}

function canonicalize(x: unknown): unknown {
  if (x === null || x === undefined) return x;
  if (Array.isArray(x)) return x.map(canonicalize);
  if (typeof x === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(x).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      out[k] = canonicalize(v);
    }
    return out;
  }
  return x;
}

export function assertInt(v: unknown, name: string): number {
  const n = typeof v === "number" ? v : typeof v === "string" && v.trim() !== "" ? Number(v) : NaN;
  if (!Number.isFinite(n) || !Number.isInteger(n)) throw new Error(`invalid ${name}`);
  return n;
}

/**
 * Find repo root by walking upward from `startDir` until `requiredRelativePath` exists.
 *
 * In npm workspaces, process.cwd() may be either the repo root or a package subdir,
 * while the SSOT config lives at the repo root.
 */
export function findRepoRoot(startDir: string, requiredRelativePath: string, maxHops = 8): string {
  let cur = path.resolve(startDir);

  for (let hop = 0; hop <= maxHops; hop++) {
    if (fs.existsSync(path.join(cur, requiredRelativePath))) return cur;

    const parent = path.dirname(cur);
    if (parent === cur) break; // reached filesystem root
    cur = parent;
  }

  throw new Error(`Cannot locate repo root from ${startDir}; missing ${requiredRelativePath}`);
}
