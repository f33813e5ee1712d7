// apps/engine/src/config/index.ts
//
// Engine config SSOT loader.
//
// Contract:
// - SSOT file: config/engine/default.json (ENGINE_CONFIG_PATH overrides the file itself)
// - validated by EngineConfigV1Z; a bad file fails at load with every offending path
// - config_hash: sha256(stableStringify(effective config)) with "sha256:" prefix

import fs from "node:fs";
import path from "node:path";

import { EngineConfigV1Z, type EngineConfigV1 } from "@gapwatch/contracts";
import { findRepoRoot, sha256Hex, stableStringify } from "../util";

export const SSOT_RELATIVE_PATH = path.join("config", "engine", "default.json");

export type LoadedEngineConfig = {
  cfg: EngineConfigV1;
  config_hash: string;
  source: string;
};

export class EngineConfigInvalid extends Error {
  public readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`invalid engine config ${source}: ${issues.join("; ")}`);
    this.name = "EngineConfigInvalid";
    this.issues = issues;
  }
}

/** GAPWATCH_REPO_ROOT when set, else the nearest ancestor of cwd holding the SSOT file. */
export function resolveRepoRoot(env: NodeJS.ProcessEnv = process.env): string {
  if (env.GAPWATCH_REPO_ROOT) return path.resolve(env.GAPWATCH_REPO_ROOT);
  return findRepoRoot(process.cwd(), SSOT_RELATIVE_PATH);
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.ENGINE_CONFIG_PATH) return path.resolve(env.ENGINE_CONFIG_PATH);
  return path.join(resolveRepoRoot(env), SSOT_RELATIVE_PATH);
}

export function computeConfigHash(cfg: EngineConfigV1): string {
  return `sha256:${sha256Hex(stableStringify(cfg))}`;
}

export function parseEngineConfig(raw: unknown, source: string): LoadedEngineConfig {
  const r = EngineConfigV1Z.safeParse(raw);
  if (!r.success) {
    throw new EngineConfigInvalid(
      source,
      r.error.issues.map((i) => `${i.path.join(".") || "$"}: ${i.message}`)
    );
  }
  return { cfg: r.data, config_hash: computeConfigHash(r.data), source };
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): LoadedEngineConfig {
  const p = resolveConfigPath(env);
  const text = fs.readFileSync(p, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new EngineConfigInvalid(p, [`not valid JSON (${e instanceof Error ? e.message : String(e)})`]);
  }
  return parseEngineConfig(raw, p);
}
