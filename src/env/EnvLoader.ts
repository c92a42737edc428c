// src/env/EnvLoader.ts
/**
 * Purpose:
 * - Env snapshots for config factories: optional dotenv file merged under the
 *   process env, plus strict typed accessors with operator-readable errors.
 *
 * Policy:
 * - Never writes to process.env. Callers pass the snapshot explicitly.
 * - Precedence: values already in `env` win over values from the file.
 * - Blank values count as absent.
 */

import fs from "node:fs";
import dotenv from "dotenv";

export type EnvSnapshot = Readonly<Record<string, string | undefined>>;

/** Uppercase-with-underscores guard; we don’t pick up weird keys. */
const VALID_KEY = /^[A-Z0-9_]+$/;

function readEnvFile(file: string): Record<string, string> {
  if (!fs.existsSync(file)) return {};
  return dotenv.parse(fs.readFileSync(file, "utf8"));
}

/** Merge a dotenv file beneath `env`. A missing file yields `env` unchanged. */
export function loadEnvFile(
  file: string,
  env: EnvSnapshot = process.env
): EnvSnapshot {
  const merged: Record<string, string | undefined> = {};
  for (const [k, v] of Object.entries(readEnvFile(file))) {
    if (VALID_KEY.test(k)) merged[k] = v;
  }
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined) merged[k] = v;
  }
  return merged;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Typed accessors
 * ──────────────────────────────────────────────────────────────────────────── */

/** Trimmed value, or undefined when missing/blank. */
export function envString(env: EnvSnapshot, name: string): string | undefined {
  const v = env[name];
  if (v == null) return undefined;
  const s = v.trim();
  return s === "" ? undefined : s;
}

export function envInt(
  env: EnvSnapshot,
  name: string,
  opts?: { min?: number; max?: number }
): number | undefined {
  const v = envString(env, name);
  if (v === undefined) return undefined;
  if (!/^-?\d+$/.test(v)) {
    throw new Error(`ENV: ${name} must be an integer (got: "${v}").`);
  }
  const n = Number(v);
  if (opts?.min != null && n < opts.min) {
    throw new Error(`ENV: ${name} must be >= ${opts.min} (got: ${n}).`);
  }
  if (opts?.max != null && n > opts.max) {
    throw new Error(`ENV: ${name} must be <= ${opts.max} (got: ${n}).`);
  }
  return n;
}

export function envBool(env: EnvSnapshot, name: string): boolean | undefined {
  const v = envString(env, name);
  if (v === undefined) return undefined;
  const s = v.toLowerCase();
  if (["1", "true", "on", "yes"].includes(s)) return true;
  if (["0", "false", "off", "no"].includes(s)) return false;
  throw new Error(`ENV: ${name} must be a boolean (got: "${v}").`);
}
