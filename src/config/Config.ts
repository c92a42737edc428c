// src/config/Config.ts
/**
 * Purpose:
 * - Immutable client configuration shared by reference across all calls.
 * - Factories: defaults, explicit host/port, or an env snapshot.
 *
 * Env (configFromEnv):
 * - CONSUL_HTTP_ADDR        host:port or URL          [default: 127.0.0.1:8500]
 * - CONSUL_HTTP_SSL         use https when ADDR has no scheme
 * - CONSUL_HTTP_TOKEN       ACL token (absent → unauthenticated)
 * - CONSUL_DATACENTER       default datacenter
 * - CONSUL_HTTP_TIMEOUT_MS  non-blocking request timeout
 * - LOG_LEVEL               pino level for this client  [default: silent]
 */

import axios, { type AxiosInstance } from "axios";
import { envBool, envInt, envString, type EnvSnapshot } from "../env/EnvLoader";
import { createLogger, isLogLevel, type IBoundLogger } from "../logger/Logger";

export const DEFAULT_ADDRESS = "http://127.0.0.1:8500";
export const DEFAULT_PORT = 8500;
export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_LONG_POLL_GRACE_MS = 5_000;

export interface Config {
  /** Base URL including scheme, e.g. "http://127.0.0.1:8500". */
  readonly address: string;
  readonly datacenter?: string;
  readonly token?: string;
  /** Wait used when a blocking read sets an index but no waitTimeMs. */
  readonly waitTimeMs?: number;
  /** Transport timeout for non-blocking requests; 0 disables it. */
  readonly timeoutMs: number;
  /** Added on top of wait + server jitter for blocking reads. */
  readonly longPollGraceMs: number;
  /** Shared transport; connection pooling lives here. */
  readonly http: AxiosInstance;
  /** Falls back to the process root logger when absent. */
  readonly log?: IBoundLogger;
}

export type ConfigOverrides = Partial<Config>;

export function defaultConfig(overrides: ConfigOverrides = {}): Config {
  return {
    address: DEFAULT_ADDRESS,
    timeoutMs: DEFAULT_TIMEOUT_MS,
    longPollGraceMs: DEFAULT_LONG_POLL_GRACE_MS,
    ...overrides,
    http: overrides.http ?? axios.create(),
  };
}

export function configFromHost(
  host: string,
  port: number = DEFAULT_PORT,
  token?: string
): Config {
  return defaultConfig({
    address: normalizeAddress(`${host}:${port}`, false),
    token,
  });
}

/** Build a Config from an env snapshot (defaults to the real process env). */
export function configFromEnv(env: EnvSnapshot = process.env): Config {
  const ssl = envBool(env, "CONSUL_HTTP_SSL") ?? false;
  const addr = envString(env, "CONSUL_HTTP_ADDR");
  const level = envString(env, "LOG_LEVEL");
  if (level !== undefined && !isLogLevel(level)) {
    throw new Error(`ENV: LOG_LEVEL is not a valid level (got: "${level}").`);
  }

  return defaultConfig({
    address: addr ? normalizeAddress(addr, ssl) : DEFAULT_ADDRESS,
    token: envString(env, "CONSUL_HTTP_TOKEN"),
    datacenter: envString(env, "CONSUL_DATACENTER"),
    timeoutMs:
      envInt(env, "CONSUL_HTTP_TIMEOUT_MS", { min: 0 }) ?? DEFAULT_TIMEOUT_MS,
    log:
      level !== undefined
        ? createLogger(level, { component: "consul-client" })
        : undefined,
  });
}

/** Prefix a scheme when missing and strip trailing slashes. */
export function normalizeAddress(addr: string, ssl: boolean): string {
  const trimmed = addr.trim().replace(/\/+$/, "");
  if (/^https?:\/\//i.test(trimmed)) return trimmed;
  return `${ssl ? "https" : "http"}://${trimmed}`;
}
