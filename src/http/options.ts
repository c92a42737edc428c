// src/http/options.ts
/**
 * Purpose:
 * - Per-call read/write options and the metadata returned with every result.
 *
 * Invariants:
 * - Omitting options is identical to passing `{}`: a non-blocking request
 *   against the config's default datacenter with the config's token.
 * - A waitIndex of 0 means "no baseline" and is never sent.
 * - Durations are milliseconds.
 */

export type ConsistencyMode = "default" | "stale" | "consistent";

export interface QueryOptions {
  /** Overrides Config.datacenter. */
  datacenter?: string;
  /** Block until the server's index moves past this value. */
  waitIndex?: number;
  /** Block until the response content hash differs (hash-based blocking). */
  waitHash?: string;
  /** Upper bound the server holds a blocking query open. */
  waitTimeMs?: number;
  /** Unset and "default" both leave consistency to the server. */
  consistency?: ConsistencyMode;
  /** Overrides Config.token. */
  token?: string;
  /** Server-side filter expression. */
  filter?: string;
  /** Sort results by round-trip time from this node ("_agent" for the local agent). */
  near?: string;
  signal?: AbortSignal;
}

export interface WriteOptions {
  datacenter?: string;
  token?: string;
  /** Gossip relay factor for the write; sent only when > 0. */
  relayFactor?: number;
  signal?: AbortSignal;
}

export interface QueryMeta {
  /** Raft index of the data; feed back as the next waitIndex. */
  lastIndex: number;
  lastContentHash?: string;
  /** Whether the answering server knew the cluster leader. */
  knownLeader: boolean;
  /** Milliseconds since the answering server last contacted the leader. */
  lastContactMs: number;
  requestTimeMs: number;
}

export interface WriteMeta {
  requestTimeMs: number;
}

/** Metadata for agent-local reads, which carry no raft index. */
export interface LocalMeta {
  lastContentHash?: string;
  requestTimeMs: number;
}

/** Fixed query params a resource method adds before option-derived ones. */
export type QueryParams = Readonly<Record<string, string>>;

export const DEFAULT_WAIT_TIME_MS = 5 * 60 * 1000;

/** True when options ask the server to hold the request open. */
export function isBlocking(q: QueryOptions | undefined): boolean {
  if (!q) return false;
  return (q.waitIndex ?? 0) > 0 || (q.waitHash ?? "") !== "";
}

/** Render milliseconds as a duration string the server parses ("5m", "30s", "250ms"). */
export function formatDuration(ms: number): string {
  const n = Math.max(0, Math.floor(ms));
  if (n !== 0 && n % 60_000 === 0) return `${n / 60_000}m`;
  if (n !== 0 && n % 1_000 === 0) return `${n / 1_000}s`;
  return `${n}ms`;
}
