// src/http/RequestDispatcher.ts
/**
 * Purpose:
 * - The single choke point for every Consul call. Turns (path, options,
 *   payload) into an HTTP request, sends it over the config's axios
 *   instance and decodes `[value, meta]`.
 *
 * Contract:
 * - Param order: resource params, dc, then index/hash/wait (reads only, and
 *   only when blocking), consistency, filter, near; writes add relay-factor.
 * - Per-call datacenter/token beat the config defaults; "" means inherit.
 * - Token travels only in X-Consul-Token, never in the query string.
 * - Non-2xx → RequestFailedError(status); the body is not decoded.
 * - Indexed reads require X-Consul-Index; absence is a DecodeError.
 * - Nothing is retried, cached or swallowed here. Failures are thrown, not logged.
 *
 * Notes:
 * - Blocking reads get a transport timeout strictly greater than the wait
 *   (wait + wait/16 server jitter + config.longPollGraceMs).
 */

import axios, { type AxiosResponse } from "axios";
import type { z } from "zod";
import type { Config } from "../config/Config";
import {
  DecodeError,
  HttpError,
  RequestFailedError,
} from "../errors/ConsulError";
import { getLogger, type IBoundLogger } from "../logger/Logger";
import {
  CONSUL_HEADERS,
  headerValue,
  parseIndex,
  parseKnownLeader,
  parseLastContact,
} from "./headers";
import {
  DEFAULT_WAIT_TIME_MS,
  formatDuration,
  isBlocking,
  type LocalMeta,
  type QueryMeta,
  type QueryOptions,
  type QueryParams,
  type WriteMeta,
  type WriteOptions,
} from "./options";

/** Runtime decoder standing in for `T`. */
export type Decoder<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export type WriteMethod = "PUT" | "POST" | "DELETE";

type HttpMethod = "GET" | WriteMethod;

interface OutboundRequest {
  method: HttpMethod;
  path: string;
  url: string;
  headers: Record<string, string>;
  data?: string | Buffer;
  timeoutMs: number;
  signal?: AbortSignal;
  blocking: boolean;
}

// ──────────────────────────────────────────────────────────────────────────────
// Public entry points

/** Indexed read. Returns the decoded body and blocking-query metadata. */
export async function read<T>(
  path: string,
  config: Config,
  params: QueryParams,
  options: QueryOptions | undefined,
  schema: Decoder<T>
): Promise<[T, QueryMeta]> {
  const q = options ?? {};
  const [res, requestTimeMs] = await dispatch(config, {
    method: "GET",
    path,
    url: buildUrl(config.address, path, buildQueryParams(config, params, q)),
    headers: buildHeaders(config, q.token),
    timeoutMs: readTimeoutMs(config, q),
    signal: q.signal,
    blocking: isBlocking(q),
  });

  const meta: QueryMeta = {
    lastIndex: parseIndex(headerValue(res.headers, CONSUL_HEADERS.index)),
    lastContentHash: headerValue(res.headers, CONSUL_HEADERS.contentHash),
    knownLeader: parseKnownLeader(
      headerValue(res.headers, CONSUL_HEADERS.knownLeader)
    ),
    lastContactMs: parseLastContact(
      headerValue(res.headers, CONSUL_HEADERS.lastContact)
    ),
    requestTimeMs,
  };
  return [decodeBody(res.data, schema), meta];
}

/**
 * Read against agent-local endpoints. These are not raft-backed and carry no
 * index, so only the content hash (if any) and timing come back.
 */
export async function readLocal<T>(
  path: string,
  config: Config,
  params: QueryParams,
  options: QueryOptions | undefined,
  schema: Decoder<T>
): Promise<[T, LocalMeta]> {
  const q = options ?? {};
  const [res, requestTimeMs] = await dispatch(config, {
    method: "GET",
    path,
    url: buildUrl(config.address, path, buildQueryParams(config, params, q)),
    headers: buildHeaders(config, q.token),
    timeoutMs: readTimeoutMs(config, q),
    signal: q.signal,
    blocking: isBlocking(q),
  });

  const meta: LocalMeta = {
    lastContentHash: headerValue(res.headers, CONSUL_HEADERS.contentHash),
    requestTimeMs,
  };
  return [decodeBody(res.data, schema), meta];
}

/**
 * Write. `body` objects go out as JSON; strings and bytes go out verbatim;
 * `undefined` sends no body.
 */
export async function write<T, B = unknown>(
  path: string,
  body: B | undefined,
  config: Config,
  params: QueryParams,
  options: WriteOptions | undefined,
  schema: Decoder<T>,
  method: WriteMethod = "PUT"
): Promise<[T, WriteMeta]> {
  const w = options ?? {};
  const payload = prepareBody(body);
  const headers = buildHeaders(config, w.token);
  if (payload.contentType) headers["Content-Type"] = payload.contentType;

  const [res, requestTimeMs] = await dispatch(config, {
    method,
    path,
    url: buildUrl(config.address, path, buildWriteParams(config, params, w)),
    headers,
    data: payload.data,
    timeoutMs: config.timeoutMs,
    signal: w.signal,
    blocking: false,
  });

  return [decodeBody(res.data, schema), { requestTimeMs }];
}

// ──────────────────────────────────────────────────────────────────────────────
// Request construction

function buildQueryParams(
  config: Config,
  params: QueryParams,
  q: QueryOptions
): URLSearchParams {
  const qs = new URLSearchParams();
  for (const [k, v] of Object.entries(params)) qs.append(k, v);

  const dc = q.datacenter || config.datacenter;
  if (dc) qs.append("dc", dc);

  if (isBlocking(q)) {
    const index = q.waitIndex ?? 0;
    if (index > 0) qs.append("index", String(index));
    if (q.waitHash) qs.append("hash", q.waitHash);
    qs.append("wait", formatDuration(waitTimeMs(config, q)));
  }

  if (q.consistency === "stale") qs.append("stale", "");
  else if (q.consistency === "consistent") qs.append("consistent", "");

  if (q.filter) qs.append("filter", q.filter);
  if (q.near) qs.append("near", q.near);
  return qs;
}

function buildWriteParams(
  config: Config,
  params: QueryParams,
  w: WriteOptions
): URLSearchParams {
  const qs = new URLSearchParams();
  for (const [k, v] of Object.entries(params)) qs.append(k, v);

  const dc = w.datacenter || config.datacenter;
  if (dc) qs.append("dc", dc);

  if (w.relayFactor !== undefined && w.relayFactor > 0) {
    qs.append("relay-factor", String(w.relayFactor));
  }
  return qs;
}

function buildUrl(
  address: string,
  path: string,
  qs: URLSearchParams
): string {
  const u = address.replace(/\/+$/, "") + "/" + path.replace(/^\/+/, "");
  const query = qs.toString();
  return query ? `${u}?${query}` : u;
}

function buildHeaders(
  config: Config,
  tokenOverride: string | undefined
): Record<string, string> {
  const headers: Record<string, string> = { Accept: "application/json" };
  const token = tokenOverride || config.token;
  if (token) headers[CONSUL_HEADERS.token] = token;
  return headers;
}

function waitTimeMs(config: Config, q: QueryOptions): number {
  return q.waitTimeMs ?? config.waitTimeMs ?? DEFAULT_WAIT_TIME_MS;
}

/** Transport timeout; for blocking reads always longer than the server wait. */
function readTimeoutMs(config: Config, q: QueryOptions): number {
  if (!isBlocking(q)) return config.timeoutMs;
  const wait = waitTimeMs(config, q);
  return wait + Math.ceil(wait / 16) + Math.max(1, config.longPollGraceMs);
}

function prepareBody(body: unknown): {
  data?: string | Buffer;
  contentType?: string;
} {
  if (body === undefined || body === null) return {};
  if (typeof body === "string") {
    return { data: body, contentType: "application/octet-stream" };
  }
  if (body instanceof Uint8Array) {
    return { data: Buffer.from(body), contentType: "application/octet-stream" };
  }
  return { data: JSON.stringify(body), contentType: "application/json" };
}

// ──────────────────────────────────────────────────────────────────────────────
// Dispatch + decode

async function dispatch(
  config: Config,
  req: OutboundRequest
): Promise<[AxiosResponse<unknown>, number]> {
  const log: IBoundLogger = (config.log ?? getLogger()).bind({
    component: "RequestDispatcher",
    method: req.method,
    path: req.path,
  });

  log.edge({ blocking: req.blocking, timeoutMs: req.timeoutMs }, "consul request");

  const started = performance.now();
  let res: AxiosResponse<unknown>;
  try {
    res = await config.http.request<unknown>({
      method: req.method,
      url: req.url,
      headers: req.headers,
      data: req.data,
      timeout: req.timeoutMs,
      signal: req.signal,
      responseType: "text",
      transformRequest: [(data: unknown) => data],
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });
  } catch (err) {
    throw new HttpError(describeTransportError(err), err);
  }
  const requestTimeMs = performance.now() - started;

  if (res.status < 200 || res.status >= 300) {
    throw new RequestFailedError(res.status);
  }

  log.debug({ status: res.status, requestTimeMs }, "consul response");
  return [res, requestTimeMs];
}

function describeTransportError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    return err.code ? `${err.code}: ${err.message}` : err.message;
  }
  return err instanceof Error ? err.message : String(err);
}

/** Empty body decodes as `undefined`, so list/map schemas yield their empty value. */
function decodeBody<T>(raw: unknown, schema: Decoder<T>): T {
  const result = schema.safeParse(parseJson(raw));
  if (!result.success) {
    const detail = result.error.issues
      .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
      .join("; ");
    throw new DecodeError(detail, result.error);
  }
  return result.data;
}

function parseJson(raw: unknown): unknown {
  if (raw === undefined || raw === null) return undefined;
  if (typeof raw !== "string") return raw;
  if (raw.trim() === "") return undefined;
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (err) {
    throw new DecodeError("body is not valid JSON", err);
  }
}
