// src/http/headers.ts
/**
 * Consul response/request header names and the parsers that turn them into
 * QueryMeta fields.
 */

import type { AxiosResponse } from "axios";
import { DecodeError } from "../errors/ConsulError";

export const CONSUL_HEADERS = {
  index: "X-Consul-Index",
  knownLeader: "X-Consul-KnownLeader",
  lastContact: "X-Consul-LastContact",
  contentHash: "X-Consul-ContentHash",
  token: "X-Consul-Token",
} as const;

/** Case-insensitive single-value header lookup. */
export function headerValue(
  headers: AxiosResponse["headers"],
  name: string
): string | undefined {
  const wanted = name.toLowerCase();
  for (const [k, v] of Object.entries(headers)) {
    if (k.toLowerCase() !== wanted) continue;
    const value: unknown = v;
    if (typeof value === "string") return value;
    if (typeof value === "number") return String(value);
    if (Array.isArray(value) && typeof value[0] === "string") return value[0];
    return undefined;
  }
  return undefined;
}

/**
 * The change index is required on indexed reads. Missing, non-numeric or
 * out-of-range values are decode failures, never a zero.
 */
export function parseIndex(raw: string | undefined): number {
  if (raw === undefined) {
    throw new DecodeError(`missing ${CONSUL_HEADERS.index} header`);
  }
  const s = raw.trim();
  if (!/^\d+$/.test(s)) {
    throw new DecodeError(`invalid ${CONSUL_HEADERS.index} header "${raw}"`);
  }
  const n = Number(s);
  if (!Number.isSafeInteger(n)) {
    throw new DecodeError(
      `${CONSUL_HEADERS.index} header "${raw}" exceeds the safe integer range`
    );
  }
  return n;
}

/** Absent or anything but "true" is false. */
export function parseKnownLeader(raw: string | undefined): boolean {
  return raw?.trim().toLowerCase() === "true";
}

/** Absent → 0; present but non-numeric is a decode failure. */
export function parseLastContact(raw: string | undefined): number {
  if (raw === undefined) return 0;
  const s = raw.trim();
  if (!/^\d+$/.test(s)) {
    throw new DecodeError(
      `invalid ${CONSUL_HEADERS.lastContact} header "${raw}"`
    );
  }
  return Number(s);
}
