// src/resources/Kv.ts
/**
 * Purpose:
 * - KV store reads/writes, including CAS and session lock acquire/release.
 *
 * Invariants:
 * - get/put/delete reject an empty key with EmptyKeyError before any I/O.
 * - list/listKeys accept an empty prefix (whole keyspace).
 * - A missing key surfaces as RequestFailedError(404); callers decide whether
 *   "not found" is an error.
 */

import { zBoolResult, zStrList } from "../contracts/common.contract";
import { zKVPairList, type KVPair } from "../contracts/kv.contract";
import type {
  QueryMeta,
  QueryOptions,
  WriteMeta,
  WriteOptions,
} from "../http/options";
import { read, write } from "../http/RequestDispatcher";
import { ResourceBase } from "./ResourceBase";

export interface KvPutOptions {
  /** Opaque client flags stored with the entry. */
  flags?: number;
  /** Check-and-set: write only if ModifyIndex still equals this (0 = create only). */
  cas?: number;
  /** Session ID to acquire the key's lock with. */
  acquire?: string;
  /** Session ID to release the key's lock from. */
  release?: string;
}

export interface KvDeleteOptions {
  cas?: number;
  /** Delete every key under the given prefix. */
  recurse?: boolean;
}

export class Kv extends ResourceBase {
  /** Entry at exactly `key`. */
  public async get(
    key: string,
    q?: QueryOptions
  ): Promise<[KVPair[], QueryMeta]> {
    return read(`/v1/kv/${this.keyPath(key)}`, this.config, {}, q, zKVPairList);
  }

  /** Every entry under `prefix`. */
  public async list(
    prefix: string,
    q?: QueryOptions
  ): Promise<[KVPair[], QueryMeta]> {
    const path = `/v1/kv/${this.keyPath(prefix, true)}`;
    return read(path, this.config, { recurse: "" }, q, zKVPairList);
  }

  /** Key names under `prefix`, optionally rolled up at `separator`. */
  public async listKeys(
    prefix: string,
    opts: { separator?: string } = {},
    q?: QueryOptions
  ): Promise<[string[], QueryMeta]> {
    const params: Record<string, string> = { keys: "" };
    if (opts.separator) params.separator = opts.separator;
    const path = `/v1/kv/${this.keyPath(prefix, true)}`;
    return read(path, this.config, params, q, zStrList);
  }

  /** Store `value` verbatim. Resolves `false` when a CAS or lock condition failed. */
  public async put(
    key: string,
    value: string | Uint8Array,
    opts: KvPutOptions = {},
    w?: WriteOptions
  ): Promise<[boolean, WriteMeta]> {
    const path = `/v1/kv/${this.keyPath(key)}`;
    const params: Record<string, string> = {};
    if (opts.flags !== undefined) params.flags = String(opts.flags);
    if (opts.cas !== undefined) params.cas = String(opts.cas);
    if (opts.acquire) params.acquire = opts.acquire;
    if (opts.release) params.release = opts.release;
    return write(path, value, this.config, params, w, zBoolResult);
  }

  public async delete(
    key: string,
    opts: KvDeleteOptions = {},
    w?: WriteOptions
  ): Promise<[boolean, WriteMeta]> {
    const path = `/v1/kv/${this.keyPath(key)}`;
    const params: Record<string, string> = {};
    if (opts.recurse) params.recurse = "";
    if (opts.cas !== undefined) params.cas = String(opts.cas);
    return write(path, undefined, this.config, params, w, zBoolResult, "DELETE");
  }
}
