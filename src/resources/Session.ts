// src/resources/Session.ts
import { zBoolResult } from "../contracts/common.contract";
import {
  sessionCreateToWire,
  zSessionCreated,
  zSessionEntryList,
  type SessionCreatePayload,
  type SessionCreated,
  type SessionEntry,
} from "../contracts/session.contract";
import type {
  QueryMeta,
  QueryOptions,
  WriteMeta,
  WriteOptions,
} from "../http/options";
import { read, write } from "../http/RequestDispatcher";
import { ResourceBase } from "./ResourceBase";

export class Session extends ResourceBase {
  public async create(
    payload: SessionCreatePayload = {},
    w?: WriteOptions
  ): Promise<[SessionCreated, WriteMeta]> {
    return write(
      "/v1/session/create",
      sessionCreateToWire(payload),
      this.config,
      {},
      w,
      zSessionCreated
    );
  }

  public async destroy(
    id: string,
    w?: WriteOptions
  ): Promise<[boolean, WriteMeta]> {
    const path = `/v1/session/destroy/${this.segment("id", id)}`;
    return write(path, undefined, this.config, {}, w, zBoolResult);
  }

  /** Empty list when the session does not exist. */
  public async info(
    id: string,
    q?: QueryOptions
  ): Promise<[SessionEntry[], QueryMeta]> {
    const path = `/v1/session/info/${this.segment("id", id)}`;
    return read(path, this.config, {}, q, zSessionEntryList);
  }

  public async listNodeSessions(
    node: string,
    q?: QueryOptions
  ): Promise<[SessionEntry[], QueryMeta]> {
    const path = `/v1/session/node/${this.segment("node", node)}`;
    return read(path, this.config, {}, q, zSessionEntryList);
  }

  public async list(q?: QueryOptions): Promise<[SessionEntry[], QueryMeta]> {
    return read("/v1/session/list", this.config, {}, q, zSessionEntryList);
  }

  /** Resets a TTL session's timer. */
  public async renew(
    id: string,
    w?: WriteOptions
  ): Promise<[SessionEntry[], WriteMeta]> {
    const path = `/v1/session/renew/${this.segment("id", id)}`;
    return write(path, undefined, this.config, {}, w, zSessionEntryList);
  }
}
