// src/resources/Connect.ts
import {
  zCAConfig,
  zCARootList,
  zIntentionList,
  type CAConfig,
  type CARootList,
  type Intention,
} from "../contracts/connect.contract";
import type { QueryMeta, QueryOptions } from "../http/options";
import { read } from "../http/RequestDispatcher";
import { ResourceBase } from "./ResourceBase";

export class Connect extends ResourceBase {
  /** Trusted CA roots; blocking on this is how proxies pick up rotations. */
  public async listCaRoots(
    q?: QueryOptions
  ): Promise<[CARootList, QueryMeta]> {
    return read("/v1/connect/ca/roots", this.config, {}, q, zCARootList);
  }

  public async getCaConfiguration(
    q?: QueryOptions
  ): Promise<[CAConfig, QueryMeta]> {
    return read("/v1/connect/ca/configuration", this.config, {}, q, zCAConfig);
  }

  public async listIntentions(
    q?: QueryOptions
  ): Promise<[Intention[], QueryMeta]> {
    return read("/v1/connect/intentions", this.config, {}, q, zIntentionList);
  }
}
