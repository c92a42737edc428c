// src/resources/Catalog.ts
/**
 * Purpose:
 * - Catalog endpoints: low-level register/deregister plus datacenter, node and
 *   service listings.
 *
 * Notes:
 * - register/deregister bypass agent anti-entropy; prefer the Agent facade for
 *   services owned by a running agent.
 */

import {
  catalogDeregistrationToWire,
  catalogRegistrationToWire,
  zCatalogNode,
  zCatalogServiceList,
  zDatacenters,
  zNodeList,
  zServiceTagMap,
  type CatalogDeregistrationPayload,
  type CatalogNode,
  type CatalogRegistrationPayload,
  type CatalogService,
  type Node,
} from "../contracts/catalog.contract";
import { zVoid } from "../contracts/common.contract";
import type {
  QueryMeta,
  QueryOptions,
  WriteMeta,
  WriteOptions,
} from "../http/options";
import { read, write } from "../http/RequestDispatcher";
import { ResourceBase } from "./ResourceBase";

export class Catalog extends ResourceBase {
  /** PUT /v1/catalog/register */
  public async register(
    reg: CatalogRegistrationPayload,
    w?: WriteOptions
  ): Promise<[void, WriteMeta]> {
    return write(
      "/v1/catalog/register",
      catalogRegistrationToWire(reg),
      this.config,
      {},
      w,
      zVoid
    );
  }

  /** PUT /v1/catalog/deregister */
  public async deregister(
    dereg: CatalogDeregistrationPayload,
    w?: WriteOptions
  ): Promise<[void, WriteMeta]> {
    return write(
      "/v1/catalog/deregister",
      catalogDeregistrationToWire(dereg),
      this.config,
      {},
      w,
      zVoid
    );
  }

  /**
   * All known datacenters, in the order the server returns them (ascending
   * estimated round-trip time). No reordering happens client-side.
   */
  public async listDatacenters(): Promise<[string[], QueryMeta]> {
    return read(
      "/v1/catalog/datacenters",
      this.config,
      {},
      undefined,
      zDatacenters
    );
  }

  /** GET /v1/catalog/nodes */
  public async listDatacenterNodes(
    q?: QueryOptions
  ): Promise<[Node[], QueryMeta]> {
    return read("/v1/catalog/nodes", this.config, {}, q, zNodeList);
  }

  /** Service name → tags for every service in the datacenter. */
  public async listDatacenterServices(
    q?: QueryOptions
  ): Promise<[Record<string, string[]>, QueryMeta]> {
    return read("/v1/catalog/services", this.config, {}, q, zServiceTagMap);
  }

  /** Instances of one service, optionally narrowed to a tag. */
  public async listServiceNodes(
    service: string,
    tag?: string,
    q?: QueryOptions
  ): Promise<[CatalogService[], QueryMeta]> {
    const path = `/v1/catalog/service/${this.segment("service", service)}`;
    return read(path, this.config, tag ? { tag } : {}, q, zCatalogServiceList);
  }

  /** One node and the services registered on it. */
  public async getNode(
    node: string,
    q?: QueryOptions
  ): Promise<[CatalogNode, QueryMeta]> {
    const path = `/v1/catalog/node/${this.segment("node", node)}`;
    return read(path, this.config, {}, q, zCatalogNode);
  }
}
