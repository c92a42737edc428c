// src/contracts/catalog.contract.ts
/**
 * Purpose:
 * - Catalog entities (nodes, service instances) and the register/deregister
 *   payloads.
 *
 * Notes:
 * - CatalogNode embeds an optional Node and a map of service-id → AgentService.
 */

import type { z } from "zod";
import {
  agentServiceRegistrationToWire,
  agentServiceCheckToWire,
  zAgentService,
  zServiceWeights,
  type AgentServiceCheck,
  type AgentServiceRegistration,
} from "./agent.contract";
import {
  entity,
  listOf,
  mapOf,
  nullableOf,
  zBool,
  zNum,
  zStr,
  zStrList,
  zStrMap,
} from "./common.contract";

export {
  zServiceWeights,
  serviceWeightsToWire,
  type ServiceWeights,
} from "./agent.contract";

/** A node within the cluster gossip pool. */
export const zNode = entity(
  {
    ID: zStr,
    Node: zStr,
    Address: zStr,
    Datacenter: zStr,
    TaggedAddresses: zStrMap,
    Meta: zStrMap,
    CreateIndex: zNum,
    ModifyIndex: zNum,
  },
  (w) => ({
    id: w.ID,
    node: w.Node,
    address: w.Address,
    datacenter: w.Datacenter,
    taggedAddresses: w.TaggedAddresses,
    meta: w.Meta,
    createIndex: w.CreateIndex,
    modifyIndex: w.ModifyIndex,
  })
);
export type Node = z.output<typeof zNode>;

export function nodeToWire(n: Node) {
  return {
    ID: n.id,
    Node: n.node,
    Address: n.address,
    Datacenter: n.datacenter,
    TaggedAddresses: n.taggedAddresses,
    Meta: n.meta,
    CreateIndex: n.createIndex,
    ModifyIndex: n.modifyIndex,
  };
}

/** A service instance as recorded in the catalog (node fields flattened in). */
export const zCatalogService = entity(
  {
    ID: zStr,
    Node: zStr,
    Address: zStr,
    Datacenter: zStr,
    TaggedAddresses: zStrMap,
    NodeMeta: zStrMap,
    ServiceID: zStr,
    ServiceName: zStr,
    ServiceAddress: zStr,
    ServiceTags: zStrList,
    ServiceMeta: zStrMap,
    ServicePort: zNum,
    ServiceWeights: zServiceWeights,
    ServiceEnableTagOverride: zBool,
    CreateIndex: zNum,
    ModifyIndex: zNum,
  },
  (w) => ({
    id: w.ID,
    node: w.Node,
    address: w.Address,
    datacenter: w.Datacenter,
    taggedAddresses: w.TaggedAddresses,
    nodeMeta: w.NodeMeta,
    serviceId: w.ServiceID,
    serviceName: w.ServiceName,
    serviceAddress: w.ServiceAddress,
    serviceTags: w.ServiceTags,
    serviceMeta: w.ServiceMeta,
    servicePort: w.ServicePort,
    serviceWeights: w.ServiceWeights,
    serviceEnableTagOverride: w.ServiceEnableTagOverride,
    createIndex: w.CreateIndex,
    modifyIndex: w.ModifyIndex,
  })
);
export type CatalogService = z.output<typeof zCatalogService>;

/** A node and the services registered on it. */
export const zCatalogNode = entity(
  {
    Node: nullableOf(zNode),
    Services: mapOf(zAgentService),
  },
  (w) => ({ node: w.Node, services: w.Services })
);
export type CatalogNode = z.output<typeof zCatalogNode>;

export const zDatacenters = zStrList;
export const zNodeList = listOf(zNode);
export const zCatalogServiceList = listOf(zCatalogService);
/** service name → tags */
export const zServiceTagMap = mapOf(zStrList);

// ── Payloads (outbound only) ─────────────────────────────────────────────────

export interface CatalogRegistrationPayload {
  node: string;
  address: string;
  id?: string;
  datacenter?: string;
  taggedAddresses?: Record<string, string>;
  nodeMeta?: Record<string, string>;
  service?: AgentServiceRegistration;
  check?: AgentServiceCheck & { node?: string; serviceId?: string };
  skipNodeUpdate?: boolean;
}

export function catalogRegistrationToWire(p: CatalogRegistrationPayload) {
  const service = p.service
    ? agentServiceRegistrationToWire(p.service)
    : undefined;
  return {
    ID: p.id,
    Node: p.node,
    Address: p.address,
    Datacenter: p.datacenter,
    TaggedAddresses: p.taggedAddresses,
    NodeMeta: p.nodeMeta,
    // the catalog names the service field "Service", not "Name"
    Service: service
      ? { ...service, Name: undefined, Service: service.Name }
      : undefined,
    Check: p.check
      ? {
          ...agentServiceCheckToWire(p.check),
          Node: p.check.node ?? p.node,
          ServiceID: p.check.serviceId,
        }
      : undefined,
    SkipNodeUpdate: p.skipNodeUpdate,
  };
}

export interface CatalogDeregistrationPayload {
  node: string;
  datacenter?: string;
  checkId?: string;
  serviceId?: string;
}

export function catalogDeregistrationToWire(p: CatalogDeregistrationPayload) {
  return {
    Node: p.node,
    Datacenter: p.datacenter,
    CheckID: p.checkId,
    ServiceID: p.serviceId,
  };
}
