// src/contracts/agent.contract.ts
/**
 * Agent-local shapes: gossip members, locally registered services and the
 * registration payloads the agent accepts.
 */

import type { z } from "zod";
import {
  entity,
  zBool,
  zNum,
  zStr,
  zStrList,
  zStrMap,
} from "./common.contract";

// ── Service weights ──────────────────────────────────────────────────────────

export const zServiceWeights = entity(
  { Passing: zNum, Warning: zNum },
  (w) => ({ passing: w.Passing, warning: w.Warning })
);
export type ServiceWeights = z.output<typeof zServiceWeights>;

export function serviceWeightsToWire(w: ServiceWeights) {
  return { Passing: w.passing, Warning: w.warning };
}

// ── Members ──────────────────────────────────────────────────────────────────

/** A node in the gossip pool as seen by the local agent. */
export const zAgentMember = entity(
  {
    Name: zStr,
    Addr: zStr,
    Port: zNum,
    Tags: zStrMap,
    Status: zNum,
    ProtocolMin: zNum,
    ProtocolMax: zNum,
    ProtocolCur: zNum,
    DelegateMin: zNum,
    DelegateMax: zNum,
    DelegateCur: zNum,
  },
  (w) => ({
    name: w.Name,
    addr: w.Addr,
    port: w.Port,
    tags: w.Tags,
    status: w.Status,
    protocolMin: w.ProtocolMin,
    protocolMax: w.ProtocolMax,
    protocolCur: w.ProtocolCur,
    delegateMin: w.DelegateMin,
    delegateMax: w.DelegateMax,
    delegateCur: w.DelegateCur,
  })
);
export type AgentMember = z.output<typeof zAgentMember>;

// ── Services ─────────────────────────────────────────────────────────────────

export const zAgentService = entity(
  {
    Kind: zStr,
    ID: zStr,
    Service: zStr,
    Tags: zStrList,
    Meta: zStrMap,
    Port: zNum,
    Address: zStr,
    Weights: zServiceWeights,
    EnableTagOverride: zBool,
    Datacenter: zStr,
    ContentHash: zStr,
    CreateIndex: zNum,
    ModifyIndex: zNum,
  },
  (w) => ({
    kind: w.Kind,
    id: w.ID,
    service: w.Service,
    tags: w.Tags,
    meta: w.Meta,
    port: w.Port,
    address: w.Address,
    weights: w.Weights,
    enableTagOverride: w.EnableTagOverride,
    datacenter: w.Datacenter,
    contentHash: w.ContentHash,
    createIndex: w.CreateIndex,
    modifyIndex: w.ModifyIndex,
  })
);
export type AgentService = z.output<typeof zAgentService>;

export function agentServiceToWire(s: AgentService) {
  return {
    Kind: s.kind,
    ID: s.id,
    Service: s.service,
    Tags: s.tags,
    Meta: s.meta,
    Port: s.port,
    Address: s.address,
    Weights: serviceWeightsToWire(s.weights),
    EnableTagOverride: s.enableTagOverride,
    Datacenter: s.datacenter,
    ContentHash: s.contentHash,
    CreateIndex: s.createIndex,
    ModifyIndex: s.modifyIndex,
  };
}

// ── Registration payloads (outbound only) ────────────────────────────────────

export interface AgentServiceCheck {
  checkId?: string;
  name?: string;
  interval?: string; // e.g. "10s"
  timeout?: string;
  http?: string;
  method?: string;
  header?: Record<string, string[]>;
  tcp?: string;
  ttl?: string;
  status?: "passing" | "warning" | "critical";
  notes?: string;
  deregisterCriticalServiceAfter?: string;
}

export function agentServiceCheckToWire(c: AgentServiceCheck) {
  return {
    CheckID: c.checkId,
    Name: c.name,
    Interval: c.interval,
    Timeout: c.timeout,
    HTTP: c.http,
    Method: c.method,
    Header: c.header,
    TCP: c.tcp,
    TTL: c.ttl,
    Status: c.status,
    Notes: c.notes,
    DeregisterCriticalServiceAfter: c.deregisterCriticalServiceAfter,
  };
}

export interface AgentServiceRegistration {
  name: string;
  id?: string;
  kind?: string;
  tags?: string[];
  port?: number;
  address?: string;
  meta?: Record<string, string>;
  enableTagOverride?: boolean;
  weights?: ServiceWeights;
  check?: AgentServiceCheck;
  checks?: AgentServiceCheck[];
}

export function agentServiceRegistrationToWire(r: AgentServiceRegistration) {
  return {
    ID: r.id,
    Name: r.name,
    Kind: r.kind,
    Tags: r.tags,
    Port: r.port,
    Address: r.address,
    Meta: r.meta,
    EnableTagOverride: r.enableTagOverride,
    Weights: r.weights ? serviceWeightsToWire(r.weights) : undefined,
    Check: r.check ? agentServiceCheckToWire(r.check) : undefined,
    Checks: r.checks?.map(agentServiceCheckToWire),
  };
}
