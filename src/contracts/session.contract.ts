// src/contracts/session.contract.ts
import type { z } from "zod";
import { entity, listOf, zNum, zStr, zStrList } from "./common.contract";

export type SessionBehavior = "release" | "delete";

export const zSessionEntry = entity(
  {
    ID: zStr,
    Name: zStr,
    Node: zStr,
    LockDelay: zNum, // nanoseconds on the wire
    Behavior: zStr,
    TTL: zStr,
    Checks: zStrList,
    NodeChecks: zStrList,
    CreateIndex: zNum,
    ModifyIndex: zNum,
  },
  (w) => ({
    id: w.ID,
    name: w.Name,
    node: w.Node,
    lockDelayNs: w.LockDelay,
    behavior: w.Behavior,
    ttl: w.TTL,
    checks: w.Checks,
    nodeChecks: w.NodeChecks,
    createIndex: w.CreateIndex,
    modifyIndex: w.ModifyIndex,
  })
);
export type SessionEntry = z.output<typeof zSessionEntry>;

export const zSessionEntryList = listOf(zSessionEntry);

export const zSessionCreated = entity({ ID: zStr }, (w) => ({ id: w.ID }));
export type SessionCreated = z.output<typeof zSessionCreated>;

export interface SessionCreatePayload {
  name?: string;
  node?: string;
  /** Duration string, e.g. "15s". */
  lockDelay?: string;
  behavior?: SessionBehavior;
  /** Duration string between 10s and 86400s, e.g. "30s". */
  ttl?: string;
  checks?: string[];
  nodeChecks?: string[];
}

export function sessionCreateToWire(p: SessionCreatePayload) {
  return {
    Name: p.name,
    Node: p.node,
    LockDelay: p.lockDelay,
    Behavior: p.behavior,
    TTL: p.ttl,
    Checks: p.checks,
    NodeChecks: p.nodeChecks,
  };
}
