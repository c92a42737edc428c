// src/contracts/health.contract.ts
import type { z } from "zod";
import { zAgentService } from "./agent.contract";
import { zNode } from "./catalog.contract";
import {
  entity,
  listOf,
  nullableOf,
  zNum,
  zStr,
  zStrList,
} from "./common.contract";

export const HEALTH_STATES = ["any", "passing", "warning", "critical"] as const;
export type HealthState = (typeof HEALTH_STATES)[number];

export const zHealthCheck = entity(
  {
    Node: zStr,
    CheckID: zStr,
    Name: zStr,
    Status: zStr,
    Notes: zStr,
    Output: zStr,
    ServiceID: zStr,
    ServiceName: zStr,
    ServiceTags: zStrList,
    Type: zStr,
    CreateIndex: zNum,
    ModifyIndex: zNum,
  },
  (w) => ({
    node: w.Node,
    checkId: w.CheckID,
    name: w.Name,
    status: w.Status,
    notes: w.Notes,
    output: w.Output,
    serviceId: w.ServiceID,
    serviceName: w.ServiceName,
    serviceTags: w.ServiceTags,
    type: w.Type,
    createIndex: w.CreateIndex,
    modifyIndex: w.ModifyIndex,
  })
);
export type HealthCheck = z.output<typeof zHealthCheck>;

/** One service instance with its node and every check that covers it. */
export const zServiceEntry = entity(
  {
    Node: nullableOf(zNode),
    Service: nullableOf(zAgentService),
    Checks: listOf(zHealthCheck),
  },
  (w) => ({ node: w.Node, service: w.Service, checks: w.Checks })
);
export type ServiceEntry = z.output<typeof zServiceEntry>;

export const zHealthCheckList = listOf(zHealthCheck);
export const zServiceEntryList = listOf(zServiceEntry);
