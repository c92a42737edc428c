// src/resources/Agent.ts
/**
 * Purpose:
 * - Endpoints served by the local agent: gossip members, agent-owned services
 *   and checks, and service registration with anti-entropy.
 *
 * Notes:
 * - Agent reads are not raft-backed and carry no X-Consul-Index; they go through
 *   readLocal and return LocalMeta. /v1/agent/services supports hash blocking
 *   (QueryOptions.waitHash with LocalMeta.lastContentHash).
 */

import {
  agentServiceRegistrationToWire,
  zAgentMember,
  zAgentService,
  type AgentMember,
  type AgentService,
  type AgentServiceRegistration,
} from "../contracts/agent.contract";
import { listOf, mapOf, zVoid } from "../contracts/common.contract";
import { zHealthCheck, type HealthCheck } from "../contracts/health.contract";
import { MissingParameterError } from "../errors/ConsulError";
import type {
  LocalMeta,
  QueryOptions,
  QueryParams,
  WriteMeta,
  WriteOptions,
} from "../http/options";
import { readLocal, write } from "../http/RequestDispatcher";
import { ResourceBase } from "./ResourceBase";

export type AgentCheck = HealthCheck;

const zMemberList = listOf(zAgentMember);
const zServiceMap = mapOf(zAgentService);
const zCheckMap = mapOf(zHealthCheck);

export class Agent extends ResourceBase {
  /** Gossip members; `wan` lists the WAN pool (servers only) instead of LAN. */
  public async listMembers(
    wan: boolean
  ): Promise<[AgentMember[], LocalMeta]> {
    const params: QueryParams = wan ? { wan: "1" } : {};
    return readLocal(
      "/v1/agent/members",
      this.config,
      params,
      undefined,
      zMemberList
    );
  }

  /** Services registered with this agent, keyed by service ID. */
  public async listServices(
    q?: QueryOptions
  ): Promise<[Record<string, AgentService>, LocalMeta]> {
    return readLocal("/v1/agent/services", this.config, {}, q, zServiceMap);
  }

  /** Checks registered with this agent, keyed by check ID. */
  public async listChecks(
    q?: QueryOptions
  ): Promise<[Record<string, AgentCheck>, LocalMeta]> {
    return readLocal("/v1/agent/checks", this.config, {}, q, zCheckMap);
  }

  public async registerService(
    reg: AgentServiceRegistration,
    opts: { replaceExistingChecks?: boolean } = {},
    w?: WriteOptions
  ): Promise<[void, WriteMeta]> {
    if (reg.name.trim() === "") throw new MissingParameterError("name");
    const params: QueryParams = opts.replaceExistingChecks
      ? { "replace-existing-checks": "true" }
      : {};
    return write(
      "/v1/agent/service/register",
      agentServiceRegistrationToWire(reg),
      this.config,
      params,
      w,
      zVoid
    );
  }

  public async deregisterService(
    serviceId: string,
    w?: WriteOptions
  ): Promise<[void, WriteMeta]> {
    const path = `/v1/agent/service/deregister/${this.segment("serviceId", serviceId)}`;
    return write(path, undefined, this.config, {}, w, zVoid);
  }

  /** Toggle maintenance mode, which marks the service critical in the catalog. */
  public async setServiceMaintenance(
    serviceId: string,
    enable: boolean,
    reason?: string,
    w?: WriteOptions
  ): Promise<[void, WriteMeta]> {
    const path = `/v1/agent/service/maintenance/${this.segment("serviceId", serviceId)}`;
    const params: Record<string, string> = { enable: String(enable) };
    if (reason) params.reason = reason;
    return write(path, undefined, this.config, params, w, zVoid);
  }
}
