// src/resources/Health.ts
import {
  zHealthCheckList,
  zServiceEntryList,
  type HealthCheck,
  type HealthState,
  type ServiceEntry,
} from "../contracts/health.contract";
import type { QueryMeta, QueryOptions } from "../http/options";
import { read } from "../http/RequestDispatcher";
import { ResourceBase } from "./ResourceBase";

export interface ServiceInstanceFilter {
  /** Only instances whose checks are all passing. */
  passingOnly?: boolean;
  tag?: string;
}

export class Health extends ResourceBase {
  /** Checks registered on a node. */
  public async listNodeChecks(
    node: string,
    q?: QueryOptions
  ): Promise<[HealthCheck[], QueryMeta]> {
    const path = `/v1/health/node/${this.segment("node", node)}`;
    return read(path, this.config, {}, q, zHealthCheckList);
  }

  /** Checks associated with a service. */
  public async listServiceChecks(
    service: string,
    q?: QueryOptions
  ): Promise<[HealthCheck[], QueryMeta]> {
    const path = `/v1/health/checks/${this.segment("service", service)}`;
    return read(path, this.config, {}, q, zHealthCheckList);
  }

  /** Service instances with their node and checks. */
  public async listServiceInstances(
    service: string,
    filter: ServiceInstanceFilter = {},
    q?: QueryOptions
  ): Promise<[ServiceEntry[], QueryMeta]> {
    const path = `/v1/health/service/${this.segment("service", service)}`;
    const params: Record<string, string> = {};
    if (filter.passingOnly) params.passing = "";
    if (filter.tag) params.tag = filter.tag;
    return read(path, this.config, params, q, zServiceEntryList);
  }

  /** Checks in a given state ("any" returns all). */
  public async listChecksInState(
    state: HealthState,
    q?: QueryOptions
  ): Promise<[HealthCheck[], QueryMeta]> {
    return read(`/v1/health/state/${state}`, this.config, {}, q, zHealthCheckList);
  }
}
