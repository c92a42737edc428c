// src/index.ts
/**
 * Curated exports (no god-barrel).
 * Resource facades are exported as types only: Client is their one constructor.
 */

export { Client } from "./client/Client";

// Config & env
export {
  configFromEnv,
  configFromHost,
  defaultConfig,
  normalizeAddress,
  DEFAULT_ADDRESS,
  DEFAULT_PORT,
  type Config,
  type ConfigOverrides,
} from "./config/Config";
export { loadEnvFile, type EnvSnapshot } from "./env/EnvLoader";

// Logging
export {
  createLogger,
  getLogger,
  setRootLogger,
  type IBoundLogger,
} from "./logger/Logger";

// Errors
export {
  ConsulError,
  DecodeError,
  EmptyKeyError,
  HttpError,
  MissingParameterError,
  RequestFailedError,
  isConsulError,
  type ConsulErrorKind,
} from "./errors/ConsulError";

// Core request layer
export {
  read,
  readLocal,
  write,
  type Decoder,
  type WriteMethod,
} from "./http/RequestDispatcher";
export {
  DEFAULT_WAIT_TIME_MS,
  type ConsistencyMode,
  type LocalMeta,
  type QueryMeta,
  type QueryOptions,
  type QueryParams,
  type WriteMeta,
  type WriteOptions,
} from "./http/options";
export { CONSUL_HEADERS } from "./http/headers";
export { watch, type IndexedQuery, type WatchOptions } from "./watch/watch";

// Resource facades
export type { Agent, AgentCheck } from "./resources/Agent";
export type { Catalog } from "./resources/Catalog";
export type { Connect } from "./resources/Connect";
export type { Health, ServiceInstanceFilter } from "./resources/Health";
export type { Kv, KvDeleteOptions, KvPutOptions } from "./resources/Kv";
export type { Session } from "./resources/Session";

// Contracts
export {
  agentServiceToWire,
  serviceWeightsToWire,
  type AgentMember,
  type AgentService,
  type AgentServiceCheck,
  type AgentServiceRegistration,
  type ServiceWeights,
} from "./contracts/agent.contract";
export {
  nodeToWire,
  type CatalogDeregistrationPayload,
  type CatalogNode,
  type CatalogRegistrationPayload,
  type CatalogService,
  type Node,
} from "./contracts/catalog.contract";
export type {
  CAConfig,
  CARoot,
  CARootList,
  Intention,
} from "./contracts/connect.contract";
export type {
  HealthCheck,
  HealthState,
  ServiceEntry,
} from "./contracts/health.contract";
export { kvPairToWire, type KVPair } from "./contracts/kv.contract";
export type {
  SessionBehavior,
  SessionCreatePayload,
  SessionCreated,
  SessionEntry,
} from "./contracts/session.contract";
