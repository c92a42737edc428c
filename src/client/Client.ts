// src/client/Client.ts
/**
 * Purpose:
 * - Entry point. Composes one facade per Consul subsystem over a single
 *   immutable Config; the facades share its axios transport.
 *
 * Usage:
 *   const client = new Client(configFromEnv());
 *   const [nodes, meta] = await client.catalog.listDatacenterNodes();
 *   const [changed] = await client.catalog.listDatacenterNodes({
 *     waitIndex: meta.lastIndex,
 *   });
 */

import { defaultConfig, type Config } from "../config/Config";
import { Agent } from "../resources/Agent";
import { Catalog } from "../resources/Catalog";
import { Connect } from "../resources/Connect";
import { Health } from "../resources/Health";
import { Kv } from "../resources/Kv";
import { Session } from "../resources/Session";

export class Client {
  public readonly config: Config;
  public readonly agent: Agent;
  public readonly catalog: Catalog;
  public readonly connect: Connect;
  public readonly health: Health;
  public readonly kv: Kv;
  public readonly session: Session;

  constructor(config: Config = defaultConfig()) {
    this.config = config;
    this.agent = new Agent(config);
    this.catalog = new Catalog(config);
    this.connect = new Connect(config);
    this.health = new Health(config);
    this.kv = new Kv(config);
    this.session = new Session(config);
  }
}
