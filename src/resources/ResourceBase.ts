// src/resources/ResourceBase.ts
/**
 * Purpose:
 * - Root for the resource facades (catalog, health, kv, ...). Holds the shared
 *   Config and the client-side precondition checks that run before any I/O.
 *
 * Notes:
 * - Facades are built only by Client; the package exports them as types.
 */

import type { Config } from "../config/Config";
import { EmptyKeyError, MissingParameterError } from "../errors/ConsulError";

export abstract class ResourceBase {
  protected readonly config: Config;

  constructor(config: Config) {
    this.config = config;
  }

  /** Fail fast on a blank identifier; returns it URI-encoded for a path segment. */
  protected segment(name: string, value: string): string {
    if (value.trim() === "") throw new MissingParameterError(name);
    return encodeURIComponent(value);
  }

  /** KV keys keep their "/" separators; each part is encoded on its own. */
  protected keyPath(key: string, allowEmpty = false): string {
    const stripped = key.replace(/^\/+/, "");
    // "/" names the keyspace root, so it is as empty as ""
    if (!allowEmpty && stripped === "") throw new EmptyKeyError();
    return stripped.split("/").map(encodeURIComponent).join("/");
  }
}
