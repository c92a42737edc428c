// src/logger/Logger.ts
/**
 * Purpose:
 * - Single logging API for the client with contextual .bind().
 * - Overloaded methods allow:
 *     log.info("msg")            OR  log.info({ctx}, "msg")
 *     log.info("msg", {meta})    OR  log.info({meta}, "msg")
 * - edge() marks request boundaries (before a call leaves the process).
 *
 * Notes:
 * - Root is pino at level "silent" so a library import never writes to stdout.
 *   Applications either inject their own pino via setRootLogger() or give a
 *   Config its own logger via createLogger(level).
 * - Secrets (X-Consul-Token) are redacted if they ever reach a record.
 */

import pino, {
  stdTimeFunctions,
  type Logger as PinoLogger,
  type LevelWithSilent,
} from "pino";

type Json = Record<string, unknown>;

/** Public interface for bound logger handles (no private members). */
export interface IBoundLogger {
  bind(ctx: Json): IBoundLogger;

  edge(msg: string, ...rest: unknown[]): void;
  edge(obj: Json, msg?: string, ...rest: unknown[]): void;

  debug(msg: string, ...rest: unknown[]): void;
  debug(obj: Json, msg?: string, ...rest: unknown[]): void;

  info(msg: string, ...rest: unknown[]): void;
  info(obj: Json, msg?: string, ...rest: unknown[]): void;

  warn(msg: string, ...rest: unknown[]): void;
  warn(obj: Json, msg?: string, ...rest: unknown[]): void;

  error(msg: string, ...rest: unknown[]): void;
  error(obj: Json, msg?: string, ...rest: unknown[]): void;

  serializeError(err: unknown): {
    name?: string;
    message: string;
    stack?: string;
  };
}

export const LOG_LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

const REDACT_PATHS = ["token", 'headers["X-Consul-Token"]'];

function buildPino(level: LevelWithSilent): PinoLogger {
  return pino({
    level,
    base: { lib: "consul-http-client" },
    timestamp: stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, remove: true },
  });
}

let ROOT: PinoLogger = buildPino("silent");

/** Replace the process-wide root (e.g. with the application's own pino). */
export function setRootLogger(logger: PinoLogger): void {
  ROOT = logger;
}

/** Bound logger over the current root. */
export function getLogger(initialCtx: Json = {}): IBoundLogger {
  return new BoundLogger(() => ROOT, initialCtx);
}

/** Bound logger over a dedicated pino instance at the given level. */
export function createLogger(
  level: LevelWithSilent,
  initialCtx: Json = {}
): IBoundLogger {
  const own = buildPino(level);
  return new BoundLogger(() => own, initialCtx);
}

export function isLogLevel(v: string): v is LevelWithSilent {
  return LOG_LEVELS.some((l) => l === v);
}

// ────────────────────────────────────────────────────────────────────────────
// Bound logger
// ────────────────────────────────────────────────────────────────────────────

class BoundLogger implements IBoundLogger {
  constructor(
    private readonly root: () => PinoLogger,
    private readonly ctx: Json = {}
  ) {}

  public bind(ctx: Json): IBoundLogger {
    return new BoundLogger(this.root, { ...this.ctx, ...ctx });
  }

  // edge: request-boundary trace, emitted at debug with a category tag
  public edge(arg1: unknown, arg2?: unknown, ...rest: unknown[]): void {
    const [obj, msg] = normalizeForBound(this.ctx, arg1, arg2, rest);
    this.root().debug({ category: "edge", ...obj }, msg);
  }

  public debug(arg1: unknown, arg2?: unknown, ...rest: unknown[]): void {
    const [obj, msg] = normalizeForBound(this.ctx, arg1, arg2, rest);
    this.root().debug(obj, msg);
  }

  public info(arg1: unknown, arg2?: unknown, ...rest: unknown[]): void {
    const [obj, msg] = normalizeForBound(this.ctx, arg1, arg2, rest);
    this.root().info(obj, msg);
  }

  public warn(arg1: unknown, arg2?: unknown, ...rest: unknown[]): void {
    const [obj, msg] = normalizeForBound(this.ctx, arg1, arg2, rest);
    this.root().warn(obj, msg);
  }

  public error(arg1: unknown, arg2?: unknown, ...rest: unknown[]): void {
    const [obj, msg] = normalizeForBound(this.ctx, arg1, arg2, rest);
    this.root().error(obj, msg);
  }

  public serializeError(err: unknown) {
    if (err instanceof Error)
      return { name: err.name, message: err.message, stack: err.stack };
    return { message: String(err) };
  }
}

function isPlainObject(v: unknown): v is Json {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Normalize args while merging in bound context. Extra scalars land in `args`. */
function normalizeForBound(
  boundCtx: Json,
  arg1: unknown,
  arg2?: unknown,
  rest: unknown[] = []
): [Json, string | undefined] {
  const meta: Json = {};
  const tail: unknown[] = [];
  let msg: string | undefined;

  if (typeof arg1 === "string") {
    msg = arg1;
    for (const x of [arg2, ...rest]) {
      if (isPlainObject(x)) Object.assign(meta, x);
      else if (x !== undefined) tail.push(x);
    }
  } else if (isPlainObject(arg1)) {
    Object.assign(meta, arg1);
    if (typeof arg2 === "string") msg = arg2;
    else if (isPlainObject(arg2)) Object.assign(meta, arg2);
    else if (arg2 !== undefined) tail.push(arg2);
    for (const x of rest) {
      if (isPlainObject(x)) Object.assign(meta, x);
      else if (x !== undefined) tail.push(x);
    }
  } else {
    meta.arg0 = arg1;
  }

  if (tail.length) meta.args = tail;
  return [{ ...boundCtx, ...meta }, msg];
}
