// src/errors/ConsulError.ts
/**
 * Purpose:
 * - Typed failure taxonomy for every client call.
 *
 * Kinds:
 * - http              transport failed (connect, TLS, timeout, abort)
 * - request_failed    upstream answered non-2xx; body is never decoded
 * - missing_parameter a required argument was empty (checked before I/O)
 * - empty_key         a KV operation received an empty key (checked before I/O)
 * - decode            body or a required header did not match the contract
 */

export type ConsulErrorKind =
  | "http"
  | "request_failed"
  | "missing_parameter"
  | "empty_key"
  | "decode";

export abstract class ConsulError extends Error {
  public abstract readonly kind: ConsulErrorKind;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class HttpError extends ConsulError {
  public readonly kind = "http" as const;

  constructor(message: string, cause: unknown) {
    super(`http request failed: ${message}`, { cause });
  }
}

export class RequestFailedError extends ConsulError {
  public readonly kind = "request_failed" as const;
  public readonly status: number;

  constructor(status: number) {
    super(`request failed with code ${status}`);
    this.status = status;
  }
}

export class MissingParameterError extends ConsulError {
  public readonly kind = "missing_parameter" as const;
  public readonly parameter: string;

  constructor(parameter: string) {
    super(`missing parameter, ${parameter}`);
    this.parameter = parameter;
  }
}

export class EmptyKeyError extends ConsulError {
  public readonly kind = "empty_key" as const;

  constructor() {
    super("expected a non-empty key, got empty");
  }
}

export class DecodeError extends ConsulError {
  public readonly kind = "decode" as const;

  constructor(message: string, cause?: unknown) {
    super(`failed to decode response: ${message}`, { cause });
  }
}

export function isConsulError(err: unknown): err is ConsulError {
  return err instanceof ConsulError;
}
