// src/contracts/common.contract.ts
/**
 * Purpose:
 * - Zero-value building blocks for Consul wire shapes.
 *
 * Invariants:
 * - Absent or null wire fields decode to the type's zero value ("", 0, false,
 *   [], {}), nested entities to null. Unknown fields are dropped, since the
 *   server adds fields over time.
 * - Wire keys are written exactly as the server spells them (PascalCase).
 */

import { z } from "zod";
import type { Decoder } from "../http/RequestDispatcher";

export const zStr = z
  .string()
  .nullish()
  .transform((v) => v ?? "");

export const zNum = z
  .number()
  .nullish()
  .transform((v) => v ?? 0);

export const zBool = z
  .boolean()
  .nullish()
  .transform((v) => v ?? false);

export const zStrList = z
  .array(z.string())
  .nullish()
  .transform((v) => v ?? []);

export const zStrMap = z
  .record(z.string())
  .nullish()
  .transform((v) => v ?? {});

/** Write endpoints that answer with nothing useful (or `true`). */
export const zVoid: Decoder<void> = z.unknown().transform((): void => undefined);

/** Write endpoints that answer `true`/`false`; empty body reads as false. */
export const zBoolResult: Decoder<boolean> = zBool;

export function listOf<T>(item: Decoder<T>): Decoder<T[]> {
  return z
    .array(item)
    .nullish()
    .transform((v) => v ?? []);
}

export function mapOf<T>(item: Decoder<T>): Decoder<Record<string, T>> {
  return z
    .record(item)
    .nullish()
    .transform((v) => v ?? {});
}

/** Optional nested entity: absent or null → null. */
export function nullableOf<T>(item: Decoder<T>): Decoder<T | null> {
  return item.nullish().transform((v) => v ?? null);
}

/**
 * Entity decoder: validates the wire object (null/absent → `{}`, so every
 * field takes its zero value) and maps it onto client-side names.
 */
export function entity<S extends z.ZodRawShape, T>(
  shape: S,
  fromWire: (w: z.output<z.ZodObject<S>>) => T
): Decoder<T> {
  return z
    .preprocess((v) => v ?? {}, z.object(shape))
    .transform(fromWire);
}
