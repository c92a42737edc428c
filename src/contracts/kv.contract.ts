// src/contracts/kv.contract.ts
/**
 * KV entries. The wire carries values base64-encoded; they decode to a Buffer
 * (null when the key holds no value).
 */

import { z } from "zod";
import { entity, listOf, zNum, zStr } from "./common.contract";

const zBase64Value = z
  .string()
  .nullish()
  .transform((v) => (v == null ? null : Buffer.from(v, "base64")));

export const zKVPair = entity(
  {
    Key: zStr,
    CreateIndex: zNum,
    ModifyIndex: zNum,
    LockIndex: zNum,
    Flags: zNum,
    Value: zBase64Value,
    Session: zStr,
  },
  (w) => ({
    key: w.Key,
    createIndex: w.CreateIndex,
    modifyIndex: w.ModifyIndex,
    lockIndex: w.LockIndex,
    flags: w.Flags,
    value: w.Value,
    session: w.Session,
  })
);
export type KVPair = z.output<typeof zKVPair>;

export function kvPairToWire(p: KVPair) {
  return {
    Key: p.key,
    CreateIndex: p.createIndex,
    ModifyIndex: p.modifyIndex,
    LockIndex: p.lockIndex,
    Flags: p.flags,
    Value: p.value === null ? null : p.value.toString("base64"),
    Session: p.session,
  };
}

export const zKVPairList = listOf(zKVPair);
