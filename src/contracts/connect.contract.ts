// src/contracts/connect.contract.ts
/**
 * Service-mesh (Connect) metadata: CA roots, CA provider configuration and
 * intentions.
 */

import { z } from "zod";
import { entity, listOf, zBool, zNum, zStr, zStrMap } from "./common.contract";

export const zCARoot = entity(
  {
    ID: zStr,
    Name: zStr,
    RootCert: zStr,
    Active: zBool,
    NotBefore: zStr,
    NotAfter: zStr,
    CreateIndex: zNum,
    ModifyIndex: zNum,
  },
  (w) => ({
    id: w.ID,
    name: w.Name,
    rootCert: w.RootCert,
    active: w.Active,
    notBefore: w.NotBefore,
    notAfter: w.NotAfter,
    createIndex: w.CreateIndex,
    modifyIndex: w.ModifyIndex,
  })
);
export type CARoot = z.output<typeof zCARoot>;

export const zCARootList = entity(
  {
    ActiveRootID: zStr,
    TrustDomain: zStr,
    Roots: listOf(zCARoot),
  },
  (w) => ({
    activeRootId: w.ActiveRootID,
    trustDomain: w.TrustDomain,
    roots: w.Roots,
  })
);
export type CARootList = z.output<typeof zCARootList>;

/** Provider config is provider-specific; kept as opaque JSON. */
export const zCAConfig = entity(
  {
    Provider: zStr,
    Config: z
      .record(z.unknown())
      .nullish()
      .transform((v) => v ?? {}),
    CreateIndex: zNum,
    ModifyIndex: zNum,
  },
  (w) => ({
    provider: w.Provider,
    config: w.Config,
    createIndex: w.CreateIndex,
    modifyIndex: w.ModifyIndex,
  })
);
export type CAConfig = z.output<typeof zCAConfig>;

export const zIntention = entity(
  {
    ID: zStr,
    Description: zStr,
    SourceNS: zStr,
    SourceName: zStr,
    DestinationNS: zStr,
    DestinationName: zStr,
    SourceType: zStr,
    Action: zStr,
    Meta: zStrMap,
    Precedence: zNum,
    CreateIndex: zNum,
    ModifyIndex: zNum,
  },
  (w) => ({
    id: w.ID,
    description: w.Description,
    sourceNs: w.SourceNS,
    sourceName: w.SourceName,
    destinationNs: w.DestinationNS,
    destinationName: w.DestinationName,
    sourceType: w.SourceType,
    action: w.Action,
    meta: w.Meta,
    precedence: w.Precedence,
    createIndex: w.CreateIndex,
    modifyIndex: w.ModifyIndex,
  })
);
export type Intention = z.output<typeof zIntention>;

export const zIntentionList = listOf(zIntention);
