// test/contracts/contracts.spec.ts
import { describe, it, expect } from "vitest";
import {
  serviceWeightsToWire,
  zAgentService,
  zServiceWeights,
} from "../../src/contracts/agent.contract";
import {
  catalogRegistrationToWire,
  nodeToWire,
  zCatalogNode,
  zNode,
} from "../../src/contracts/catalog.contract";
import { zCARootList } from "../../src/contracts/connect.contract";
import { zServiceEntryList } from "../../src/contracts/health.contract";
import { kvPairToWire, zKVPair } from "../../src/contracts/kv.contract";
import { zSessionEntry } from "../../src/contracts/session.contract";

describe("zero values", () => {
  it("fills every absent node field with its zero value", () => {
    expect(zNode.parse({ Node: "n1" })).toEqual({
      id: "",
      node: "n1",
      address: "",
      datacenter: "",
      taggedAddresses: {},
      meta: {},
      createIndex: 0,
      modifyIndex: 0,
    });
  });

  it("treats null as absent, nested entities included", () => {
    const svc = zAgentService.parse({
      ID: "web-1",
      Service: "web",
      Tags: null,
      Weights: null,
    });
    expect(svc.tags).toEqual([]);
    expect(svc.weights).toEqual({ passing: 0, warning: 0 });
    expect(svc.meta).toEqual({});
  });

  it("drops fields the client does not know", () => {
    expect(zServiceWeights.parse({ Passing: 3, Warning: 1, Future: true })).toEqual(
      { passing: 3, warning: 1 }
    );
  });

  it("rejects a present field of the wrong type", () => {
    expect(zNode.safeParse({ Node: 42 }).success).toBe(false);
  });
});

describe("optional nested entities", () => {
  it("decodes a missing node as null", () => {
    expect(zCatalogNode.parse(null)).toEqual({ node: null, services: {} });
  });

  it("keeps the service map keyed by service id", () => {
    const decoded = zCatalogNode.parse({
      Node: { Node: "n1", Address: "10.0.0.1" },
      Services: { "web-1": { ID: "web-1", Service: "web", Port: 8080 } },
    });
    expect(decoded.node?.address).toBe("10.0.0.1");
    expect(decoded.services["web-1"]?.port).toBe(8080);
  });

  it("decodes service entries with their checks", () => {
    const [entry] = zServiceEntryList.parse([
      {
        Node: { Node: "n1" },
        Service: { ID: "web-1", Service: "web" },
        Checks: [{ CheckID: "serfHealth", Status: "passing" }],
      },
    ]);
    expect(entry?.service?.service).toBe("web");
    expect(entry?.checks.map((c) => c.status)).toEqual(["passing"]);
  });
});

describe("wire encoders", () => {
  it("round-trips service weights", () => {
    const weights = zServiceWeights.parse({ Passing: 10, Warning: 1 });
    expect(serviceWeightsToWire(weights)).toEqual({ Passing: 10, Warning: 1 });
  });

  it("round-trips a node", () => {
    const wire = {
      ID: "40e4a748-2192-161a-0510-9bf59fe950b5",
      Node: "n1",
      Address: "10.0.0.1",
      Datacenter: "dc1",
      TaggedAddresses: { lan: "10.0.0.1" },
      Meta: { rack: "r1" },
      CreateIndex: 5,
      ModifyIndex: 9,
    };
    expect(nodeToWire(zNode.parse(wire))).toEqual(wire);
  });

  it("renames the service's Name to Service in catalog registrations", () => {
    const wire = catalogRegistrationToWire({
      node: "n1",
      address: "10.0.0.1",
      service: { name: "web", port: 8080 },
      check: { name: "web alive", status: "passing" },
    });
    expect(wire.Service?.Service).toBe("web");
    expect(wire.Service?.Name).toBeUndefined();
    expect(wire.Check?.Node).toBe("n1");
    expect(JSON.parse(JSON.stringify(wire))).toEqual({
      Node: "n1",
      Address: "10.0.0.1",
      Service: { Service: "web", Port: 8080 },
      Check: { Name: "web alive", Status: "passing", Node: "n1" },
    });
  });
});

describe("kv values", () => {
  it("decodes base64 values into bytes", () => {
    const pair = zKVPair.parse({ Key: "app/port", Value: "ODA4MA==", Flags: 2 });
    expect(pair.value?.toString("utf8")).toBe("8080");
    expect(pair.flags).toBe(2);
  });

  it("keeps a null value as null", () => {
    expect(zKVPair.parse({ Key: "app/", Value: null }).value).toBeNull();
  });

  it("re-encodes the value as base64", () => {
    const pair = zKVPair.parse({ Key: "k", Value: "aGk=" });
    expect(kvPairToWire(pair).Value).toBe("aGk=");
  });
});

describe("sessions and CA roots", () => {
  it("maps LockDelay to nanoseconds as sent", () => {
    const s = zSessionEntry.parse({ ID: "s1", LockDelay: 15_000_000_000 });
    expect(s.lockDelayNs).toBe(15_000_000_000);
    expect(s.checks).toEqual([]);
  });

  it("decodes the CA root list", () => {
    const roots = zCARootList.parse({
      ActiveRootID: "r1",
      TrustDomain: "example.consul",
      Roots: [{ ID: "r1", Active: true }],
    });
    expect(roots.activeRootId).toBe("r1");
    expect(roots.roots[0]?.active).toBe(true);
  });
});
