// test/resources/connect.spec.ts
import { describe, it, expect } from "vitest";
import { Client } from "../../src/client/Client";
import { fakeConsul, indexed, TEST_ADDRESS } from "../helpers/fakeConsul";

describe("Connect", () => {
  it("lists CA roots", async () => {
    const fake = fakeConsul({
      body: {
        ActiveRootID: "r1",
        TrustDomain: "11111111-2222-3333-4444-555555555555.consul",
        Roots: [{ ID: "r1", Name: "Consul CA Root Cert", Active: true }],
      },
      headers: indexed(14),
    });
    const client = new Client(fake.config());

    const [roots, meta] = await client.connect.listCaRoots();

    expect(roots.activeRootId).toBe("r1");
    expect(roots.roots.map((r) => r.active)).toEqual([true]);
    expect(meta.lastIndex).toBe(14);
    expect(fake.request().url).toBe(`${TEST_ADDRESS}/v1/connect/ca/roots`);
  });

  it("keeps provider config opaque", async () => {
    const fake = fakeConsul({
      body: { Provider: "consul", Config: { LeafCertTTL: "72h" } },
      headers: indexed(5),
    });
    const client = new Client(fake.config());

    const [cfg] = await client.connect.getCaConfiguration();

    expect(cfg.provider).toBe("consul");
    expect(cfg.config).toEqual({ LeafCertTTL: "72h" });
    expect(fake.request().url).toBe(
      `${TEST_ADDRESS}/v1/connect/ca/configuration`
    );
  });

  it("lists intentions", async () => {
    const fake = fakeConsul({
      body: [{ ID: "i1", SourceName: "web", DestinationName: "db", Action: "allow" }],
      headers: indexed(6),
    });
    const client = new Client(fake.config());

    const [intentions] = await client.connect.listIntentions();

    expect(intentions[0]).toMatchObject({
      sourceName: "web",
      destinationName: "db",
      action: "allow",
    });
    expect(fake.request().url).toBe(`${TEST_ADDRESS}/v1/connect/intentions`);
  });
});
