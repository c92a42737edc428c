// test/config/config.spec.ts
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, it, expect } from "vitest";
import {
  configFromEnv,
  configFromHost,
  defaultConfig,
  normalizeAddress,
  DEFAULT_ADDRESS,
} from "../../src/config/Config";
import { loadEnvFile } from "../../src/env/EnvLoader";

describe("defaultConfig", () => {
  it("points at the local agent", () => {
    const cfg = defaultConfig();
    expect(cfg.address).toBe(DEFAULT_ADDRESS);
    expect(cfg.timeoutMs).toBe(10_000);
    expect(cfg.longPollGraceMs).toBe(5_000);
    expect(cfg.token).toBeUndefined();
    expect(cfg.datacenter).toBeUndefined();
  });

  it("applies overrides", () => {
    const cfg = defaultConfig({ datacenter: "dc2", waitTimeMs: 60_000 });
    expect(cfg.datacenter).toBe("dc2");
    expect(cfg.waitTimeMs).toBe(60_000);
  });
});

describe("configFromHost", () => {
  it("defaults the port to 8500", () => {
    expect(configFromHost("consul.local").address).toBe(
      "http://consul.local:8500"
    );
  });

  it("takes an explicit port and token", () => {
    const cfg = configFromHost("10.0.0.5", 8501, "test-secret");
    expect(cfg.address).toBe("http://10.0.0.5:8501");
    expect(cfg.token).toBe("test-secret");
  });
});

describe("normalizeAddress", () => {
  it.each([
    ["127.0.0.1:8500", false, "http://127.0.0.1:8500"],
    ["127.0.0.1:8501", true, "https://127.0.0.1:8501"],
    ["http://consul:8500/", true, "http://consul:8500"],
    ["HTTPS://consul:8501", false, "HTTPS://consul:8501"],
  ])("%s (ssl=%s) → %s", (addr, ssl, expected) => {
    expect(normalizeAddress(addr, ssl)).toBe(expected);
  });
});

describe("configFromEnv", () => {
  it("falls back to defaults on an empty env", () => {
    const cfg = configFromEnv({});
    expect(cfg.address).toBe(DEFAULT_ADDRESS);
    expect(cfg.token).toBeUndefined();
    expect(cfg.log).toBeUndefined();
  });

  it("reads address, ssl, token, datacenter and timeout", () => {
    const cfg = configFromEnv({
      CONSUL_HTTP_ADDR: "consul.internal:8501",
      CONSUL_HTTP_SSL: "true",
      CONSUL_HTTP_TOKEN: "test-secret",
      CONSUL_DATACENTER: "dc2",
      CONSUL_HTTP_TIMEOUT_MS: "2500",
    });
    expect(cfg.address).toBe("https://consul.internal:8501");
    expect(cfg.token).toBe("test-secret");
    expect(cfg.datacenter).toBe("dc2");
    expect(cfg.timeoutMs).toBe(2_500);
  });

  it("treats blank values as absent", () => {
    const cfg = configFromEnv({ CONSUL_HTTP_TOKEN: "   ", CONSUL_HTTP_ADDR: "" });
    expect(cfg.token).toBeUndefined();
    expect(cfg.address).toBe(DEFAULT_ADDRESS);
  });

  it("rejects a non-integer timeout", () => {
    expect(() => configFromEnv({ CONSUL_HTTP_TIMEOUT_MS: "soon" })).toThrow(
      'ENV: CONSUL_HTTP_TIMEOUT_MS must be an integer (got: "soon").'
    );
  });

  it("rejects a negative timeout", () => {
    expect(() => configFromEnv({ CONSUL_HTTP_TIMEOUT_MS: "-1" })).toThrow(
      "ENV: CONSUL_HTTP_TIMEOUT_MS must be >= 0 (got: -1)."
    );
  });

  it("rejects an unreadable boolean", () => {
    expect(() => configFromEnv({ CONSUL_HTTP_SSL: "maybe" })).toThrow(
      'ENV: CONSUL_HTTP_SSL must be a boolean (got: "maybe").'
    );
  });

  it("builds a logger for a valid LOG_LEVEL and rejects an unknown one", () => {
    expect(configFromEnv({ LOG_LEVEL: "warn" }).log).toBeDefined();
    expect(() => configFromEnv({ LOG_LEVEL: "loud" })).toThrow(
      'ENV: LOG_LEVEL is not a valid level (got: "loud").'
    );
  });
});

describe("loadEnvFile", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  function writeEnv(contents: string): string {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "consul-env-"));
    const file = path.join(dir, ".env");
    fs.writeFileSync(file, contents);
    return file;
  }

  it("merges the file beneath the given env", () => {
    const file = writeEnv(
      "CONSUL_HTTP_ADDR=from-file:8500\nCONSUL_DATACENTER=dc9\nlower_key=x\n"
    );

    const env = loadEnvFile(file, { CONSUL_DATACENTER: "dc1" });

    expect(env.CONSUL_HTTP_ADDR).toBe("from-file:8500");
    expect(env.CONSUL_DATACENTER).toBe("dc1");
    expect(env.lower_key).toBeUndefined();
    expect(configFromEnv(env).address).toBe("http://from-file:8500");
  });

  it("does not touch process.env", () => {
    const before = process.env.CONSUL_TEST_ONLY_KEY;
    const file = writeEnv("CONSUL_TEST_ONLY_KEY=set-by-file\n");

    const env = loadEnvFile(file);

    expect(env.CONSUL_TEST_ONLY_KEY).toBe("set-by-file");
    expect(process.env.CONSUL_TEST_ONLY_KEY).toBe(before);
  });

  it("returns the env unchanged when the file is missing", () => {
    expect(loadEnvFile("/nonexistent/.env", { CONSUL_DATACENTER: "dc1" })).toEqual({
      CONSUL_DATACENTER: "dc1",
    });
  });
});
