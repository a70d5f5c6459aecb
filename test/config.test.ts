import { describe, expect, it } from "vitest";
import { effectiveLogLevel, loadConfig } from "../src/config";
import { DEFAULT_COT_URL, DEFAULT_HOST_ID, MAX_COT_STALE } from "../src/constants";
import { CotWireError } from "../src/errors";

describe("loadConfig", () => {
  it("applies defaults to an empty source", () => {
    const config = loadConfig({});
    expect(config.COT_URL).toBe(DEFAULT_COT_URL);
    expect(config.COT_HOST_ID).toBe(DEFAULT_HOST_ID);
    expect(config.COT_STALE).toBe(120);
    expect(config.TAK_PROTO).toBe(0);
    expect(config.MAX_OUT_QUEUE).toBe(100);
    expect(config.MAX_IN_QUEUE).toBe(500);
    expect(config.PYTAK_MULTICAST_TTL).toBe(1);
    expect(config.PYTAK_NO_HELLO).toBe(false);
    expect(config.PYTAK_IP_FAMILY).toBeUndefined();
    expect(config.PYTAK_TLS_CLIENT_CERT).toBeUndefined();
    expect(config.LOG_LEVEL).toBe("info");
  });

  it("coerces numbers and boolean-ish flags", () => {
    const config = loadConfig({
      COT_STALE: "300",
      TAK_PROTO: "1",
      PYTAK_NO_HELLO: "yes",
      FTS_COMPAT: "ON",
      PYTAK_TLS_DONT_VERIFY: "0",
      PYTAK_IP_FAMILY: "6",
      PYTAK_SLEEP: "2.5",
    });
    expect(config.COT_STALE).toBe(300);
    expect(config.TAK_PROTO).toBe(1);
    expect(config.PYTAK_NO_HELLO).toBe(true);
    expect(config.FTS_COMPAT).toBe(true);
    expect(config.PYTAK_TLS_DONT_VERIFY).toBe(false);
    expect(config.PYTAK_IP_FAMILY).toBe(6);
    expect(config.PYTAK_SLEEP).toBe(2.5);
  });

  it("treats empty strings as unset", () => {
    const config = loadConfig({ COT_URL: "", PYTAK_TLS_CLIENT_CERT: "  " });
    expect(config.COT_URL).toBe(DEFAULT_COT_URL);
    expect(config.PYTAK_TLS_CLIENT_CERT).toBeUndefined();
  });

  it("lets overrides win over the source", () => {
    const config = loadConfig(
      { COT_URL: "tcp://a.example:8087" },
      { COT_URL: "tcp://b.example:8087" },
    );
    expect(config.COT_URL).toBe("tcp://b.example:8087");
  });

  it("rejects invalid values with E_CONFIG", () => {
    expect(() => loadConfig({ TAK_PROTO: "2" })).toThrow(CotWireError);
    try {
      loadConfig({ PYTAK_MULTICAST_TTL: "300" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(CotWireError);
      expect(err instanceof CotWireError && err.code).toBe("E_CONFIG");
      expect(err instanceof CotWireError && err.message).toContain("PYTAK_MULTICAST_TTL");
    }
  });

  it("bounds COT_STALE to a representable deadline", () => {
    expect(loadConfig({ COT_STALE: String(MAX_COT_STALE) }).COT_STALE).toBe(MAX_COT_STALE);
    try {
      loadConfig({ COT_STALE: "1e15" });
      expect.unreachable();
    } catch (err) {
      expect(err instanceof CotWireError && err.code).toBe("E_CONFIG");
      expect(err instanceof CotWireError && err.message).toContain("COT_STALE");
    }
  });
});

describe("effectiveLogLevel", () => {
  it("raises info to debug when DEBUG is set", () => {
    expect(effectiveLogLevel(loadConfig({ DEBUG: "1" }))).toBe("debug");
    expect(effectiveLogLevel(loadConfig({ DEBUG: "1", LOG_LEVEL: "warn" }))).toBe("warn");
    expect(effectiveLogLevel(loadConfig({}))).toBe("info");
  });
});
