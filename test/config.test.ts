import { describe, it, expect } from "vitest";
import { ConfigurationHolder, createConfig, loadConfigFromEnv } from "../src/config";
import { PreconditionError } from "../src/errors";

describe("createConfig", () => {
  it("returns a frozen value", () => {
    const config = createConfig("test-secret", "development");
    expect(config).toEqual({ apiKey: "test-secret", environment: "development" });
    expect(Object.isFrozen(config)).toBe(true);
  });
});

describe("ConfigurationHolder", () => {
  it("throws NOT_CONFIGURED before configure()", () => {
    const holder = new ConfigurationHolder();
    expect(holder.isConfigured).toBe(false);
    expect(() => holder.current()).toThrow(PreconditionError);
    expect(() => holder.current()).toThrow(/call configure\(\) first/);
  });

  it("keeps the last configuration", () => {
    const holder = new ConfigurationHolder();
    holder.configure("first-key", "development");
    holder.configure("second-key", "production");

    expect(holder.isConfigured).toBe(true);
    expect(holder.current()).toEqual({ apiKey: "second-key", environment: "production" });
  });
});

describe("loadConfigFromEnv", () => {
  it("reads the server key and environment", () => {
    const config = loadConfigFromEnv({
      FCM_SERVER_KEY: "test-secret",
      APNS_ENVIRONMENT: "development",
    });
    expect(config).toEqual({ apiKey: "test-secret", environment: "development" });
  });

  it("rejects a missing environment instead of assuming one", () => {
    expect(() => loadConfigFromEnv({ FCM_SERVER_KEY: "test-secret" })).toThrow(PreconditionError);
    expect(() => loadConfigFromEnv({ FCM_SERVER_KEY: "test-secret" })).toThrow(
      /^Invalid APNS_ENVIRONMENT/,
    );
  });

  it("rejects a missing or empty server key", () => {
    expect(() => loadConfigFromEnv({})).toThrow(PreconditionError);
    expect(() => loadConfigFromEnv({})).toThrow(/^Invalid FCM_SERVER_KEY/);
    expect(() => loadConfigFromEnv({ FCM_SERVER_KEY: "", APNS_ENVIRONMENT: "production" })).toThrow(
      "Invalid FCM_SERVER_KEY: FCM_SERVER_KEY must not be empty",
    );
  });

  it("rejects an unknown environment", () => {
    expect(() =>
      loadConfigFromEnv({ FCM_SERVER_KEY: "test-secret", APNS_ENVIRONMENT: "staging" }),
    ).toThrow(/^Invalid APNS_ENVIRONMENT/);
  });
});
