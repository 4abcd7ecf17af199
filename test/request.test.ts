import { describe, it, expect, vi } from "vitest";
import { BATCH_IMPORT_URL, buildExchangeRequest } from "../src/request";
import { createConfig } from "../src/config";
import { buildUserAgent, resolveAppMetadata, staticMetadataProvider } from "../src/metadata";
import { PreconditionError } from "../src/errors";
import type { AppMetadata } from "../src/types";

const METADATA: AppMetadata = {
  bundleId: "com.example.app",
  name: "Example",
  version: "1.2.0",
  build: "42",
};

/** Run `fn` and return what it threw. */
function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return undefined;
}

describe("buildExchangeRequest", () => {
  it("builds the batchImport request for development", () => {
    const request = buildExchangeRequest(
      createConfig("test-secret", "development"),
      "apns-device-token-123",
      METADATA,
    );

    expect(request.method).toBe("POST");
    expect(request.url).toBe("https://iid.googleapis.com/iid/v1:batchImport");
    expect(request.url).toBe(BATCH_IMPORT_URL);
    expect(request.headers).toEqual({
      authorization: "key=test-secret",
      "content-type": "application/json",
    });
    expect(JSON.parse(request.body)).toEqual({
      application: "com.example.app",
      sandbox: true,
      apns_tokens: ["apns-device-token-123"],
    });
  });

  it("sets sandbox false for production", () => {
    const request = buildExchangeRequest(createConfig("test-secret", "production"), "tok", METADATA);
    expect(request.body).toBe('{"application":"com.example.app","sandbox":false,"apns_tokens":["tok"]}');
  });

  it("passes the device token through verbatim", () => {
    const token = "not-hex \"quoted\" ✓";
    const request = buildExchangeRequest(createConfig("k", "production"), token, METADATA);
    expect(JSON.parse(request.body).apns_tokens).toEqual([token]);
  });

  it("does not validate the api key", () => {
    const request = buildExchangeRequest(createConfig("", "production"), "tok", METADATA);
    expect(request.headers.authorization).toBe("key=");
  });

  it("uses the placeholder application id when metadata is unknown", () => {
    const request = buildExchangeRequest(
      createConfig("k", "production"),
      "tok",
      resolveAppMetadata(staticMetadataProvider({})),
    );
    expect(JSON.parse(request.body).application).toBe("(not set)");
  });

  it("adds a user agent only when asked", () => {
    const request = buildExchangeRequest(createConfig("k", "production"), "tok", METADATA, {
      userAgent: true,
    });
    expect(request.headers["user-agent"]).toBe(buildUserAgent(METADATA));
    expect(Object.keys(request.headers)).toHaveLength(3);
  });

  it("returns a frozen request", () => {
    const request = buildExchangeRequest(createConfig("k", "production"), "tok", METADATA);
    expect(Object.isFrozen(request)).toBe(true);
    expect(Object.isFrozen(request.headers)).toBe(true);
  });

  it("throws NOT_CONFIGURED without credentials", () => {
    expect(() => buildExchangeRequest(null, "tok", METADATA)).toThrow(PreconditionError);
    expect(() => buildExchangeRequest({ apiKey: "k" }, "tok", METADATA)).toThrow(
      /call configure\(\) first/,
    );
    const error = thrown(() => buildExchangeRequest({ environment: "development" }, "tok", METADATA));
    expect(error).toBeInstanceOf(PreconditionError);
    expect(error).toMatchObject({ reason: "NOT_CONFIGURED" });
  });

  it("throws SERIALIZATION_FAILED when the body cannot be serialized", () => {
    const spy = vi.spyOn(JSON, "stringify").mockImplementationOnce(() => {
      throw new TypeError("cyclic structure");
    });
    try {
      const error = thrown(() => buildExchangeRequest(createConfig("k", "production"), "tok", METADATA));
      expect(error).toBeInstanceOf(PreconditionError);
      expect(error).toMatchObject({ reason: "SERIALIZATION_FAILED" });
      expect(String(error)).toBe("PreconditionError: cyclic structure");
    } finally {
      spy.mockRestore();
    }
  });
});

describe("buildUserAgent", () => {
  it("formats name, version, build and runtime", () => {
    expect(buildUserAgent(METADATA, "v20.11.0")).toBe("Example/1.2.0 (42; Node.js v20.11.0)");
  });
});
