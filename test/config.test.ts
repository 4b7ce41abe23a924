import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

const loadConfig = async () => (await import("../daemon/src/config.js")).config;

describe("config", () => {
  beforeEach(() => {
    vi.resetModules();
    for (const name of [
      "KEYRING_PORT",
      "KEYRING_CONTROL_TOKEN",
      "KEYRING_DATA_DIR",
      "KEYRING_RELAYS",
      "KEYRING_SECURITY_LEVEL",
      "KEYRING_SCRYPT_LOG_N",
      "KEYRING_APPROVAL_TIMEOUT_MS",
      "KEYRING_ACCEPT_UNKNOWN_CLIENTS",
    ]) {
      vi.stubEnv(name, "");
    }
    vi.stubEnv("KEYRING_DEV_MODE", "true");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("falls back to defaults in dev mode", async () => {
    const config = await loadConfig();
    expect(config).toMatchObject({
      port: 7400,
      devMode: true,
      controlToken: "change-me-in-production",
      relays: ["wss://relay.damus.io"],
      securityLevel: "password-required",
      scryptLogN: 13,
      approvalTimeoutMs: 120_000,
      acceptUnknownClients: true,
    });
  });

  it("reads overrides from the environment", async () => {
    vi.stubEnv("KEYRING_PORT", "9000");
    vi.stubEnv("KEYRING_CONTROL_TOKEN", "test-control-token");
    vi.stubEnv("KEYRING_DATA_DIR", "/tmp/keyring-test");
    vi.stubEnv("KEYRING_RELAYS", "wss://a.test, wss://b.test,");
    vi.stubEnv("KEYRING_SECURITY_LEVEL", "optional-password");
    vi.stubEnv("KEYRING_SCRYPT_LOG_N", "15");
    vi.stubEnv("KEYRING_APPROVAL_TIMEOUT_MS", "5000");
    vi.stubEnv("KEYRING_ACCEPT_UNKNOWN_CLIENTS", "false");
    const config = await loadConfig();
    expect(config).toMatchObject({
      port: 9000,
      controlToken: "test-control-token",
      dataDir: "/tmp/keyring-test",
      relays: ["wss://a.test", "wss://b.test"],
      securityLevel: "optional-password",
      scryptLogN: 15,
      approvalTimeoutMs: 5000,
      acceptUnknownClients: false,
    });
  });

  it("requires a control token outside dev mode", async () => {
    vi.stubEnv("KEYRING_DEV_MODE", "false");
    await expect(loadConfig()).rejects.toThrow("Missing required env var: KEYRING_CONTROL_TOKEN");
  });

  it("rejects an unknown security level", async () => {
    vi.stubEnv("KEYRING_SECURITY_LEVEL", "sometimes");
    await expect(loadConfig()).rejects.toThrow("Invalid KEYRING_SECURITY_LEVEL: sometimes");
  });

  it("rejects an approval timeout beyond the timer range", async () => {
    vi.stubEnv("KEYRING_APPROVAL_TIMEOUT_MS", "2147483648");
    await expect(loadConfig()).rejects.toThrow("Invalid KEYRING_APPROVAL_TIMEOUT_MS: 2147483648");
  });

  it("accepts the longest approval timeout a timer can hold", async () => {
    vi.stubEnv("KEYRING_APPROVAL_TIMEOUT_MS", "2147483647");
    expect((await loadConfig()).approvalTimeoutMs).toBe(2147483647);
  });

  it("rejects an scrypt cost outside the supported range", async () => {
    vi.stubEnv("KEYRING_SCRYPT_LOG_N", "30");
    await expect(loadConfig()).rejects.toThrow("Invalid KEYRING_SCRYPT_LOG_N: 30");
  });
});
