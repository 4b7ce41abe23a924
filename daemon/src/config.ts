import { homedir } from "node:os";
import { join } from "node:path";
import { DEFAULT_LOG_N, DEFAULT_SECURITY_LEVEL, isSecurityLevel, isValidLogN, type SecurityLevel } from "@nostr-keyring/vault";
import { DEFAULT_APPROVAL_TIMEOUT_MS, MAX_APPROVAL_TIMEOUT_MS } from "@nostr-keyring/signer";

const parseNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim().length === 0) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return parsed;
};

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value.trim().length === 0) return fallback;
  return value.trim().toLowerCase() === "true";
};

const parseList = (value: string | undefined, fallback: string[]): string[] => {
  const items = (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
};

const parseSecurityLevel = (value: string | undefined): SecurityLevel => {
  if (value === undefined || value.trim().length === 0) return DEFAULT_SECURITY_LEVEL;
  const level = value.trim();
  if (!isSecurityLevel(level)) {
    throw new Error(`Invalid KEYRING_SECURITY_LEVEL: ${value}. Use never, password-required or optional-password.`);
  }
  return level;
};

const parseLogN = (value: string | undefined): number => {
  const logN = parseNumber(value, DEFAULT_LOG_N);
  if (!isValidLogN(logN)) throw new Error(`Invalid KEYRING_SCRYPT_LOG_N: ${value}`);
  return logN;
};

const parseApprovalTimeout = (value: string | undefined): number => {
  const timeoutMs = parseNumber(value, DEFAULT_APPROVAL_TIMEOUT_MS);
  if (!Number.isInteger(timeoutMs) || timeoutMs > MAX_APPROVAL_TIMEOUT_MS) {
    throw new Error(`Invalid KEYRING_APPROVAL_TIMEOUT_MS: ${value}. Use whole milliseconds up to ${MAX_APPROVAL_TIMEOUT_MS}.`);
  }
  return timeoutMs;
};

const isDev = process.env.KEYRING_DEV_MODE === "true";

const requireEnv = (name: string, devFallback: string): string => {
  const value = process.env[name];
  if (value && value.length > 0) return value;
  if (isDev) return devFallback;
  throw new Error(`Missing required env var: ${name}. Set it or enable KEYRING_DEV_MODE=true for local development.`);
};

export const config = Object.freeze({
  port: parseNumber(process.env.KEYRING_PORT, 7400),
  devMode: isDev,
  controlToken: requireEnv("KEYRING_CONTROL_TOKEN", "change-me-in-production"),
  dataDir: process.env.KEYRING_DATA_DIR || join(homedir(), ".local", "share", "nostr-keyring"),
  relays: parseList(process.env.KEYRING_RELAYS, ["wss://relay.damus.io"]),
  securityLevel: parseSecurityLevel(process.env.KEYRING_SECURITY_LEVEL),
  scryptLogN: parseLogN(process.env.KEYRING_SCRYPT_LOG_N),
  approvalTimeoutMs: parseApprovalTimeout(process.env.KEYRING_APPROVAL_TIMEOUT_MS),
  acceptUnknownClients: parseBoolean(process.env.KEYRING_ACCEPT_UNKNOWN_CLIENTS, true),
});

export type DaemonConfig = typeof config;
