import { bech32, hex } from "@scure/base";
import { VaultError } from "./errors.js";
import { isValidSecretKey, isValidXOnlyKey } from "./secp.js";

export type Nip19Prefix = "nsec" | "npub";

const HEX_KEY = /^[0-9a-fA-F]{64}$/;

export const toHex = (bytes: Uint8Array): string => hex.encode(bytes);

export const isHexKey = (value: string): boolean => HEX_KEY.test(value);

export const encodeNip19 = (prefix: Nip19Prefix, bytes: Uint8Array): string =>
  bech32.encode(prefix, bech32.toWords(bytes));

/** Decodes a NIP-19 string carrying a 32-byte payload; null on any mismatch. */
export const decodeNip19 = (value: string, prefix: Nip19Prefix): Uint8Array | null => {
  const decoded = bech32.decodeUnsafe(value.toLowerCase());
  if (!decoded || decoded.prefix !== prefix) return null;
  const bytes = bech32.fromWordsUnsafe(decoded.words);
  if (!bytes || bytes.length !== 32) return null;
  return Uint8Array.from(bytes);
};

const decodeKey = (input: string, prefix: Nip19Prefix): Uint8Array | null => {
  const value = input.trim();
  if (HEX_KEY.test(value)) return hex.decode(value.toLowerCase());
  if (value.toLowerCase().startsWith(`${prefix}1`)) return decodeNip19(value, prefix);
  return null;
};

/** Accepts 64-char hex or `nsec1…`. */
export const parseSecretKey = (input: string): Uint8Array => {
  const secretKey = decodeKey(input, "nsec");
  if (!secretKey) throw new VaultError("InvalidKeyFormat", "Secret key must be 64 hex characters or an nsec string");
  if (!isValidSecretKey(secretKey)) {
    secretKey.fill(0);
    throw new VaultError("InvalidKeyFormat", "Secret key is outside the secp256k1 scalar range");
  }
  return secretKey;
};

/** Accepts 64-char hex or `npub1…`; the key must lift to a curve point. */
export const parsePublicKey = (input: string): Uint8Array => {
  const publicKey = decodeKey(input, "npub");
  if (!publicKey) throw new VaultError("InvalidKeyFormat", "Public key must be 64 hex characters or an npub string");
  if (!isValidXOnlyKey(publicKey)) throw new VaultError("InvalidKeyFormat", "Public key is not a point on secp256k1");
  return publicKey;
};

export const normalizePublicKey = (input: string): string => toHex(parsePublicKey(input));

export const equalBytes = (a: Uint8Array, b: Uint8Array): boolean => {
  if (a.length !== b.length) return false;
  let diff = 0;
  for (let i = 0; i < a.length; i++) diff |= a[i] ^ b[i];
  return diff === 0;
};
