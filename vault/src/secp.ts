import { randomFillSync } from "node:crypto";
import { getSharedSecret, hashes, Point, schnorr } from "@noble/secp256k1";
import { hmac } from "@noble/hashes/hmac.js";
import { sha256 } from "@noble/hashes/sha2.js";

// @noble/secp256k1 v3 requires hash functions to be configured for signing
hashes.hmacSha256 = (key: Uint8Array, message: Uint8Array): Uint8Array<ArrayBuffer> => hmac(sha256, key, message);
hashes.sha256 = (message: Uint8Array): Uint8Array<ArrayBuffer> => sha256(message);

// Deterministic BIP-340 signatures: auxiliary randomness is all zeros.
const ZERO_AUX = new Uint8Array(32);

/** x-only public key for a secret scalar; throws when the scalar is out of range. */
export const derivePublicKey = (secretKey: Uint8Array): Uint8Array => schnorr.getPublicKey(secretKey);

export const isValidSecretKey = (secretKey: Uint8Array): boolean => {
  if (secretKey.length !== 32) return false;
  try {
    derivePublicKey(secretKey);
    return true;
  } catch {
    return false;
  }
};

export const isValidXOnlyKey = (publicKey: Uint8Array): boolean => {
  if (publicKey.length !== 32) return false;
  try {
    Point.fromBytes(compressed(publicKey));
    return true;
  } catch {
    return false;
  }
};

export const generateSecretKey = (): Uint8Array => {
  const secretKey = new Uint8Array(32);
  do {
    randomFillSync(secretKey);
  } while (!isValidSecretKey(secretKey));
  return secretKey;
};

export const schnorrSign = (digest: Uint8Array, secretKey: Uint8Array): Uint8Array =>
  schnorr.sign(digest, secretKey, ZERO_AUX);

export const schnorrVerify = (signature: Uint8Array, digest: Uint8Array, publicKey: Uint8Array): boolean => {
  try {
    return schnorr.verify(signature, digest, publicKey);
  } catch {
    return false;
  }
};

/** ECDH shared x-coordinate against an x-only peer key (even y assumed). */
export const sharedSecretX = (secretKey: Uint8Array, peerXOnly: Uint8Array): Uint8Array => {
  const point = getSharedSecret(secretKey, compressed(peerXOnly), true);
  const x = point.slice(1, 33);
  point.fill(0);
  return x;
};

const compressed = (xOnly: Uint8Array): Uint8Array => {
  const out = new Uint8Array(33);
  out[0] = 0x02;
  out.set(xOnly, 1);
  return out;
};
