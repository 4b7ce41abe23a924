import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";
import { VaultError } from "./errors.js";
import { sharedSecretX } from "./secp.js";

const IV_LENGTH = 16;
const PAYLOAD = /^([A-Za-z0-9+/]+={0,2})\?iv=([A-Za-z0-9+/]+={0,2})$/;

/** AES-256-CBC key shared between `secretKey` and the x-only `peer`. */
export const nip04SharedKey = (secretKey: Uint8Array, peer: Uint8Array): Uint8Array => sharedSecretX(secretKey, peer);

/** `base64(ciphertext)?iv=base64(iv)` */
export const nip04Seal = (sharedKey: Uint8Array, plaintext: string): string => {
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv("aes-256-cbc", sharedKey, iv);
  const ciphertext = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);
  return `${ciphertext.toString("base64")}?iv=${iv.toString("base64")}`;
};

export const nip04Open = (sharedKey: Uint8Array, payload: string): string => {
  const match = PAYLOAD.exec(payload.trim());
  if (!match) throw new VaultError("AuthenticationFailed", "Malformed NIP-04 payload");
  const ciphertext = Buffer.from(match[1], "base64");
  const iv = Buffer.from(match[2], "base64");
  if (iv.length !== IV_LENGTH || ciphertext.length === 0 || ciphertext.length % IV_LENGTH !== 0) {
    throw new VaultError("AuthenticationFailed", "Malformed NIP-04 payload");
  }
  const decipher = createDecipheriv("aes-256-cbc", sharedKey, iv);
  let plaintext: Buffer;
  try {
    plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch {
    throw new VaultError("AuthenticationFailed", "NIP-04 payload could not be decrypted");
  }
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(plaintext);
  } catch {
    throw new VaultError("AuthenticationFailed", "NIP-04 plaintext is not valid UTF-8");
  } finally {
    plaintext.fill(0);
  }
};

export const nip04Encrypt = (secretKey: Uint8Array, peer: Uint8Array, plaintext: string): string => {
  const key = nip04SharedKey(secretKey, peer);
  try {
    return nip04Seal(key, plaintext);
  } finally {
    key.fill(0);
  }
};

export const nip04Decrypt = (secretKey: Uint8Array, peer: Uint8Array, payload: string): string => {
  const key = nip04SharedKey(secretKey, peer);
  try {
    return nip04Open(key, payload);
  } finally {
    key.fill(0);
  }
};
