import { createCipheriv, createDecipheriv, randomBytes, scrypt } from "node:crypto";
import { VaultError } from "./errors.js";

export const DEFAULT_LOG_N = 13;
export const MIN_LOG_N = 10;
export const MAX_LOG_N = 20;
export const SCRYPT_R = 8;
export const SCRYPT_P = 1;
export const SALT_LENGTH = 16;
export const NONCE_LENGTH = 12;
export const TAG_LENGTH = 16;
const KEY_LENGTH = 32;

export interface SealedBox {
  logN: number;
  salt: Uint8Array;
  nonce: Uint8Array;
  ciphertext: Uint8Array;
  tag: Uint8Array;
}

export interface SealOptions {
  logN?: number;
  /** Additional authenticated data, bound into the tag but not encrypted. */
  aad?: Uint8Array;
}

export const isValidLogN = (logN: number): boolean =>
  Number.isInteger(logN) && logN >= MIN_LOG_N && logN <= MAX_LOG_N;

/**
 * scrypt through the asynchronous binding, so derivation runs on the libuv
 * thread pool and never on the event loop.
 */
const deriveKey = (password: string, salt: Uint8Array, logN: number): Promise<Buffer> => {
  if (!isValidLogN(logN)) {
    return Promise.reject(new RangeError(`scrypt logN must be an integer between ${MIN_LOG_N} and ${MAX_LOG_N}`));
  }
  const N = 2 ** logN;
  const passwordBytes = Buffer.from(password, "utf8");
  return new Promise((resolve, reject) => {
    scrypt(passwordBytes, salt, KEY_LENGTH, { N, r: SCRYPT_R, p: SCRYPT_P, maxmem: 256 * N * SCRYPT_R }, (error, key) => {
      passwordBytes.fill(0);
      if (error) reject(error);
      else resolve(key);
    });
  });
};

export async function seal(plaintext: Uint8Array, password: string, options: SealOptions = {}): Promise<SealedBox> {
  const logN = options.logN ?? DEFAULT_LOG_N;
  const salt = randomBytes(SALT_LENGTH);
  const nonce = randomBytes(NONCE_LENGTH);
  const key = await deriveKey(password, salt, logN);
  try {
    const cipher = createCipheriv("aes-256-gcm", key, nonce, { authTagLength: TAG_LENGTH });
    if (options.aad) cipher.setAAD(options.aad);
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    return { logN, salt, nonce, ciphertext, tag: cipher.getAuthTag() };
  } finally {
    key.fill(0);
  }
}

/** Fails with `AuthenticationFailed` on a wrong password or any tampering. */
export async function open(box: SealedBox, password: string, aad?: Uint8Array): Promise<Uint8Array> {
  const key = await deriveKey(password, box.salt, box.logN);
  let head: Buffer | null = null;
  try {
    const decipher = createDecipheriv("aes-256-gcm", key, box.nonce, { authTagLength: TAG_LENGTH });
    if (aad) decipher.setAAD(aad);
    decipher.setAuthTag(box.tag);
    head = decipher.update(box.ciphertext);
    let tail: Buffer;
    try {
      tail = decipher.final();
    } catch {
      throw new VaultError("AuthenticationFailed", "Sealed data failed authentication");
    }
    const plaintext = new Uint8Array(head.length + tail.length);
    plaintext.set(head);
    plaintext.set(tail, head.length);
    tail.fill(0);
    return plaintext;
  } finally {
    key.fill(0);
    head?.fill(0);
  }
}
