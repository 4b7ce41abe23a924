import { hex } from "@scure/base";
import { NONCE_LENGTH, SALT_LENGTH, TAG_LENGTH, isValidLogN, open, seal, type SealedBox } from "./cryptoBox.js";
import { VaultError } from "./errors.js";
import { levelFromTag, levelTag, type PersistLevel } from "./securityLevel.js";

export const VAULT_FORMAT_VERSION = 1;

const HEADER_LENGTH = 3;
const SECRET_LENGTH = 32;
export const RECORD_LENGTH = HEADER_LENGTH + SALT_LENGTH + NONCE_LENGTH + SECRET_LENGTH + TAG_LENGTH;

export interface VaultRecord extends SealedBox {
  version: number;
  level: PersistLevel;
}

// version | logN | level; authenticated along with the ciphertext
export const recordHeader = (version: number, logN: number, level: PersistLevel): Uint8Array =>
  Uint8Array.of(version, logN, levelTag(level));

export async function sealSecretKey(
  secretKey: Uint8Array,
  password: string,
  level: PersistLevel,
  logN: number
): Promise<VaultRecord> {
  const box = await seal(secretKey, password, { logN, aad: recordHeader(VAULT_FORMAT_VERSION, logN, level) });
  return { ...box, version: VAULT_FORMAT_VERSION, level };
}

export const openSecretKey = (record: VaultRecord, password: string): Promise<Uint8Array> =>
  open(record, password, recordHeader(record.version, record.logN, record.level));

export const encodeVaultRecord = (record: VaultRecord): string => {
  const out = new Uint8Array(RECORD_LENGTH);
  let offset = 0;
  for (const part of [
    recordHeader(record.version, record.logN, record.level),
    record.salt,
    record.nonce,
    record.ciphertext,
    record.tag,
  ]) {
    out.set(part, offset);
    offset += part.length;
  }
  return hex.encode(out);
};

export const decodeVaultRecord = (text: string): VaultRecord => {
  const value = text.trim();
  if (value.length === 0 || value.length % 2 !== 0 || !/^[0-9a-fA-F]+$/.test(value)) {
    throw new VaultError("CorruptRecord", "Vault record is not valid hex");
  }
  const bytes = hex.decode(value.toLowerCase());
  const version = bytes[0];
  if (version !== VAULT_FORMAT_VERSION) {
    throw new VaultError("UnsupportedVaultVersion", `Unsupported vault record version ${version}`);
  }
  if (bytes.length !== RECORD_LENGTH) {
    throw new VaultError("CorruptRecord", `Vault record must be ${RECORD_LENGTH} bytes, got ${bytes.length}`);
  }
  const logN = bytes[1];
  if (!isValidLogN(logN)) throw new VaultError("CorruptRecord", `Vault record has invalid scrypt cost ${logN}`);
  const level = levelFromTag(bytes[2]);
  if (!level) throw new VaultError("CorruptRecord", `Vault record has unknown security level ${bytes[2]}`);

  let offset = HEADER_LENGTH;
  const take = (length: number): Uint8Array => {
    const part = bytes.slice(offset, offset + length);
    offset += length;
    return part;
  };
  const salt = take(SALT_LENGTH);
  const nonce = take(NONCE_LENGTH);
  const ciphertext = take(SECRET_LENGTH);
  const tag = take(TAG_LENGTH);
  return { version, logN, level, salt, nonce, ciphertext, tag };
};
