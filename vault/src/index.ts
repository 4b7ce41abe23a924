export { VaultError, isVaultError, type VaultErrorCode } from "./errors.js";
export {
  SECURITY_LEVELS,
  DEFAULT_SECURITY_LEVEL,
  allowsPersist,
  describeSecurityLevel,
  isSecurityLevel,
  requiresPassword,
  type PersistLevel,
  type SecurityLevel,
} from "./securityLevel.js";
export { derivePublicKey, generateSecretKey, isValidXOnlyKey, schnorrSign, schnorrVerify } from "./secp.js";
export {
  decodeNip19,
  encodeNip19,
  equalBytes,
  isHexKey,
  normalizePublicKey,
  parsePublicKey,
  parseSecretKey,
  toHex,
  type Nip19Prefix,
} from "./keys.js";
export { DEFAULT_LOG_N, MAX_LOG_N, MIN_LOG_N, isValidLogN, open, seal, type SealOptions, type SealedBox } from "./cryptoBox.js";
export {
  RECORD_LENGTH,
  VAULT_FORMAT_VERSION,
  decodeVaultRecord,
  encodeVaultRecord,
  openSecretKey,
  sealSecretKey,
  type VaultRecord,
} from "./vaultRecord.js";
export { FileVaultStore, MemoryVaultStore, VAULT_FILE_NAMES, type VaultSlot, type VaultStore } from "./vaultStore.js";
export { nip04Decrypt, nip04Encrypt, nip04Open, nip04Seal, nip04SharedKey } from "./nip04.js";
export { KeyVault, type KeyVaultOptions, type SaveResult, type VaultSnapshot, type VaultStatus } from "./keyVault.js";
export {
  buildConditions,
  createDelegation,
  delegationToken,
  validityWindow,
  verifyDelegation,
  type DelegationConditions,
  type DelegationTag,
} from "./delegation.js";
