import { allowsPersist, isVaultError, type KeyVault, type VaultStatus } from "@nostr-keyring/vault";

/**
 * Restores the saved identity at start-up. Under `optional-password` an empty
 * password is tried once; when that fails the vault simply stays locked.
 */
export async function restoreVault(vault: KeyVault): Promise<VaultStatus> {
  if (!allowsPersist(vault.securityLevel)) return vault.status;
  try {
    await vault.load();
  } catch (error) {
    if (isVaultError(error, "NoRecordFound")) {
      console.log("[daemon] no saved identity");
      return vault.status;
    }
    throw error;
  }
  if (vault.status === "locked" && vault.securityLevel === "optional-password") {
    try {
      await vault.unlock("");
    } catch (error) {
      if (!isVaultError(error, "WrongPassword") && !isVaultError(error, "PolicyViolation")) throw error;
      console.log("[daemon] saved identity needs a password; staying locked");
    }
  }
  return vault.status;
}
