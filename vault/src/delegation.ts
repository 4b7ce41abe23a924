import { sha256 } from "@noble/hashes/sha2.js";
import { hex } from "@scure/base";
import { VaultError } from "./errors.js";
import type { KeyVault } from "./keyVault.js";
import { normalizePublicKey, parsePublicKey } from "./keys.js";
import { schnorrVerify } from "./secp.js";

/** NIP-26 delegation tag: `["delegation", delegator, conditions, signature]`. */
export type DelegationTag = ["delegation", string, string, string];

export interface DelegationConditions {
  kind?: number;
  since?: number;
  until?: number;
}

const DAY_SECONDS = 86_400;

export const buildConditions = ({ kind, since, until }: DelegationConditions): string => {
  const parts: string[] = [];
  if (kind !== undefined) parts.push(`kind=${kind}`);
  if (since !== undefined) parts.push(`created_at>${since}`);
  if (until !== undefined) parts.push(`created_at<${until}`);
  return parts.join("&");
};

export const validityWindow = (days: number, now = Math.floor(Date.now() / 1000)): { since: number; until: number } => ({
  since: now,
  until: now + Math.round(days * DAY_SECONDS),
});

export const delegationToken = (delegatee: string, conditions: string): string =>
  `nostr:delegation:${normalizePublicKey(delegatee)}:${conditions}`;

const tokenDigest = (delegatee: string, conditions: string): Uint8Array =>
  sha256(new TextEncoder().encode(delegationToken(delegatee, conditions)));

export async function createDelegation(vault: KeyVault, delegatee: string, conditions: string): Promise<DelegationTag> {
  const delegator = vault.publicKey;
  if (!delegator) throw new VaultError("SigningUnavailable", "No identity to delegate from");
  const signature = await vault.sign(tokenDigest(delegatee, conditions));
  return ["delegation", delegator, conditions, hex.encode(signature)];
}

export const verifyDelegation = (tag: DelegationTag, delegatee: string): boolean => {
  const [, delegator, conditions, signature] = tag;
  if (!/^[0-9a-f]{128}$/.test(signature)) return false;
  try {
    return schnorrVerify(hex.decode(signature), tokenDigest(delegatee, conditions), parsePublicKey(delegator));
  } catch {
    return false;
  }
};
