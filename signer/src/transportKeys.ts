import { hex } from "@scure/base";
import { derivePublicKey, generateSecretKey, nip04SharedKey, parseSecretKey, schnorrSign } from "@nostr-keyring/vault";
import { getEventHash, type EventTemplate, type NostrEvent } from "./event.js";

/**
 * The signer's own keypair for NIP-46 envelopes and relay events. It is not
 * the vault identity: clients learn the identity through `get_public_key`.
 */
export class TransportKeys {
  readonly publicKey: string;
  private readonly secretKey: Uint8Array;

  private constructor(secretKey: Uint8Array) {
    this.secretKey = secretKey;
    this.publicKey = hex.encode(derivePublicKey(secretKey));
  }

  static generate(): TransportKeys {
    return new TransportKeys(generateSecretKey());
  }

  static fromSecret(input: string): TransportKeys {
    return new TransportKeys(parseSecretKey(input));
  }

  /** NIP-04 key shared with `peer` (x-only hex). */
  sharedKey(peer: string): Uint8Array {
    return nip04SharedKey(this.secretKey, hex.decode(peer));
  }

  signEvent(template: Omit<EventTemplate, "pubkey">): NostrEvent {
    const id = getEventHash(this.publicKey, template);
    return {
      id: hex.encode(id),
      pubkey: this.publicKey,
      created_at: template.created_at,
      kind: template.kind,
      tags: template.tags,
      content: template.content,
      sig: hex.encode(schnorrSign(id, this.secretKey)),
    };
  }

  dispose(): void {
    this.secretKey.fill(0);
  }
}
