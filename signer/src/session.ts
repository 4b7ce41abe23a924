import { VaultError, nip04Open, nip04Seal } from "@nostr-keyring/vault";
import { SignerError } from "./errors.js";
import type { ApprovalMethod } from "./protocol.js";
import type { TransportKeys } from "./transportKeys.js";

export interface SessionInfo {
  id: string;
  relay: string | null;
  name: string | null;
  permissions: ApprovalMethod[];
  alive: boolean;
  createdAt: number;
  lastSeenAt: number;
}

/** One connected client, keyed by its public key. */
export class SignerSession {
  readonly id: string;
  readonly relay: string | null;
  readonly name: string | null;
  readonly createdAt: number;
  private lastSeenAt: number;
  private readonly sharedKey: Uint8Array;
  private readonly permissions = new Set<ApprovalMethod>();
  private alive = true;
  private tail: Promise<void> = Promise.resolve();

  constructor(clientPubkey: string, keys: TransportKeys, options: { relay?: string | null; name?: string | null } = {}) {
    this.id = clientPubkey;
    this.relay = options.relay ?? null;
    this.name = options.name ?? null;
    this.sharedKey = keys.sharedKey(clientPubkey);
    this.createdAt = Date.now();
    this.lastSeenAt = this.createdAt;
  }

  get isAlive(): boolean {
    return this.alive;
  }

  touch(): void {
    this.lastSeenAt = Date.now();
  }

  decrypt(payload: string): string {
    if (!this.alive) throw new SignerError("SessionClosed", "Session is closed");
    try {
      return nip04Open(this.sharedKey, payload);
    } catch (error) {
      if (error instanceof VaultError) throw new SignerError("DecryptionFailed", error.message);
      throw error;
    }
  }

  encrypt(plaintext: string): string {
    if (!this.alive) throw new SignerError("SessionClosed", "Session is closed");
    return nip04Seal(this.sharedKey, plaintext);
  }

  allows(method: ApprovalMethod): boolean {
    return this.permissions.has(method);
  }

  setPermission(method: ApprovalMethod, allowed: boolean): void {
    if (allowed) this.permissions.add(method);
    else this.permissions.delete(method);
  }

  /** Runs `task` after every task queued before it for this session. */
  run(task: () => Promise<void>): Promise<void> {
    const next = this.tail.then(task);
    this.tail = next.catch((error: unknown) => {
      console.error(`[engine] session ${this.id.slice(0, 8)} task failed: ${String(error)}`);
    });
    return this.tail;
  }

  close(): void {
    if (!this.alive) return;
    this.alive = false;
    this.sharedKey.fill(0);
    this.permissions.clear();
  }

  info(): SessionInfo {
    return {
      id: this.id,
      relay: this.relay,
      name: this.name,
      permissions: [...this.permissions],
      alive: this.alive,
      createdAt: this.createdAt,
      lastSeenAt: this.lastSeenAt,
    };
  }
}
