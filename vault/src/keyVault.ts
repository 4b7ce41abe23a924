import { DEFAULT_LOG_N, isValidLogN } from "./cryptoBox.js";
import { VaultError, isVaultError } from "./errors.js";
import { encodeNip19, equalBytes, parsePublicKey, parseSecretKey, toHex } from "./keys.js";
import { nip04Decrypt, nip04Encrypt } from "./nip04.js";
import { derivePublicKey, generateSecretKey, schnorrSign } from "./secp.js";
import { DEFAULT_SECURITY_LEVEL, allowsPersist, requiresPassword, type SecurityLevel } from "./securityLevel.js";
import { decodeVaultRecord, encodeVaultRecord, openSecretKey, sealSecretKey, type VaultRecord } from "./vaultRecord.js";
import type { VaultStore } from "./vaultStore.js";

export type VaultStatus = "empty" | "locked" | "unlocked" | "public-only";

type VaultState =
  | { status: "empty" }
  | { status: "locked"; record: VaultRecord; publicKey: Uint8Array | null }
  | { status: "unlocked"; secretKey: Uint8Array; publicKey: Uint8Array }
  | { status: "public-only"; publicKey: Uint8Array };

export interface KeyVaultOptions {
  store: VaultStore;
  securityLevel?: SecurityLevel;
  /** scrypt cost for newly sealed records; existing records keep their own. */
  logN?: number;
}

export interface SaveResult {
  persisted: boolean;
  secretSaved: boolean;
}

export interface VaultSnapshot {
  status: VaultStatus;
  publicKey: string | null;
  npub: string | null;
  securityLevel: SecurityLevel;
  unsavedChanges: boolean;
}

/**
 * Holds at most one Nostr identity. The secret key stays inside: callers get
 * signatures and NIP-04 payloads, never the key itself (except through the
 * confirmed `revealSecretKey`).
 *
 * Every operation that touches the secret or the store runs on one internal
 * promise chain, so two requests never interleave their use of the key.
 */
export class KeyVault {
  private state: VaultState = { status: "empty" };
  private unsaved = false;
  private level: SecurityLevel;
  private readonly logN: number;
  private readonly store: VaultStore;
  private chain: Promise<void> = Promise.resolve();

  constructor(options: KeyVaultOptions) {
    this.store = options.store;
    this.level = options.securityLevel ?? DEFAULT_SECURITY_LEVEL;
    this.logN = options.logN ?? DEFAULT_LOG_N;
    if (!isValidLogN(this.logN)) throw new RangeError(`Invalid scrypt logN ${this.logN}`);
  }

  get status(): VaultStatus {
    return this.state.status;
  }

  get securityLevel(): SecurityLevel {
    return this.level;
  }

  get hasUnsavedChanges(): boolean {
    return this.unsaved;
  }

  get publicKey(): string | null {
    const publicKey = this.currentPublicKey();
    return publicKey ? toHex(publicKey) : null;
  }

  get npub(): string | null {
    const publicKey = this.currentPublicKey();
    return publicKey ? encodeNip19("npub", publicKey) : null;
  }

  snapshot(): VaultSnapshot {
    return {
      status: this.status,
      publicKey: this.publicKey,
      npub: this.npub,
      securityLevel: this.level,
      unsavedChanges: this.unsaved,
    };
  }

  setSecurityLevel(level: SecurityLevel): void {
    if (level === this.level) return;
    this.level = level;
    if (this.state.status === "unlocked" || this.state.status === "public-only") this.unsaved = true;
    console.log(`[vault] security level set to ${level}`);
  }

  generate(): void {
    const secretKey = generateSecretKey();
    this.replace({ status: "unlocked", secretKey, publicKey: derivePublicKey(secretKey) });
    this.unsaved = true;
    console.log(`[vault] generated new identity ${this.npub}`);
  }

  importSecret(input: string): void {
    const secretKey = parseSecretKey(input);
    this.replace({ status: "unlocked", secretKey, publicKey: derivePublicKey(secretKey) });
    this.unsaved = true;
    console.log(`[vault] imported secret key for ${this.npub}`);
  }

  importPublic(input: string): void {
    const publicKey = parsePublicKey(input);
    this.replace({ status: "public-only", publicKey });
    this.unsaved = true;
    console.log(`[vault] imported public key ${this.npub}`);
  }

  clear(): void {
    this.replace({ status: "empty" });
    this.unsaved = false;
    console.log("[vault] cleared");
  }

  save(password = "", level: SecurityLevel = this.level): Promise<SaveResult> {
    return this.exclusive(async () => {
      if (!allowsPersist(level)) {
        console.log("[vault] security level 'never': nothing written");
        return { persisted: false, secretSaved: false };
      }
      if (requiresPassword(level) && password.length === 0) {
        throw new VaultError("PolicyViolation", "A password is required to save the secret key at this security level");
      }
      const snapshot = this.state;
      switch (snapshot.status) {
        case "empty":
          throw new VaultError("KeyNotSet", "No key to save");
        case "locked":
          throw new VaultError("KeyNotSet", "Unlock the vault before saving");
        case "public-only":
          await this.store.remove("secret");
          await this.store.write("public", encodeNip19("npub", snapshot.publicKey));
          this.unsaved = false;
          console.log("[vault] saved public key");
          return { persisted: true, secretSaved: false };
        case "unlocked": {
          const plaintext = Uint8Array.from(snapshot.secretKey);
          let record: VaultRecord;
          try {
            record = await sealSecretKey(plaintext, password, level, this.logN);
          } finally {
            plaintext.fill(0);
          }
          if (this.state !== snapshot) throw new VaultError("KeyNotSet", "Vault changed while saving");
          await this.store.write("secret", encodeVaultRecord(record));
          await this.store.write("public", encodeNip19("npub", snapshot.publicKey));
          this.unsaved = false;
          console.log(`[vault] saved encrypted secret key (${level})`);
          return { persisted: true, secretSaved: true };
        }
      }
    });
  }

  load(): Promise<VaultStatus> {
    return this.exclusive(async () => {
      const [secretText, publicText] = await Promise.all([this.store.read("secret"), this.store.read("public")]);
      const publicKey = publicText === null ? null : parseStoredPublicKey(publicText);
      if (secretText !== null) {
        this.replace({ status: "locked", record: decodeVaultRecord(secretText), publicKey });
      } else if (publicKey !== null) {
        this.replace({ status: "public-only", publicKey });
      } else {
        throw new VaultError("NoRecordFound", "No saved key found");
      }
      this.unsaved = false;
      console.log(`[vault] loaded saved key (${this.state.status})`);
      return this.state.status;
    });
  }

  unlock(password = ""): Promise<void> {
    return this.exclusive(async () => {
      const snapshot = this.state;
      if (snapshot.status !== "locked") throw new VaultError("KeyNotSet", "There is no locked key to unlock");
      if (requiresPassword(snapshot.record.level) && password.length === 0) {
        throw new VaultError("PolicyViolation", "This vault requires a password");
      }
      let secretKey: Uint8Array;
      try {
        secretKey = await openSecretKey(snapshot.record, password);
      } catch (error) {
        if (isVaultError(error, "AuthenticationFailed")) throw new VaultError("WrongPassword", "Wrong password");
        throw error;
      }
      let publicKey: Uint8Array;
      try {
        publicKey = derivePublicKey(secretKey);
      } catch {
        secretKey.fill(0);
        throw new VaultError("CorruptRecord", "Decrypted secret key is not a valid secp256k1 scalar");
      }
      if (snapshot.publicKey && !equalBytes(snapshot.publicKey, publicKey)) {
        secretKey.fill(0);
        throw new VaultError("CorruptRecord", "Decrypted secret key does not match the saved public key");
      }
      if (this.state !== snapshot) {
        secretKey.fill(0);
        throw new VaultError("KeyNotSet", "Vault changed while unlocking");
      }
      this.replace({ status: "unlocked", secretKey, publicKey });
      console.log(`[vault] unlocked ${this.npub}`);
    });
  }

  /** BIP-340 signature over a 32-byte digest. */
  sign(digest: Uint8Array): Promise<Uint8Array> {
    if (digest.length !== 32) {
      return Promise.reject(new VaultError("InvalidDigest", `Digest must be 32 bytes, got ${digest.length}`));
    }
    const message = Uint8Array.from(digest);
    return this.signWith(() => message);
  }

  /**
   * Signs the digest `build` derives from the public key of the identity that
   * will sign it. Both happen in one turn of the chain, so an import or clear
   * cannot slip between hashing and signing.
   */
  signWith(build: (publicKey: Uint8Array) => Uint8Array): Promise<Uint8Array> {
    return this.exclusive(() => {
      const { secretKey, publicKey } = this.secret("SigningUnavailable");
      const digest = build(Uint8Array.from(publicKey));
      if (digest.length !== 32) throw new VaultError("InvalidDigest", `Digest must be 32 bytes, got ${digest.length}`);
      return schnorrSign(digest, secretKey);
    });
  }

  async nip04Encrypt(peer: string, plaintext: string): Promise<string> {
    const peerKey = parsePublicKey(peer);
    return this.exclusive(() => nip04Encrypt(this.secret("SigningUnavailable").secretKey, peerKey, plaintext));
  }

  async nip04Decrypt(peer: string, payload: string): Promise<string> {
    const peerKey = parsePublicKey(peer);
    return this.exclusive(() => nip04Decrypt(this.secret("SigningUnavailable").secretKey, peerKey, payload));
  }

  /** Exports the secret as `nsec` once `confirm` agrees. State is left alone. */
  async revealSecretKey(confirm: () => boolean | Promise<boolean>): Promise<string> {
    if (!(await confirm())) throw new VaultError("PolicyViolation", "Secret key export was not confirmed");
    return this.exclusive(() => encodeNip19("nsec", this.secret("KeyNotSet").secretKey));
  }

  private secret(code: "SigningUnavailable" | "KeyNotSet"): { secretKey: Uint8Array; publicKey: Uint8Array } {
    const state = this.state;
    if (state.status !== "unlocked") throw new VaultError(code, `No unlocked secret key (vault is ${state.status})`);
    return state;
  }

  private currentPublicKey(): Uint8Array | null {
    switch (this.state.status) {
      case "empty":
        return null;
      case "locked":
      case "unlocked":
      case "public-only":
        return this.state.publicKey;
    }
  }

  private replace(next: VaultState): void {
    const previous = this.state;
    this.state = next;
    if (previous.status === "unlocked") previous.secretKey.fill(0);
  }

  private exclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const run = this.chain.then(task);
    this.chain = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

const parseStoredPublicKey = (text: string): Uint8Array => {
  try {
    return parsePublicKey(text);
  } catch (error) {
    if (isVaultError(error, "InvalidKeyFormat")) throw new VaultError("CorruptRecord", "Saved public key is not valid");
    throw error;
  }
};
