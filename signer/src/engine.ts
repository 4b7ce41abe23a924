/**
 * engine.ts: NIP-46 signer engine
 *
 * Owns the client sessions and the approval gate. The transport hands it
 * encrypted payloads; the vault signs and encrypts. Nothing here touches a
 * socket or the secret key directly.
 */

import { randomBytes } from "node:crypto";
import { VaultError, type KeyVault } from "@nostr-keyring/vault";
import { hex } from "@scure/base";
import { ApprovalGate, type Decision, type GateEvent, type PendingRequest } from "./approvalGate.js";
import { parseConnectUri } from "./connectUri.js";
import { SignerError, describeFailure } from "./errors.js";
import { getEventHash } from "./event.js";
import {
  SIGNER_METHODS,
  decodeMessage,
  encodeRequest,
  encodeResponse,
  errorResponse,
  resultResponse,
  type ApprovalMethod,
  type ApprovalRequest,
  type SignerResponse,
} from "./protocol.js";
import { SignerSession, type SessionInfo } from "./session.js";
import type { SignerTransport } from "./transport.js";
import type { TransportKeys } from "./transportKeys.js";

export interface SignerEngineOptions {
  vault: KeyVault;
  transport: SignerTransport;
  keys: TransportKeys;
  approvalTimeoutMs?: number;
  /** Open a session for any sender whose payload decrypts. Defaults to true. */
  acceptUnknownClients?: boolean;
}

export type EngineEvent =
  | GateEvent
  | { type: "session.opened"; session: SessionInfo }
  | { type: "session.closed"; session: SessionInfo };

export interface DecideOptions {
  session?: string;
  /** On approval, auto-approve this method for the session from now on. */
  remember?: boolean;
}

const short = (pubkey: string): string => pubkey.slice(0, 8);

const HEX_PUBKEY = /^[0-9a-f]{64}$/;

/**
 * Routes NIP-46 traffic between the transport, client sessions, the approval
 * gate and the vault. Inbound handling never throws: failures are logged or
 * turned into error responses.
 */
export class SignerEngine {
  readonly gate: ApprovalGate;
  private readonly vault: KeyVault;
  private readonly transport: SignerTransport;
  private readonly keys: TransportKeys;
  private readonly acceptUnknownClients: boolean;
  private readonly sessions = new Map<string, SignerSession>();
  private readonly closing = new Map<string, SignerSession>();
  private readonly listeners = new Set<(event: EngineEvent) => void>();
  private unsubscribe: Array<() => void> = [];

  constructor(options: SignerEngineOptions) {
    this.vault = options.vault;
    this.transport = options.transport;
    this.keys = options.keys;
    this.acceptUnknownClients = options.acceptUnknownClients ?? true;
    this.gate = new ApprovalGate({
      timeoutMs: options.approvalTimeoutMs,
      handler: {
        approve: (entry) => this.withSession(entry, (session) => this.fulfil(session, entry.request)),
        refuse: (entry, code, detail) =>
          this.withSession(entry, (session) => this.respond(session, errorResponse(entry.id, code, detail))),
      },
    });
    this.gate.subscribe((event) => this.emit(event));
  }

  get transportPublicKey(): string {
    return this.keys.publicKey;
  }

  start(): void {
    if (this.unsubscribe.length > 0) return;
    this.unsubscribe.push(this.transport.onMessage((sender, payload) => void this.handleMessage(sender, payload)));
    if (this.transport.onRelayError) {
      this.unsubscribe.push(
        this.transport.onRelayError((url, error) => {
          this.relayFailed(url, error).catch((failure: unknown) => {
            console.error(`[engine] teardown after relay failure failed: ${describeFailure(failure).message}`);
          });
        })
      );
    }
    console.log(`[engine] listening as ${this.keys.publicKey}`);
  }

  async stop(): Promise<void> {
    for (const unsubscribe of this.unsubscribe.splice(0)) unsubscribe();
    for (const session of [...this.sessions.values()]) await this.closeSession(session, "signer stopped");
    console.log("[engine] stopped");
  }

  subscribe(listener: (event: EngineEvent) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  listSessions(): SessionInfo[] {
    return [...this.sessions.values()].map((session) => session.info());
  }

  pending(): PendingRequest[] {
    return this.gate.list();
  }

  async decide(id: string, decision: Decision, options: DecideOptions = {}): Promise<PendingRequest> {
    if (options.remember && decision === "approved") {
      const entry = this.gate
        .list()
        .filter((request) => request.id === id && (options.session === undefined || request.session === options.session));
      if (entry.length === 1) this.sessions.get(entry[0].session)?.setPermission(entry[0].method, true);
    }
    return this.gate.decide(id, decision, options.session);
  }

  setPermission(sessionId: string, method: ApprovalMethod, allowed: boolean): SessionInfo {
    const session = this.sessions.get(sessionId);
    if (!session) throw new SignerError("UnknownSession", `No session ${sessionId}`);
    session.setPermission(method, allowed);
    console.log(`[engine] ${method} ${allowed ? "auto-approved" : "requires approval"} for ${short(sessionId)}`);
    return session.info();
  }

  /**
   * Pairs with a client from its `nostrconnect://` URI: opens the session,
   * subscribes on the client's relay and sends a `connect` request carrying the
   * signer's transport public key.
   */
  async connect(uri: string): Promise<SessionInfo> {
    const target = parseConnectUri(uri);
    if (target.relay && this.transport.addRelay) await this.transport.addRelay(target.relay);

    let session = this.sessions.get(target.clientPubkey);
    const opened = !session;
    if (!session) {
      session = new SignerSession(target.clientPubkey, this.keys, {
        relay: target.relay,
        name: target.metadata?.name ?? null,
      });
      this.sessions.set(session.id, session);
    }
    const request = encodeRequest(randomBytes(8).toString("hex"), "connect", [this.keys.publicKey]);
    try {
      await this.transport.send(session.id, session.encrypt(request));
    } catch (error) {
      if (opened) {
        this.sessions.delete(session.id);
        session.close();
      }
      throw error;
    }
    if (opened) this.opened(session);
    console.log(`[engine] sent connect request to ${short(session.id)}`);
    return session.info();
  }

  async disconnect(sessionId: string, reason = "session closed by user"): Promise<boolean> {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    await this.closeSession(session, reason);
    return true;
  }

  /** Entry point for every inbound `(sender, payload)` pair. */
  async handleMessage(sender: string, payload: string): Promise<void> {
    let session = this.sessions.get(sender);
    let provisional = false;
    if (!session) {
      if (!this.acceptUnknownClients || !HEX_PUBKEY.test(sender)) {
        console.error(`[engine] DecryptionFailed: dropped message from unknown sender ${short(sender)}`);
        return;
      }
      try {
        session = new SignerSession(sender, this.keys);
      } catch (error) {
        console.error(`[engine] DecryptionFailed: no shared key with ${short(sender)}: ${describeFailure(error).message}`);
        return;
      }
      provisional = true;
    }

    let plaintext: string;
    try {
      plaintext = session.decrypt(payload);
    } catch (error) {
      const { code, message } = describeFailure(error);
      console.error(`[engine] ${code}: dropped message from ${short(sender)}: ${message}`);
      if (provisional) session.close();
      return;
    }

    if (provisional) {
      this.sessions.set(sender, session);
      this.opened(session);
    }
    session.touch();
    const active = session;
    await active.run(() => this.dispatch(active, plaintext));
  }

  private async dispatch(session: SignerSession, plaintext: string): Promise<void> {
    const decoded = decodeMessage(plaintext);
    if (decoded.type === "response") {
      console.log(`[engine] response ${decoded.id} from ${short(session.id)}`);
      return;
    }
    if (decoded.type === "invalid") {
      if (decoded.id === null) {
        console.error(`[engine] dropped message from ${short(session.id)}: ${decoded.error.message}`);
        return;
      }
      await this.respond(session, errorResponse(decoded.id, decoded.error.code, decoded.error.message));
      return;
    }

    const { request } = decoded;
    switch (request.kind) {
      case "connect":
        await this.respond(session, resultResponse(request.id, "ack"));
        return;
      case "disconnect":
        await this.respond(session, resultResponse(request.id, "ack"));
        await this.closeSession(session, "client disconnected");
        return;
      case "describe":
        await this.respond(session, resultResponse(request.id, [...SIGNER_METHODS]));
        return;
      case "get_public_key": {
        const publicKey = this.vault.publicKey;
        await this.respond(
          session,
          publicKey
            ? resultResponse(request.id, publicKey)
            : errorResponse(request.id, "SigningUnavailable", "no identity loaded")
        );
        return;
      }
      case "sign_event":
      case "nip04_encrypt":
      case "nip04_decrypt":
        if (session.allows(request.kind)) {
          await this.fulfil(session, request);
          return;
        }
        this.gate.enqueue(session.id, request);
        return;
      case "unknown":
        console.log(`[engine] unsupported method ${request.method} from ${short(session.id)}`);
        await this.respond(session, errorResponse(request.id, "UnsupportedMethod", request.method));
        return;
    }
  }

  private async fulfil(session: SignerSession, request: ApprovalRequest): Promise<void> {
    let response: SignerResponse;
    try {
      response = resultResponse(request.id, await this.execute(request));
    } catch (error) {
      const { code, message } = describeFailure(error);
      response = errorResponse(request.id, code, message);
    }
    await this.respond(session, response);
  }

  private async execute(request: ApprovalRequest): Promise<string> {
    switch (request.kind) {
      case "sign_event": {
        // The identity the user approved; the vault must still hold it when it signs.
        const approved = this.vault.publicKey;
        if (!approved) throw new VaultError("SigningUnavailable", "no identity loaded");
        if (request.event.pubkey !== undefined && request.event.pubkey !== approved) {
          throw new SignerError("InvalidParams", "event pubkey does not match the signer identity");
        }
        const signature = await this.vault.signWith((publicKey) => {
          const signer = hex.encode(publicKey);
          if (signer !== approved) throw new VaultError("SigningUnavailable", "identity changed before signing");
          return getEventHash(signer, request.event);
        });
        return hex.encode(signature);
      }
      case "nip04_encrypt":
        return this.vault.nip04Encrypt(request.peer, request.plaintext);
      case "nip04_decrypt":
        return this.vault.nip04Decrypt(request.peer, request.ciphertext);
    }
  }

  private async respond(session: SignerSession, response: SignerResponse): Promise<void> {
    if (!session.isAlive) {
      console.error(`[engine] session ${short(session.id)} closed; dropped response ${response.id}`);
      return;
    }
    try {
      await this.transport.send(session.id, session.encrypt(encodeResponse(response)));
    } catch (error) {
      console.error(`[engine] failed to send response ${response.id} to ${short(session.id)}: ${describeFailure(error).message}`);
    }
  }

  /** Sessions paired over a relay the transport gave up on are torn down. */
  private async relayFailed(url: string, error: Error): Promise<void> {
    console.error(`[engine] relay ${url} failed: ${error.message}`);
    for (const session of [...this.sessions.values()]) {
      if (session.relay === url) await this.closeSession(session, `relay ${url} failed`);
    }
  }

  private async withSession(entry: PendingRequest, task: (session: SignerSession) => Promise<void>): Promise<void> {
    const session = this.sessions.get(entry.session) ?? this.closing.get(entry.session);
    if (!session) {
      console.error(`[engine] no session ${short(entry.session)} for request ${entry.id}`);
      return;
    }
    await task(session);
  }

  private async closeSession(session: SignerSession, reason: string): Promise<void> {
    if (this.sessions.get(session.id) !== session) return;
    this.sessions.delete(session.id);
    this.closing.set(session.id, session);
    try {
      await this.gate.cancelSession(session.id, reason);
    } finally {
      this.closing.delete(session.id);
      session.close();
    }
    console.log(`[engine] session ${short(session.id)} closed: ${reason}`);
    this.emit({ type: "session.closed", session: session.info() });
  }

  private opened(session: SignerSession): void {
    console.log(`[engine] session ${short(session.id)} opened`);
    this.emit({ type: "session.opened", session: session.info() });
  }

  private emit(event: EngineEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        console.error(`[engine] listener failed: ${describeFailure(error).message}`);
      }
    }
  }
}
