import { randomBytes } from "node:crypto";
import WebSocket from "ws";
import { NOSTR_CONNECT_KIND, nostrEventSchema, nowSeconds, verifyEvent } from "./event.js";
import type { InboundHandler, RelayErrorHandler, SignerTransport } from "./transport.js";
import type { TransportKeys } from "./transportKeys.js";

export type ConnectionState = "disconnected" | "connecting" | "connected" | "reconnecting" | "error";

export interface RelayTransportOptions {
  keys: TransportKeys;
  relays?: string[];
  /** Base reconnect delay (ms); doubles on every failed attempt. */
  reconnectDelay?: number;
  maxReconnectAttempts?: number;
  heartbeatInterval?: number;
  /** How far back (seconds) the subscription looks on (re)connect. */
  lookback?: number;
}

const SEEN_LIMIT = 1024;

/** One websocket to one relay, with exponential-backoff reconnects. */
class RelayConnection {
  private ws: WebSocket | null = null;
  private state: ConnectionState = "disconnected";
  private reconnectAttempts = 0;
  private reconnectTimeout: ReturnType<typeof setTimeout> | null = null;
  private heartbeat: ReturnType<typeof setInterval> | null = null;
  private closed = false;

  constructor(
    readonly url: string,
    private readonly owner: RelayTransport,
    private readonly options: Required<Omit<RelayTransportOptions, "keys" | "relays">>
  ) {}

  get connectionState(): ConnectionState {
    return this.state;
  }

  open(): Promise<void> {
    if (this.state === "connected") return Promise.resolve();
    this.state = this.reconnectAttempts > 0 ? "reconnecting" : "connecting";
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(this.url);
      this.ws = ws;

      ws.on("open", () => {
        this.state = "connected";
        this.reconnectAttempts = 0;
        this.startHeartbeat();
        ws.send(this.owner.subscriptionFrame());
        console.log(`[relay] connected to ${this.url}`);
        resolve();
      });

      ws.on("message", (data, isBinary) => {
        if (isBinary) return;
        this.owner.handleFrame(this.url, data.toString());
      });

      ws.on("error", (error) => {
        console.error(`[relay] ${this.url}: ${error.message}`);
        if (this.state !== "connected") reject(error);
      });

      ws.on("close", () => {
        this.stopHeartbeat();
        if (this.ws === ws) this.ws = null;
        if (this.closed) {
          this.state = "disconnected";
          return;
        }
        this.scheduleReconnect();
      });
    });
  }

  send(frame: string): boolean {
    if (this.ws?.readyState !== WebSocket.OPEN) return false;
    this.ws.send(frame);
    return true;
  }

  close(): void {
    this.closed = true;
    this.stopHeartbeat();
    if (this.reconnectTimeout) {
      clearTimeout(this.reconnectTimeout);
      this.reconnectTimeout = null;
    }
    this.ws?.close(1000, "signer shutting down");
    this.ws = null;
    this.state = "disconnected";
  }

  private scheduleReconnect(): void {
    if (this.reconnectAttempts >= this.options.maxReconnectAttempts) {
      this.state = "error";
      console.error(`[relay] giving up on ${this.url} after ${this.reconnectAttempts} attempts`);
      this.owner.relayFailed(this.url, new Error(`gave up after ${this.reconnectAttempts} reconnect attempts`));
      return;
    }
    this.state = "reconnecting";
    this.reconnectAttempts++;
    const delay = this.options.reconnectDelay * 2 ** (this.reconnectAttempts - 1);
    this.reconnectTimeout = setTimeout(() => {
      this.reconnectTimeout = null;
      this.open().catch((error: unknown) => {
        console.error(`[relay] reconnect to ${this.url} failed: ${String(error)}`);
      });
    }, delay);
    this.reconnectTimeout.unref();
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.heartbeat = setInterval(() => {
      if (this.ws?.readyState === WebSocket.OPEN) this.ws.ping();
    }, this.options.heartbeatInterval);
    this.heartbeat.unref();
  }

  private stopHeartbeat(): void {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
  }
}

/**
 * NIP-01 relay plumbing for kind 24133 traffic: subscribes to events tagged
 * with the signer's transport key, verifies and de-duplicates them across
 * relays, and publishes outbound payloads to every connected relay.
 */
export class RelayTransport implements SignerTransport {
  private readonly keys: TransportKeys;
  private readonly relays = new Map<string, RelayConnection>();
  private readonly handlers = new Set<InboundHandler>();
  private readonly errorHandlers = new Set<RelayErrorHandler>();
  private readonly seen = new Set<string>();
  private readonly subscriptionId = `keyring-${randomBytes(4).toString("hex")}`;
  private readonly options: Required<Omit<RelayTransportOptions, "keys" | "relays">>;
  private readonly initialRelays: string[];

  constructor(options: RelayTransportOptions) {
    this.keys = options.keys;
    this.initialRelays = options.relays ?? [];
    this.options = {
      reconnectDelay: options.reconnectDelay ?? 1000,
      maxReconnectAttempts: options.maxReconnectAttempts ?? 10,
      heartbeatInterval: options.heartbeatInterval ?? 30_000,
      lookback: options.lookback ?? 10,
    };
  }

  /** Connects to the configured relays; failures keep retrying in the background. */
  async start(): Promise<void> {
    await Promise.all(this.initialRelays.map((url) => this.addRelay(url)));
  }

  async addRelay(url: string): Promise<void> {
    if (this.relays.has(url)) return;
    const connection = new RelayConnection(url, this, this.options);
    this.relays.set(url, connection);
    try {
      await connection.open();
    } catch (error) {
      console.error(`[relay] could not connect to ${url}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  relayStates(): Record<string, ConnectionState> {
    return Object.fromEntries([...this.relays].map(([url, connection]) => [url, connection.connectionState]));
  }

  async send(target: string, payload: string): Promise<void> {
    const event = this.keys.signEvent({
      kind: NOSTR_CONNECT_KIND,
      content: payload,
      tags: [["p", target]],
      created_at: nowSeconds(),
    });
    const frame = JSON.stringify(["EVENT", event]);
    let delivered = 0;
    for (const connection of this.relays.values()) {
      if (connection.send(frame)) delivered++;
    }
    if (delivered === 0) throw new Error("No relay connection is open");
  }

  onMessage(handler: InboundHandler): () => void {
    this.handlers.add(handler);
    return () => this.handlers.delete(handler);
  }

  onRelayError(handler: RelayErrorHandler): () => void {
    this.errorHandlers.add(handler);
    return () => this.errorHandlers.delete(handler);
  }

  close(): void {
    for (const connection of this.relays.values()) connection.close();
    this.relays.clear();
    this.handlers.clear();
    this.errorHandlers.clear();
  }

  /** @internal */
  relayFailed(url: string, error: Error): void {
    for (const handler of this.errorHandlers) {
      try {
        handler(url, error);
      } catch (failure) {
        console.error(`[relay] error handler failed: ${String(failure)}`);
      }
    }
  }

  /** @internal */
  subscriptionFrame(): string {
    const filter = {
      kinds: [NOSTR_CONNECT_KIND],
      "#p": [this.keys.publicKey],
      since: nowSeconds() - this.options.lookback,
    };
    return JSON.stringify(["REQ", this.subscriptionId, filter]);
  }

  /** @internal */
  handleFrame(url: string, raw: string): void {
    let frame: unknown;
    try {
      frame = JSON.parse(raw);
    } catch {
      console.error(`[relay] ${url}: ignored non-JSON frame`);
      return;
    }
    if (!Array.isArray(frame) || typeof frame[0] !== "string") return;

    switch (frame[0]) {
      case "EVENT":
        if (frame[1] === this.subscriptionId) this.handleEvent(url, frame[2]);
        return;
      case "OK":
        if (frame[2] === false) console.error(`[relay] ${url} rejected event ${String(frame[1])}: ${String(frame[3] ?? "")}`);
        return;
      case "NOTICE":
        console.log(`[relay] ${url} notice: ${String(frame[1])}`);
        return;
      case "CLOSED":
        console.error(`[relay] ${url} closed subscription: ${String(frame[2] ?? "")}`);
        return;
      default:
        return;
    }
  }

  private handleEvent(url: string, value: unknown): void {
    const parsed = nostrEventSchema.safeParse(value);
    if (!parsed.success) {
      console.error(`[relay] ${url}: ignored malformed event`);
      return;
    }
    const event = parsed.data;
    if (event.kind !== NOSTR_CONNECT_KIND) return;
    if (!event.tags.some((tag) => tag[0] === "p" && tag[1] === this.keys.publicKey)) return;
    if (this.seen.has(event.id)) return;
    if (!verifyEvent(event)) {
      console.error(`[relay] ${url}: ignored event ${event.id} with a bad signature`);
      return;
    }
    this.remember(event.id);
    for (const handler of this.handlers) handler(event.pubkey, event.content);
  }

  private remember(id: string): void {
    this.seen.add(id);
    if (this.seen.size > SEEN_LIMIT) {
      const oldest = this.seen.values().next();
      if (!oldest.done) this.seen.delete(oldest.value);
    }
  }
}
