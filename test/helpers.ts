/**
 * Shared test utilities: fixed identities, an in-process transport and a
 * NIP-46 client stand-in.
 */

import type { AddressInfo } from "node:net";
import type { Server } from "node:http";
import type { Application } from "express";
import { nip04Open, nip04Seal } from "../vault/src/index.js";
import { TransportKeys } from "../signer/src/transportKeys.js";
import type { InboundHandler, RelayErrorHandler, SignerTransport } from "../signer/src/transport.js";

export const TEST_CONTROL_TOKEN = "test-control-token";

/** sk = sha256("keyring-test-alice") */
export const ALICE = {
  sk: "377df6b2b9039bece2fd8fffbaa11a578dfaaa7214e086416aa66e887ef1d5e6",
  pk: "d54a06818d2ac0f50fb7698bfa8e25e498aba880381364bde4cc47e45e922095",
  nsec: "nsec1xa7ldv4eqwd7echa3llm4gg627xl42njznsgvst25ehgslh36hnq78glkj",
  npub: "npub1649qdqvd9tq02rahdx9l4r39ujv2h2yq8qfkf00ye3r7gh5jyz2sfa7d0v",
};

/** sk = sha256("keyring-test-bob") */
export const BOB = {
  sk: "9623b52fd18375b55762b17e9ab80a61ea61f4c407c6329b11fe30f154b3870c",
  pk: "fbe50a2a4e040f8d5941ba8681bccf8fd626889f634506b805068d7cee1787e8",
  nsec: "nsec1jc3m2t73sd6m24mzk9lf4wq2v84xraxyqlrr9xc3lcc0z49nsuxqwrlcq5",
  npub: "npub1l0js52jwqs8c6k2ph2rgr0x03ltzdzylvdzsdwq9q6xhemshsl5qkkz2dj",
};

/** x = 5 has no point on secp256k1. */
export const OFF_CURVE_PUBKEY = `${"0".repeat(63)}5`;

/** Cheapest scrypt cost the vault accepts. */
export const TEST_LOG_N = 10;

/** Start the Express app on a random port; return the base URL and a close fn. */
export async function startTestServer(app: Application): Promise<{
  url: string;
  close: () => Promise<void>;
}> {
  const server: Server = await new Promise((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server is not listening on a port");
  const { port }: AddressInfo = address;
  return {
    url: `http://127.0.0.1:${port}`,
    close: () => new Promise((res, rej) => server.close((e) => (e ? rej(e) : res())))
  };
}

/** Helpers for HTTP calls with the standard control token header. */
export function headers(extra: Record<string, string> = {}): Record<string, string> {
  return {
    "content-type": "application/json",
    "x-control-token": TEST_CONTROL_TOKEN,
    ...extra
  };
}

/** Records outbound payloads and lets a test push inbound ones. */
export class MemoryTransport implements SignerTransport {
  readonly sent: Array<{ target: string; payload: string }> = [];
  readonly relays: string[] = [];
  failSends = false;
  private handler: InboundHandler | null = null;
  private errorHandler: RelayErrorHandler | null = null;

  async send(target: string, payload: string): Promise<void> {
    if (this.failSends) throw new Error("relay offline");
    this.sent.push({ target, payload });
  }

  onMessage(handler: InboundHandler): () => void {
    this.handler = handler;
    return () => {
      this.handler = null;
    };
  }

  async addRelay(url: string): Promise<void> {
    this.relays.push(url);
  }

  onRelayError(handler: RelayErrorHandler): () => void {
    this.errorHandler = handler;
    return () => {
      this.errorHandler = null;
    };
  }

  deliver(sender: string, payload: string): void {
    this.handler?.(sender, payload);
  }

  failRelay(url: string): void {
    this.errorHandler?.(url, new Error("relay unreachable"));
  }
}

/** A NIP-46 client app talking to the signer's transport key. */
export class TestClient {
  readonly keys = TransportKeys.generate();

  constructor(private readonly signerPubkey: string) {}

  get pubkey(): string {
    return this.keys.publicKey;
  }

  request(id: string, method: string, params: unknown[] = []): string {
    return nip04Seal(this.keys.sharedKey(this.signerPubkey), JSON.stringify({ id, method, params }));
  }

  read(payload: string): Record<string, unknown> {
    const value: unknown = JSON.parse(nip04Open(this.keys.sharedKey(this.signerPubkey), payload));
    if (typeof value !== "object" || value === null) throw new Error("response is not an object");
    return { ...value };
  }
}
