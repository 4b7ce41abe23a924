export type InboundHandler = (sender: string, payload: string) => void;

/** Called once a relay is given up on; the transport no longer reaches it. */
export type RelayErrorHandler = (url: string, error: Error) => void;

/**
 * Moves encrypted NIP-46 payloads between the engine and clients. The engine
 * never sees events or relays, only `(pubkey, payload)` pairs.
 */
export interface SignerTransport {
  send(target: string, payload: string): Promise<void>;
  onMessage(handler: InboundHandler): () => void;
  addRelay?(url: string): Promise<void>;
  onRelayError?(handler: RelayErrorHandler): () => void;
}
