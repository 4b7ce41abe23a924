import { VaultError, normalizePublicKey } from "@nostr-keyring/vault";
import { z } from "zod";
import { SignerError } from "./errors.js";

const metadataSchema = z.object({
  name: z.string(),
  url: z.string().optional(),
  description: z.string().optional(),
  icons: z.array(z.string()).optional(),
});

export type ConnectMetadata = z.infer<typeof metadataSchema>;

export interface ConnectUri {
  clientPubkey: string;
  relay: string | null;
  metadata: ConnectMetadata | null;
}

/** `nostrconnect://<client-pubkey>?relay=<wss url>&metadata=<json>` */
export function parseConnectUri(input: string): ConnectUri {
  let url: URL;
  try {
    url = new URL(input.trim());
  } catch {
    throw new SignerError("InvalidConnectUri", "Not a valid URI");
  }
  if (url.protocol !== "nostrconnect:") {
    throw new SignerError("InvalidConnectUri", `Expected a nostrconnect:// URI, got ${url.protocol}`);
  }

  const target = url.hostname || url.pathname.replace(/^\/+/, "");
  let clientPubkey: string;
  try {
    clientPubkey = normalizePublicKey(target);
  } catch (error) {
    if (error instanceof VaultError) throw new SignerError("InvalidConnectUri", `Bad client public key: ${error.message}`);
    throw error;
  }

  const relay = url.searchParams.get("relay");
  if (relay !== null && !/^wss?:\/\/\S+$/.test(relay)) {
    throw new SignerError("InvalidConnectUri", "Relay must be a ws:// or wss:// URL");
  }

  const rawMetadata = url.searchParams.get("metadata");
  let metadata: ConnectMetadata | null = null;
  if (rawMetadata !== null) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(rawMetadata);
    } catch {
      throw new SignerError("InvalidConnectUri", "metadata is not valid JSON");
    }
    const result = metadataSchema.safeParse(parsed);
    if (!result.success) throw new SignerError("InvalidConnectUri", "metadata must be an object with a name");
    metadata = result.data;
  }

  return { clientPubkey, relay, metadata };
}
