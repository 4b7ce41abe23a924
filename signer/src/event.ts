import { sha256 } from "@noble/hashes/sha2.js";
import { hex } from "@scure/base";
import { schnorrVerify } from "@nostr-keyring/vault";
import { z } from "zod";

export const NOSTR_CONNECT_KIND = 24133;

const hex64 = z.string().regex(/^[0-9a-f]{64}$/);

export const eventTemplateSchema = z.object({
  kind: z.number().int().min(0).max(65535),
  content: z.string(),
  tags: z.array(z.array(z.string())).default([]),
  created_at: z.number().int().nonnegative(),
  pubkey: hex64.optional(),
});

export type EventTemplate = z.infer<typeof eventTemplateSchema>;

export const nostrEventSchema = z.object({
  id: hex64,
  pubkey: hex64,
  created_at: z.number().int().nonnegative(),
  kind: z.number().int().min(0).max(65535),
  tags: z.array(z.array(z.string())),
  content: z.string(),
  sig: z.string().regex(/^[0-9a-f]{128}$/),
});

export type NostrEvent = z.infer<typeof nostrEventSchema>;

/** NIP-01 event id: sha256 of `[0, pubkey, created_at, kind, tags, content]`. */
export const getEventHash = (pubkey: string, template: Omit<EventTemplate, "pubkey">): Uint8Array =>
  sha256(
    new TextEncoder().encode(
      JSON.stringify([0, pubkey, template.created_at, template.kind, template.tags, template.content])
    )
  );

export const verifyEvent = (event: NostrEvent): boolean => {
  const id = getEventHash(event.pubkey, event);
  if (hex.encode(id) !== event.id) return false;
  return schnorrVerify(hex.decode(event.sig), id, hex.decode(event.pubkey));
};

export const nowSeconds = (): number => Math.floor(Date.now() / 1000);
