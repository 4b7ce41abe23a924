import { isValidXOnlyKey } from "@nostr-keyring/vault";
import { hex } from "@scure/base";
import { z } from "zod";
import { SignerError } from "./errors.js";
import { eventTemplateSchema, type EventTemplate } from "./event.js";

export const SIGNER_METHODS = [
  "connect",
  "disconnect",
  "describe",
  "get_public_key",
  "sign_event",
  "nip04_encrypt",
  "nip04_decrypt",
] as const;

export type SignerMethod = (typeof SIGNER_METHODS)[number];

/** Methods that touch the secret key and go through the approval gate. */
export const APPROVAL_METHODS = ["sign_event", "nip04_encrypt", "nip04_decrypt"] as const;

export type ApprovalMethod = (typeof APPROVAL_METHODS)[number];

export type SignerRequest =
  | { kind: "connect"; id: string; clientPubkey: string | null; secret: string | null }
  | { kind: "disconnect"; id: string }
  | { kind: "describe"; id: string }
  | { kind: "get_public_key"; id: string }
  | { kind: "sign_event"; id: string; event: EventTemplate }
  | { kind: "nip04_encrypt"; id: string; peer: string; plaintext: string }
  | { kind: "nip04_decrypt"; id: string; peer: string; ciphertext: string }
  | { kind: "unknown"; id: string; method: string };

export type ApprovalRequest = Extract<SignerRequest, { kind: ApprovalMethod }>;

export type SignerResponse = { id: string; result: unknown } | { id: string; error: string };

export type DecodedMessage =
  | { type: "request"; request: SignerRequest }
  | { type: "response"; id: string }
  | { type: "invalid"; id: string | null; error: SignerError };

export const isApprovalMethod = (method: string): method is ApprovalMethod =>
  (APPROVAL_METHODS as readonly string[]).includes(method);

const envelopeSchema = z.object({
  id: z.string().min(1),
  method: z.string().min(1),
  params: z.array(z.unknown()).default([]),
});

const publicKeyParam = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .refine((value) => /^[0-9a-f]{64}$/.test(value) && isValidXOnlyKey(hex.decode(value)), "expected an x-only public key");

// sign_event carries the unsigned event either as a JSON string or inline
const eventParam = z.union([
  z.string().transform((value, ctx) => {
    try {
      const parsed: unknown = JSON.parse(value);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "event is not valid JSON" });
      return z.NEVER;
    }
  }),
  z.record(z.unknown()),
]).pipe(eventTemplateSchema);

const paramSchemas = {
  connect: z.tuple([publicKeyParam]).rest(z.unknown()),
  sign_event: z.tuple([eventParam]).rest(z.unknown()),
  nip04_encrypt: z.tuple([publicKeyParam, z.string()]).rest(z.unknown()),
  nip04_decrypt: z.tuple([publicKeyParam, z.string()]).rest(z.unknown()),
};

const invalidParams = (id: string, method: string, error: z.ZodError): DecodedMessage => {
  const detail = error.issues[0]?.message ?? "malformed params";
  return { type: "invalid", id, error: new SignerError("InvalidParams", `${method}: ${detail}`) };
};

/**
 * Decodes one decrypted NIP-46 payload. Anything without a usable `id` comes
 * back as `invalid` with a null id: there is nothing to answer.
 */
export function decodeMessage(plaintext: string): DecodedMessage {
  let value: unknown;
  try {
    value = JSON.parse(plaintext);
  } catch {
    return { type: "invalid", id: null, error: new SignerError("InvalidParams", "payload is not JSON") };
  }
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return { type: "invalid", id: null, error: new SignerError("InvalidParams", "payload is not a JSON object") };
  }
  const id = "id" in value && typeof value.id === "string" && value.id.length > 0 ? value.id : null;
  if (id === null) return { type: "invalid", id: null, error: new SignerError("InvalidParams", "payload has no id") };
  if (!("method" in value) && ("result" in value || "error" in value)) return { type: "response", id };

  const envelope = envelopeSchema.safeParse(value);
  if (!envelope.success) return invalidParams(id, "request", envelope.error);
  const { method, params } = envelope.data;

  switch (method) {
    case "connect": {
      const parsed = paramSchemas.connect.safeParse(params);
      if (!parsed.success) return invalidParams(id, method, parsed.error);
      const [clientPubkey, secret] = parsed.data;
      return {
        type: "request",
        request: { kind: "connect", id, clientPubkey, secret: typeof secret === "string" ? secret : null },
      };
    }
    case "disconnect":
    case "describe":
    case "get_public_key":
      return { type: "request", request: { kind: method, id } };
    case "sign_event": {
      const parsed = paramSchemas.sign_event.safeParse(params);
      if (!parsed.success) return invalidParams(id, method, parsed.error);
      return { type: "request", request: { kind: "sign_event", id, event: parsed.data[0] } };
    }
    case "nip04_encrypt": {
      const parsed = paramSchemas.nip04_encrypt.safeParse(params);
      if (!parsed.success) return invalidParams(id, method, parsed.error);
      const [peer, plaintext] = parsed.data;
      return { type: "request", request: { kind: "nip04_encrypt", id, peer, plaintext } };
    }
    case "nip04_decrypt": {
      const parsed = paramSchemas.nip04_decrypt.safeParse(params);
      if (!parsed.success) return invalidParams(id, method, parsed.error);
      const [peer, ciphertext] = parsed.data;
      return { type: "request", request: { kind: "nip04_decrypt", id, peer, ciphertext } };
    }
    default:
      return { type: "request", request: { kind: "unknown", id, method } };
  }
}

export const resultResponse = (id: string, result: unknown): SignerResponse => ({ id, result });

/** Error strings read `<Code>: <detail>`, e.g. `UnsupportedMethod: ping`. */
export const errorResponse = (id: string, code: string, detail: string): SignerResponse => ({
  id,
  error: `${code}: ${detail}`,
});

export const encodeResponse = (response: SignerResponse): string => JSON.stringify(response);

export const encodeRequest = (id: string, method: string, params: unknown[]): string =>
  JSON.stringify({ id, method, params });

const shorten = (text: string, max: number): string => (text.length <= max ? text : `${text.slice(0, max)}..`);

/** One-line description of what a pending request asks for. */
export const summarizeRequest = (request: ApprovalRequest): string => {
  switch (request.kind) {
    case "sign_event":
      return `Sign kind ${request.event.kind} event: '${shorten(request.event.content, 100)}'`;
    case "nip04_encrypt":
      return `Encrypt a message for ${shorten(request.peer, 16)}`;
    case "nip04_decrypt":
      return `Decrypt a message from ${shorten(request.peer, 16)}`;
  }
};
