import { describe, it, expect } from "vitest";
import {
  decodeMessage,
  encodeRequest,
  encodeResponse,
  errorResponse,
  resultResponse,
  summarizeRequest,
} from "../signer/src/protocol.js";
import { ALICE, BOB, OFF_CURVE_PUBKEY } from "./helpers.js";

const template = { kind: 1, content: "hello", tags: [["t", "test"]], created_at: 1700000000 };

describe("signer protocol", () => {
  it("decodes methods without params", () => {
    for (const method of ["describe", "get_public_key", "disconnect"] as const) {
      expect(decodeMessage(encodeRequest("r1", method, []))).toEqual({
        type: "request",
        request: { kind: method, id: "r1" },
      });
    }
  });

  it("decodes connect with an optional secret", () => {
    expect(decodeMessage(encodeRequest("c1", "connect", [BOB.pk]))).toEqual({
      type: "request",
      request: { kind: "connect", id: "c1", clientPubkey: BOB.pk, secret: null },
    });
    expect(decodeMessage(encodeRequest("c2", "connect", [BOB.pk.toUpperCase(), "test-secret"]))).toEqual({
      type: "request",
      request: { kind: "connect", id: "c2", clientPubkey: BOB.pk, secret: "test-secret" },
    });
  });

  it("decodes sign_event given as a JSON string or an object", () => {
    const expected = { type: "request", request: { kind: "sign_event", id: "s1", event: template } };
    expect(decodeMessage(encodeRequest("s1", "sign_event", [JSON.stringify(template)]))).toEqual(expected);
    expect(decodeMessage(encodeRequest("s1", "sign_event", [template]))).toEqual(expected);
  });

  it("defaults missing tags to an empty list", () => {
    const decoded = decodeMessage(encodeRequest("s2", "sign_event", [{ kind: 1, content: "x", created_at: 1 }]));
    expect(decoded).toEqual({
      type: "request",
      request: { kind: "sign_event", id: "s2", event: { kind: 1, content: "x", created_at: 1, tags: [] } },
    });
  });

  it("decodes NIP-04 methods", () => {
    expect(decodeMessage(encodeRequest("e1", "nip04_encrypt", [ALICE.pk, "secret text"]))).toEqual({
      type: "request",
      request: { kind: "nip04_encrypt", id: "e1", peer: ALICE.pk, plaintext: "secret text" },
    });
    expect(decodeMessage(encodeRequest("d1", "nip04_decrypt", [ALICE.pk, "abc?iv=def"]))).toEqual({
      type: "request",
      request: { kind: "nip04_decrypt", id: "d1", peer: ALICE.pk, ciphertext: "abc?iv=def" },
    });
  });

  it("keeps unknown methods as unknown requests", () => {
    expect(decodeMessage(encodeRequest("u1", "ping", []))).toEqual({
      type: "request",
      request: { kind: "unknown", id: "u1", method: "ping" },
    });
  });

  it("answers bad params with InvalidParams for that id", () => {
    for (const [method, params] of [
      ["sign_event", ["{not json"]],
      ["sign_event", [{ kind: "one", content: "", created_at: 1 }]],
      ["nip04_encrypt", [ALICE.pk]],
      ["nip04_decrypt", [OFF_CURVE_PUBKEY, "abc?iv=def"]],
      ["connect", []],
    ] as const) {
      const decoded = decodeMessage(encodeRequest("bad", method, [...params]));
      expect(decoded.type).toBe("invalid");
      if (decoded.type !== "invalid") continue;
      expect(decoded.id).toBe("bad");
      expect(decoded.error.code).toBe("InvalidParams");
    }
  });

  it("has nothing to answer without an id", () => {
    for (const payload of ["not json", "[1,2]", '{"method":"describe"}', '{"id":"","method":"describe"}']) {
      const decoded = decodeMessage(payload);
      expect(decoded).toMatchObject({ type: "invalid", id: null });
    }
  });

  it("recognizes responses from the client", () => {
    expect(decodeMessage('{"id":"x1","result":"ack"}')).toEqual({ type: "response", id: "x1" });
    expect(decodeMessage('{"id":"x2","error":"nope"}')).toEqual({ type: "response", id: "x2" });
  });

  it("encodes responses", () => {
    expect(encodeResponse(resultResponse("r1", "ack"))).toBe('{"id":"r1","result":"ack"}');
    expect(encodeResponse(errorResponse("r2", "UnsupportedMethod", "ping"))).toBe(
      '{"id":"r2","error":"UnsupportedMethod: ping"}'
    );
  });

  it("summarizes pending requests", () => {
    expect(summarizeRequest({ kind: "sign_event", id: "s1", event: template })).toBe("Sign kind 1 event: 'hello'");
    expect(summarizeRequest({ kind: "nip04_encrypt", id: "e1", peer: ALICE.pk, plaintext: "x" })).toBe(
      `Encrypt a message for ${ALICE.pk.slice(0, 16)}..`
    );
    const long = summarizeRequest({ kind: "sign_event", id: "s2", event: { ...template, content: "a".repeat(120) } });
    expect(long).toBe(`Sign kind 1 event: '${"a".repeat(100)}..'`);
  });
});
