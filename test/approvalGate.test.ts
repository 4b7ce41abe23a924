import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { ApprovalGate, type ApprovalHandler, type GateEvent } from "../signer/src/approvalGate.js";
import type { ApprovalRequest } from "../signer/src/protocol.js";
import { ALICE, BOB } from "./helpers.js";

const signRequest = (id: string, content = "hello"): ApprovalRequest => ({
  kind: "sign_event",
  id,
  event: { kind: 1, content, tags: [], created_at: 1700000000 },
});

describe("ApprovalGate", () => {
  let approve: Mock<ApprovalHandler["approve"]>;
  let refuse: Mock<ApprovalHandler["refuse"]>;
  let gate: ApprovalGate;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    approve = vi.fn<ApprovalHandler["approve"]>().mockResolvedValue(undefined);
    refuse = vi.fn<ApprovalHandler["refuse"]>().mockResolvedValue(undefined);
    gate = new ApprovalGate({ handler: { approve, refuse }, timeoutMs: 120_000 });
  });

  afterEach(() => {
    gate.dispose();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("lists pending requests in arrival order", () => {
    gate.enqueue(ALICE.pk, signRequest("r1"));
    gate.enqueue(BOB.pk, signRequest("r2"));
    expect(gate.list().map((entry) => [entry.session, entry.id, entry.state])).toEqual([
      [ALICE.pk, "r1", "pending"],
      [BOB.pk, "r2", "pending"],
    ]);
    expect(gate.list()[0]).toMatchObject({ method: "sign_event", summary: "Sign kind 1 event: 'hello'" });
  });

  it("approves exactly once", async () => {
    gate.enqueue(ALICE.pk, signRequest("r1"));
    const decided = await gate.decide("r1", "approved");
    expect(decided.state).toBe("approved");
    expect(approve).toHaveBeenCalledTimes(1);
    expect(approve.mock.calls[0][0]).toMatchObject({ id: "r1", session: ALICE.pk });
    expect(gate.list()).toEqual([]);
    await expect(gate.decide("r1", "approved")).rejects.toMatchObject({ code: "UnknownRequest" });
    expect(approve).toHaveBeenCalledTimes(1);
  });

  it("answers a rejection", async () => {
    gate.enqueue(ALICE.pk, signRequest("r1"));
    await gate.decide("r1", "rejected");
    expect(refuse).toHaveBeenCalledWith(expect.objectContaining({ id: "r1", state: "rejected" }), "Rejected", "request rejected by user");
    expect(approve).not.toHaveBeenCalled();
  });

  it("expires an undecided request once", async () => {
    gate.enqueue(ALICE.pk, signRequest("r1"));
    await vi.advanceTimersByTimeAsync(119_999);
    expect(refuse).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    expect(refuse).toHaveBeenCalledTimes(1);
    expect(refuse).toHaveBeenCalledWith(expect.objectContaining({ id: "r1", state: "expired" }), "Expired", "approval timed out");
    expect(gate.list()).toEqual([]);
    await expect(gate.decide("r1", "approved")).rejects.toMatchObject({ code: "UnknownRequest" });
    await vi.advanceTimersByTimeAsync(120_000);
    expect(refuse).toHaveBeenCalledTimes(1);
  });

  it("treats a repeated id from the same session as a retry", async () => {
    gate.enqueue(ALICE.pk, signRequest("r1", "first"));
    await vi.advanceTimersByTimeAsync(60_000);
    gate.enqueue(ALICE.pk, signRequest("r1", "second"));
    expect(gate.list()).toHaveLength(1);
    expect(gate.list()[0].summary).toBe("Sign kind 1 event: 'second'");

    await vi.advanceTimersByTimeAsync(60_000);
    expect(refuse).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(60_000);
    expect(refuse).toHaveBeenCalledTimes(1);
  });

  it("needs the session when an id is pending in two sessions", async () => {
    gate.enqueue(ALICE.pk, signRequest("same"));
    gate.enqueue(BOB.pk, signRequest("same"));
    await expect(gate.decide("same", "approved")).rejects.toMatchObject({ code: "UnknownRequest" });
    const decided = await gate.decide("same", "approved", BOB.pk);
    expect(decided.session).toBe(BOB.pk);
    expect(gate.list().map((entry) => entry.session)).toEqual([ALICE.pk]);
  });

  it("expires only the cancelled session's requests", async () => {
    gate.enqueue(ALICE.pk, signRequest("a1"));
    gate.enqueue(BOB.pk, signRequest("b1"));
    gate.enqueue(ALICE.pk, signRequest("a2"));
    await gate.cancelSession(ALICE.pk, "client disconnected");
    expect(refuse.mock.calls.map(([entry, code, detail]) => [entry.id, code, detail])).toEqual([
      ["a1", "Expired", "client disconnected"],
      ["a2", "Expired", "client disconnected"],
    ]);
    expect(gate.list().map((entry) => entry.id)).toEqual(["b1"]);
  });

  it("notifies listeners of pending and resolved requests", async () => {
    const events: Array<[GateEvent["type"], string]> = [];
    gate.subscribe((event) => events.push([event.type, event.request.id]));
    gate.enqueue(ALICE.pk, signRequest("r1"));
    gate.enqueue(ALICE.pk, signRequest("r2"));
    await gate.decide("r2", "rejected");
    await vi.advanceTimersByTimeAsync(120_000);
    expect(events).toEqual([
      ["pending", "r1"],
      ["pending", "r2"],
      ["resolved", "r2"],
      ["resolved", "r1"],
    ]);
  });

  it("refuses timeouts setTimeout cannot honour", () => {
    expect(() => new ApprovalGate({ handler: { approve, refuse }, timeoutMs: 2 ** 31 })).toThrow(RangeError);
    expect(() => new ApprovalGate({ handler: { approve, refuse }, timeoutMs: 0 })).toThrow(RangeError);
    expect(new ApprovalGate({ handler: { approve, refuse }, timeoutMs: 2 ** 31 - 1 }).timeoutMs).toBe(2147483647);
  });

  it("keeps expiring when the handler fails", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    refuse.mockRejectedValueOnce(new Error("transport down"));
    gate.enqueue(ALICE.pk, signRequest("r1"));
    await vi.advanceTimersByTimeAsync(120_000);
    expect(gate.list()).toEqual([]);
    expect(console.error).toHaveBeenCalledWith("[gate] failed to answer expired request r1: Error: transport down");
  });
});
