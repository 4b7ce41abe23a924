import { SignerError } from "./errors.js";
import { summarizeRequest, type ApprovalMethod, type ApprovalRequest } from "./protocol.js";

export const DEFAULT_APPROVAL_TIMEOUT_MS = 120_000;

/** Longest delay `setTimeout` honours; larger values fire after 1 ms. */
export const MAX_APPROVAL_TIMEOUT_MS = 2 ** 31 - 1;

export type Decision = "approved" | "rejected";

export type RequestState = "pending" | Decision | "expired";

export interface PendingRequest {
  id: string;
  session: string;
  method: ApprovalMethod;
  request: ApprovalRequest;
  summary: string;
  state: RequestState;
  receivedAt: number;
  expiresAt: number;
}

/** Produces the one response a request gets once it leaves the gate. */
export interface ApprovalHandler {
  approve(entry: PendingRequest): Promise<void>;
  refuse(entry: PendingRequest, code: "Rejected" | "Expired", detail: string): Promise<void>;
}

export type GateEvent =
  | { type: "pending"; request: PendingRequest }
  | { type: "resolved"; request: PendingRequest };

export interface ApprovalGateOptions {
  handler: ApprovalHandler;
  timeoutMs?: number;
}

interface Entry {
  request: PendingRequest;
  timer: ReturnType<typeof setTimeout>;
}

const keyOf = (session: string, id: string): string => `${session}:${id}`;

export class ApprovalGate {
  private readonly entries = new Map<string, Entry>();
  private readonly listeners = new Set<(event: GateEvent) => void>();
  private readonly handler: ApprovalHandler;
  readonly timeoutMs: number;

  constructor(options: ApprovalGateOptions) {
    this.handler = options.handler;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_APPROVAL_TIMEOUT_MS;
    if (!Number.isInteger(this.timeoutMs) || this.timeoutMs < 1 || this.timeoutMs > MAX_APPROVAL_TIMEOUT_MS) {
      throw new RangeError(`Approval timeout must be an integer between 1 and ${MAX_APPROVAL_TIMEOUT_MS} ms`);
    }
  }

  /**
   * Queues a request for a decision. A request id the same session already has
   * pending is a retry: the entry is replaced and its timer restarted.
   */
  enqueue(session: string, request: ApprovalRequest): PendingRequest {
    const key = keyOf(session, request.id);
    const previous = this.entries.get(key);
    if (previous) clearTimeout(previous.timer);

    const receivedAt = Date.now();
    const pending: PendingRequest = {
      id: request.id,
      session,
      method: request.kind,
      request,
      summary: summarizeRequest(request),
      state: "pending",
      receivedAt,
      expiresAt: receivedAt + this.timeoutMs,
    };
    const timer = setTimeout(() => void this.expire(key), this.timeoutMs);
    timer.unref();
    this.entries.set(key, { request: pending, timer });
    console.log(`[gate] ${pending.method} ${pending.id} from ${session.slice(0, 8)} awaiting approval`);
    this.emit({ type: "pending", request: { ...pending } });
    return { ...pending };
  }

  list(): PendingRequest[] {
    return [...this.entries.values()].map((entry) => ({ ...entry.request }));
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Resolves exactly one pending request. The entry leaves the gate before the
   * handler runs, so a second decision for the same id fails `UnknownRequest`.
   */
  async decide(id: string, decision: Decision, session?: string): Promise<PendingRequest> {
    const matches = [...this.entries.entries()].filter(
      ([, entry]) => entry.request.id === id && (session === undefined || entry.request.session === session)
    );
    if (matches.length === 0) throw new SignerError("UnknownRequest", `No pending request ${id}`);
    if (matches.length > 1) {
      throw new SignerError("UnknownRequest", `Request id ${id} is pending in ${matches.length} sessions; name the session`);
    }
    const [key] = matches[0];
    const request = this.take(key);
    if (!request) throw new SignerError("UnknownRequest", `No pending request ${id}`);
    request.state = decision;
    console.log(`[gate] ${request.method} ${request.id} ${decision}`);
    try {
      if (decision === "approved") await this.handler.approve(request);
      else await this.handler.refuse(request, "Rejected", "request rejected by user");
    } finally {
      this.emit({ type: "resolved", request: { ...request } });
    }
    return { ...request };
  }

  /** Expires every pending request of `session`, each with a response. */
  async cancelSession(session: string, detail: string): Promise<void> {
    const keys = [...this.entries.entries()]
      .filter(([, entry]) => entry.request.session === session)
      .map(([key]) => key);
    for (const key of keys) await this.expire(key, detail);
  }

  subscribe(listener: (event: GateEvent) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /** Drops every entry and timer without answering. */
  dispose(): void {
    for (const entry of this.entries.values()) clearTimeout(entry.timer);
    this.entries.clear();
    this.listeners.clear();
  }

  private async expire(key: string, detail = "approval timed out"): Promise<void> {
    const request = this.take(key);
    if (!request) return;
    request.state = "expired";
    console.log(`[gate] ${request.method} ${request.id} expired: ${detail}`);
    try {
      await this.handler.refuse(request, "Expired", detail);
    } catch (error) {
      console.error(`[gate] failed to answer expired request ${request.id}: ${String(error)}`);
    }
    this.emit({ type: "resolved", request: { ...request } });
  }

  private take(key: string): PendingRequest | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    clearTimeout(entry.timer);
    this.entries.delete(key);
    return entry.request;
  }

  private emit(event: GateEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        console.error(`[gate] listener failed: ${String(error)}`);
      }
    }
  }
}
