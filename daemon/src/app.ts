/**
 * app.ts: Configured Express control API (exported for testing)
 *
 * Server startup (app.listen) lives in index.ts so tests can mount this on an
 * ephemeral port. Every route except /health requires the x-control-token header.
 */

import express, { type Application, type NextFunction, type Request, type Response } from "express";
import { z } from "zod";
import {
  SECURITY_LEVELS,
  VaultError,
  buildConditions,
  createDelegation,
  delegationToken,
  describeSecurityLevel,
  validityWindow,
  type KeyVault,
} from "@nostr-keyring/vault";
import { APPROVAL_METHODS, SignerError, type SignerEngine } from "@nostr-keyring/signer";

// ─── Errors ──────────────────────────────────────────────────────────────────

export class ApiError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
  }
}

export interface AppDependencies {
  vault: KeyVault;
  engine: SignerEngine;
  controlToken: string;
}

const STATUS_BY_CODE: Record<string, number> = {
  InvalidKeyFormat: 400,
  InvalidDigest: 400,
  InvalidParams: 400,
  InvalidConnectUri: 400,
  WrongPassword: 401,
  PolicyViolation: 403,
  NoRecordFound: 404,
  UnknownRequest: 404,
  UnknownSession: 404,
  KeyNotSet: 409,
  SigningUnavailable: 409,
  UnsupportedVaultVersion: 422,
  CorruptRecord: 422,
};

export const statusForCode = (code: string): number => STATUS_BY_CODE[code] ?? 500;

// ─── Request schemas ─────────────────────────────────────────────────────────

const securityLevelSchema = z.enum(SECURITY_LEVELS);

const importSchema = z.union([
  z.object({ secretKey: z.string().min(1) }).strict(),
  z.object({ publicKey: z.string().min(1) }).strict(),
]);

const saveSchema = z
  .object({
    password: z.string().optional(),
    confirmPassword: z.string().optional(),
    level: securityLevelSchema.optional(),
  })
  .refine((body) => body.confirmPassword === undefined || body.confirmPassword === body.password, {
    message: "Passwords do not match",
    path: ["confirmPassword"],
  });

const unlockSchema = z.object({ password: z.string().optional() });

const revealSchema = z.object({ confirm: z.literal(true) });

const settingsSchema = z.object({ level: securityLevelSchema });

const delegationSchema = z
  .object({
    delegatee: z.string().min(1),
    kind: z.number().int().min(0).max(65535).optional(),
    days: z.number().positive().max(3650).optional(),
    since: z.number().int().nonnegative().optional(),
    until: z.number().int().positive().optional(),
  })
  .refine((body) => body.days === undefined || (body.since === undefined && body.until === undefined), {
    message: "Give either days or since/until, not both",
  });

const connectSchema = z.object({ uri: z.string().min(1) });

const permissionSchema = z.object({
  method: z.enum(APPROVAL_METHODS),
  allow: z.boolean(),
});

const decisionSchema = z.object({
  outcome: z.enum(["approved", "rejected"]),
  session: z.string().regex(/^[0-9a-f]{64}$/).optional(),
  remember: z.boolean().optional(),
});

export function createApp({ vault, engine, controlToken }: AppDependencies): Application {
  const app = express();
  app.use(express.json({ limit: "64kb" }));

  const enforceControlToken = (req: Request, res: Response, next: NextFunction): void => {
    if (req.path === "/health") {
      next();
      return;
    }
    const token = req.header("x-control-token");
    if (!token || token !== controlToken) {
      res.status(401).json({ error: "Invalid control token" });
      return;
    }
    next();
  };

  app.use(enforceControlToken);

  // ─── Health & vault ────────────────────────────────────────────────────────

  app.get("/health", (_req, res) => {
    res.json({ ok: true, service: "nostr-keyring" });
  });

  app.get("/vault", (_req, res) => {
    res.json({ ...vault.snapshot(), securityLevelDescription: describeSecurityLevel(vault.securityLevel) });
  });

  app.post("/vault/generate", (_req, res, next) => {
    try {
      vault.generate();
      res.status(201).json(vault.snapshot());
    } catch (error) {
      next(error);
    }
  });

  app.post("/vault/import", (req, res, next) => {
    try {
      const body = importSchema.parse(req.body);
      if ("secretKey" in body) vault.importSecret(body.secretKey);
      else vault.importPublic(body.publicKey);
      res.status(201).json(vault.snapshot());
    } catch (error) {
      next(error);
    }
  });

  app.post("/vault/save", async (req, res, next) => {
    try {
      const body = saveSchema.parse(req.body ?? {});
      const result = await vault.save(body.password, body.level);
      res.json({ ...result, vault: vault.snapshot() });
    } catch (error) {
      next(error);
    }
  });

  app.post("/vault/load", async (_req, res, next) => {
    try {
      await vault.load();
      res.json(vault.snapshot());
    } catch (error) {
      next(error);
    }
  });

  app.post("/vault/unlock", async (req, res, next) => {
    try {
      const body = unlockSchema.parse(req.body ?? {});
      await vault.unlock(body.password);
      res.json(vault.snapshot());
    } catch (error) {
      next(error);
    }
  });

  app.post("/vault/clear", (_req, res) => {
    vault.clear();
    res.json(vault.snapshot());
  });

  app.post("/vault/reveal", async (req, res, next) => {
    try {
      const body = revealSchema.parse(req.body);
      const nsec = await vault.revealSecretKey(() => body.confirm);
      res.json({ nsec });
    } catch (error) {
      next(error);
    }
  });

  // ─── Settings & delegation ─────────────────────────────────────────────────

  app.put("/settings/security-level", (req, res, next) => {
    try {
      const body = settingsSchema.parse(req.body);
      vault.setSecurityLevel(body.level);
      res.json(vault.snapshot());
    } catch (error) {
      next(error);
    }
  });

  app.post("/delegations", async (req, res, next) => {
    try {
      const body = delegationSchema.parse(req.body);
      const window = body.days === undefined ? { since: body.since, until: body.until } : validityWindow(body.days);
      const conditions = buildConditions({ kind: body.kind, ...window });
      const tag = await createDelegation(vault, body.delegatee, conditions);
      res.status(201).json({ tag, conditions, token: delegationToken(body.delegatee, conditions) });
    } catch (error) {
      next(error);
    }
  });

  // ─── Sessions & approvals ──────────────────────────────────────────────────

  app.get("/sessions", (_req, res) => {
    res.json({ transportPublicKey: engine.transportPublicKey, sessions: engine.listSessions() });
  });

  app.post("/sessions", async (req, res, next) => {
    try {
      const body = connectSchema.parse(req.body);
      const session = await engine.connect(body.uri);
      res.status(201).json(session);
    } catch (error) {
      next(error);
    }
  });

  app.delete("/sessions/:id", async (req, res, next) => {
    try {
      const closed = await engine.disconnect(req.params.id);
      if (!closed) throw new ApiError(404, "Session not found");
      res.json({ ok: true });
    } catch (error) {
      next(error);
    }
  });

  app.put("/sessions/:id/permissions", (req, res, next) => {
    try {
      const body = permissionSchema.parse(req.body);
      res.json(engine.setPermission(req.params.id, body.method, body.allow));
    } catch (error) {
      next(error);
    }
  });

  app.get("/requests", (_req, res) => {
    res.json({ requests: engine.pending() });
  });

  app.post("/requests/:id/decision", async (req, res, next) => {
    try {
      const body = decisionSchema.parse(req.body);
      const request = await engine.decide(req.params.id, body.outcome, {
        session: body.session,
        remember: body.remember,
      });
      res.json({ id: request.id, session: request.session, state: request.state });
    } catch (error) {
      next(error);
    }
  });

  // ─── Error handler ─────────────────────────────────────────────────────────

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof z.ZodError) {
      res.status(400).json({ error: "Validation error", details: error.flatten() });
      return;
    }
    if (error instanceof ApiError) {
      res.status(error.status).json({ error: error.message });
      return;
    }
    if (error instanceof VaultError) {
      res.status(statusForCode(error.code)).json({ error: error.message, code: error.code, retriable: error.retriable });
      return;
    }
    if (error instanceof SignerError) {
      res.status(statusForCode(error.code)).json({ error: error.message, code: error.code, retriable: false });
      return;
    }
    const message = error instanceof Error ? error.message : "Internal server error";
    console.error(`[daemon] request failed: ${message}`);
    res.status(500).json({ error: message });
  });

  return app;
}
