/**
 * nostr-keyring daemon
 *
 * Restores the saved identity, listens for NIP-46 traffic on the configured
 * relays and serves the control API on 127.0.0.1. Pending approvals are
 * logged; a UI answers them through POST /requests/:id/decision.
 *
 * Environment: see config.ts (KEYRING_*).
 */

import { FileVaultStore, KeyVault } from "@nostr-keyring/vault";
import { RelayTransport, SignerEngine, TransportKeys } from "@nostr-keyring/signer";
import { createApp } from "./app.js";
import { restoreVault } from "./bootstrap.js";
import { config } from "./config.js";
import { gracefulShutdown } from "./graceful-shutdown.js";

// ─── Wiring ──────────────────────────────────────────────────────────────────

const vault = new KeyVault({
  store: new FileVaultStore(config.dataDir),
  securityLevel: config.securityLevel,
  logN: config.scryptLogN,
});

// Fresh transport identity per run; clients pair again through connect.
const keys = TransportKeys.generate();
const transport = new RelayTransport({ keys, relays: config.relays });
const engine = new SignerEngine({
  vault,
  transport,
  keys,
  approvalTimeoutMs: config.approvalTimeoutMs,
  acceptUnknownClients: config.acceptUnknownClients,
});

engine.subscribe((event) => {
  if (event.type === "pending") {
    console.log(`[daemon] approval needed: ${event.request.summary} (${event.request.id})`);
  }
});

// ─── Startup ─────────────────────────────────────────────────────────────────

const status = await restoreVault(vault);
console.log(`[daemon] vault ${status}${vault.npub ? ` for ${vault.npub}` : ""}`);

engine.start();
await transport.start();

const app = createApp({ vault, engine, controlToken: config.controlToken });
const server = app.listen(config.port, "127.0.0.1", () => {
  console.log(`[daemon] control API listening on 127.0.0.1:${config.port}${config.devMode ? " (dev mode)" : ""}`);
});

gracefulShutdown(server, async () => {
  await engine.stop();
  transport.close();
  keys.dispose();
  vault.clear();
});
