import type { Server } from "node:http";

export function gracefulShutdown(
  server: Server,
  onClose?: () => Promise<void> | void,
  timeoutMs = 5000
): void {
  let shuttingDown = false;
  const handler = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`\n[daemon] ${signal} received, shutting down gracefully...`);
    server.close(() => {
      console.log("[daemon] control API closed.");
      Promise.resolve(onClose?.())
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error(`[daemon] shutdown hook failed: ${String(error)}`);
          process.exit(1);
        });
    });
    setTimeout(() => {
      console.error("[daemon] forcing shutdown after timeout.");
      process.exit(1);
    }, timeoutMs).unref();
  };

  process.on("SIGTERM", () => handler("SIGTERM"));
  process.on("SIGINT", () => handler("SIGINT"));
}
