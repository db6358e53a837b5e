/**
 * Edge Telemetry Relay - Main Entry Point
 *
 * Bridges the local sensor broker to the Cloud broker:
 * - Forwards sensor readings (realtime or batched) and alarms (always realtime)
 * - Queues undeliverable records on disk and drains them when the Cloud is back
 * - Forwards Cloud commands to local actuators
 * - Serves read-only status over HTTP
 */

import { config } from "./config.ts";
import { initRelayService, destroyRelayService } from "./relay/relay-service.ts";
import { StatusServer } from "./server/status-server.ts";

// ═══════════════════════════════════════════════════════════════════════════════
// BANNER
// ═══════════════════════════════════════════════════════════════════════════════

const BANNER = `
╔═══════════════════════════════════════════════════════════════════╗
║                                                                   ║
║              E D G E   T E L E M E T R Y   R E L A Y              ║
║                                                                   ║
║           Local sensors  ──►  Offline queue  ──►  Cloud           ║
║                                                                   ║
╚═══════════════════════════════════════════════════════════════════╝
`;

const VERSION = "0.1.0";

let statusServer: StatusServer | null = null;
let shuttingDown = false;

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<void> {
  console.log(BANNER);
  console.log("[MAIN] Starting Edge Telemetry Relay...");
  console.log(`[MAIN] Version: ${VERSION}`);
  console.log(`[MAIN] Runtime: Node.js ${process.version}`);
  console.log("");

  // ─────────────────────────────────────────────────────────────────────────────
  // Initialize Relay (opens the offline queue)
  // ─────────────────────────────────────────────────────────────────────────────
  console.log("[INIT] Initializing relay...");
  const relay = initRelayService(config);
  console.log(`[INIT] ✓ Offline queue ready at: ${config.database.path}`);

  relay.start();
  console.log("[INIT] ✓ Relay started (brokers connect in the background)");

  // ─────────────────────────────────────────────────────────────────────────────
  // Start HTTP Status Server
  // ─────────────────────────────────────────────────────────────────────────────
  if (config.http.enabled) {
    console.log("[INIT] Starting HTTP status server...");
    statusServer = new StatusServer({
      host: config.http.host,
      port: config.http.port,
      getStatus: () => relay.getStatus(),
      logLevel: config.logging.level,
    });
    try {
      await statusServer.start();
    } catch (err) {
      // Monitoring only; relaying goes on without it
      console.error("[INIT] ✗ HTTP status server failed to start:", err);
      statusServer = null;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Startup Complete
  // ─────────────────────────────────────────────────────────────────────────────
  console.log("");
  console.log("╔═══════════════════════════════════════════════════════════════════╗");
  console.log("║                                                                   ║");
  console.log("║   ✓ Edge Telemetry Relay READY                                    ║");
  console.log("║                                                                   ║");
  console.log(`║   🏷️  Edge:          ${config.edge.id} (${config.edge.name})`.padEnd(68) + "║");
  console.log(`║   📍 Location:       ${config.edge.location}`.padEnd(68) + "║");
  console.log(`║   📡 Local broker:   ${config.local.url}`.padEnd(68) + "║");
  console.log(`║   ☁️  Cloud broker:   ${config.cloud.url}`.padEnd(68) + "║");
  if (statusServer) {
    console.log(`║   🌐 Status:         http://${config.http.host}:${config.http.port}/api/status`.padEnd(68) + "║");
  }
  console.log("║                                                                   ║");
  if (config.dispatch.mode === "realtime") {
    console.log("║   ✓ REALTIME - Readings stream to Cloud as they arrive           ║");
  } else {
    console.log(
      `║   ⏱️  BATCHED - ${config.dispatch.batchSize} readings or ${config.dispatch.batchTimeoutMs / 1000}s per batch`.padEnd(68) + "║"
    );
  }
  console.log("║                                                                   ║");
  console.log("╚═══════════════════════════════════════════════════════════════════╝");
  console.log("");

  // ─────────────────────────────────────────────────────────────────────────────
  // Graceful Shutdown
  // ─────────────────────────────────────────────────────────────────────────────
  process.on("SIGINT", () => {
    console.log("\n[MAIN] Received SIGINT, shutting down gracefully...");
    shutdown().catch((err: unknown) => {
      console.error("[SHUTDOWN] Error during shutdown:", err);
      process.exit(1);
    });
  });

  process.on("SIGTERM", () => {
    console.log("\n[MAIN] Received SIGTERM, shutting down gracefully...");
    shutdown().catch((err: unknown) => {
      console.error("[SHUTDOWN] Error during shutdown:", err);
      process.exit(1);
    });
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// GRACEFUL SHUTDOWN
// ═══════════════════════════════════════════════════════════════════════════════

async function shutdown(): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;

  console.log("[SHUTDOWN] Closing HTTP server...");
  if (statusServer) {
    await statusServer.stop();
    statusServer = null;
  }

  console.log("[SHUTDOWN] Stopping relay...");
  await destroyRelayService();

  console.log("[SHUTDOWN] Goodbye! 👋");
  process.exit(0);
}

// ═══════════════════════════════════════════════════════════════════════════════
// RUN
// ═══════════════════════════════════════════════════════════════════════════════

main().catch((error: unknown) => {
  console.error("[MAIN] Fatal error:", error);
  process.exit(1);
});
