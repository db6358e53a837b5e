/**
 * Edge Telemetry Relay - Status Server
 *
 * Read-only HTTP monitoring endpoints:
 *   GET /health      - liveness plus both connection states
 *   GET /api/status  - full relay status
 *
 * No endpoint changes relay state.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { createLogger, type Logger, type LogLevel } from "../utils/logger.ts";
import type { RelayStatus } from "../types/index.ts";

export interface StatusServerOptions {
  host: string;
  /** 0 picks a free port */
  port: number;
  getStatus: () => RelayStatus;
  logLevel?: LogLevel;
}

export class StatusServer {
  private options: StatusServerOptions;
  private server: Server | null = null;
  private log: Logger;

  constructor(options: StatusServerOptions) {
    this.options = options;
    this.log = createLogger("[HTTP]", options.logLevel);
  }

  /**
   * Start listening. Resolves with the bound port.
   */
  start(): Promise<number> {
    if (this.server) {
      return Promise.resolve(this.port());
    }

    const server = createServer((req, res) => this.handle(req, res));
    this.server = server;

    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        this.server = null;
        reject(err);
      };
      server.once("error", onError);
      server.listen(this.options.port, this.options.host, () => {
        server.off("error", onError);
        server.on("error", (err) => this.log.error("Server error:", err));
        const port = this.port();
        this.log.info(`Listening on http://${this.options.host}:${port}`);
        resolve(port);
      });
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) {
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }

  private port(): number {
    const address = this.server?.address();
    return address && typeof address === "object" ? address.port : this.options.port;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // ROUTES
  // ═══════════════════════════════════════════════════════════════════════════

  private handle(req: IncomingMessage, res: ServerResponse): void {
    const path = new URL(req.url ?? "/", "http://localhost").pathname;

    if (req.method !== "GET") {
      res.writeHead(405, { "Content-Type": "text/plain", Allow: "GET" });
      res.end("Method Not Allowed");
      return;
    }

    try {
      if (path === "/health") {
        const status = this.options.getStatus();
        sendJson(res, 200, {
          status: "ok",
          timestamp: new Date().toISOString(),
          edgeId: status.config.edgeId,
          cloudConnection: status.cloudConnection,
          localConnection: status.localConnection,
        });
        return;
      }

      if (path === "/api/status") {
        sendJson(res, 200, { success: true, data: this.options.getStatus() });
        return;
      }
    } catch (err) {
      this.log.error(`Error handling ${path}:`, err);
      sendJson(res, 500, { success: false, error: "Failed to read relay status" });
      return;
    }

    res.writeHead(404, { "Content-Type": "text/plain" });
    res.end("Not Found");
  }
}

/** Dates serialize as ISO strings through their toJSON */
function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  res.writeHead(statusCode, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}
