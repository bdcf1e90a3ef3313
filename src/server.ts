// Swing Coach - Express Server and WebSocket Push
//
// HTTP surface over the AnalysisOrchestrator: create a session from an uploaded
// video, query status, resume, retry a failed session as a new one, discard,
// and fetch the committed report. Report artifacts are served from /media.
// Every orchestrator event and connectivity change is pushed to all connected
// WebSocket clients as JSON.

import express, { type Express, type NextFunction, type Request, type RequestHandler, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket } from "ws";
import type { AnalysisOrchestrator } from "./analysis-orchestrator.js";
import type { ConnectivitySource } from "./connectivity-monitor.js";
import { InvalidSessionStateError, SessionNotFoundError, errorMessage } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { SessionStore } from "./session-store.js";
import type { ServerMessage } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Largest video accepted by POST /sessions. */
const MAX_VIDEO_BYTES = "500mb";

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  orchestrator: AnalysisOrchestrator;
  /** Used for manifests (GET /sessions/:id/report) and the /media root. */
  store: SessionStore;
  connectivity?: ConnectivitySource;
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  /** Start listening on the given port. Resolves with the bound port. */
  listen(port: number): Promise<number>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const { orchestrator, store, connectivity, logger = createConsoleLogger("Server") } = options;

  const app = express();
  const httpServer = createServer(app);
  const wss = new WebSocketServer({ server: httpServer });

  // ── push ──

  const broadcast = (message: ServerMessage): void => {
    for (const client of wss.clients) sendMessage(client, message);
  };

  const unsubscribers: Array<() => void> = [orchestrator.onEvent((event) => broadcast(event))];
  if (connectivity) {
    unsubscribers.push(connectivity.subscribe((reachable) => broadcast({ type: "connectivity", reachable })));
  }

  wss.on("connection", (ws: WebSocket) => {
    logger.info(`WebSocket client connected (${wss.clients.size} total)`);
    sendMessage(ws, { type: "connectivity", reachable: connectivity?.isReachable() ?? true });
    ws.on("error", (err) => {
      logger.error(`WebSocket error: ${err.message}`);
    });
  });

  // ── routes ──

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", reachable: connectivity?.isReachable() ?? true });
  });

  app.use("/media", express.static(store.sessionsDir, { dotfiles: "deny", index: false }));

  app.post(
    "/sessions",
    express.raw({ type: "video/*", limit: MAX_VIDEO_BYTES }),
    asyncHandler(async (req, res) => {
      const mimeType = req.get("content-type")?.split(";")[0]?.trim().toLowerCase() ?? "";
      if (!mimeType.startsWith("video/") || !Buffer.isBuffer(req.body)) {
        res.status(415).json({ error: "Expected a video/* request body" });
        return;
      }
      if (req.body.length === 0) {
        res.status(400).json({ error: "Video is empty" });
        return;
      }
      const sessionId = await orchestrator.createSession({ video: req.body, mimeType });
      res.status(201).json({ sessionId });
    }),
  );

  app.get(
    "/sessions",
    asyncHandler(async (_req, res) => {
      res.json({ sessions: await orchestrator.listStatuses() });
    }),
  );

  app.get(
    "/sessions/:id",
    asyncHandler(async (req, res) => {
      const status = await orchestrator.getStatus(req.params.id);
      if (!status) throw new SessionNotFoundError(req.params.id);
      res.json(status);
    }),
  );

  app.post(
    "/sessions/:id/resume",
    asyncHandler(async (req, res) => {
      const id = req.params.id;
      if (!(await orchestrator.getStatus(id))) throw new SessionNotFoundError(id);
      // resume() never rejects; the client follows progress over the socket.
      void orchestrator.resume(id);
      res.status(202).json({ sessionId: id });
    }),
  );

  app.post(
    "/sessions/:id/retry",
    asyncHandler(async (req, res) => {
      const sessionId = await orchestrator.retryAsNewSession(req.params.id);
      res.status(201).json({ sessionId });
    }),
  );

  app.delete(
    "/sessions/:id",
    asyncHandler(async (req, res) => {
      await orchestrator.discard(req.params.id);
      res.status(204).end();
    }),
  );

  app.get(
    "/sessions/:id/report",
    asyncHandler(async (req, res) => {
      const id = req.params.id;
      const status = await orchestrator.getStatus(id);
      if (!status) throw new SessionNotFoundError(id);
      const manifest = status.ready ? await store.readManifest(id) : null;
      if (!manifest) throw new InvalidSessionStateError(`Report for session ${id} is not ready`);
      res.json(manifest);
    }),
  );

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const status = statusForError(err);
    if (status >= 500) logger.error(`Request failed: ${errorMessage(err)}`);
    res.status(status).json({ error: errorMessage(err) });
  });

  return {
    app,
    httpServer,
    wss,
    listen(port: number): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          httpServer.off("error", reject);
          const address = httpServer.address();
          const bound = typeof address === "object" && address ? address.port : port;
          logger.info(`Server listening on port ${bound}`);
          resolve(bound);
        });
      });
    },
    close(): Promise<void> {
      for (const unsubscribe of unsubscribers.splice(0)) unsubscribe();
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          if (!httpServer.listening) {
            resolve();
            return;
          }
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

/** Express 4 does not catch rejected handler promises; forward them to next(). */
function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function statusForError(err: unknown): number {
  if (err instanceof SessionNotFoundError) return 404;
  if (err instanceof InvalidSessionStateError) return 409;
  if (err instanceof Error && "type" in err && err.type === "entity.too.large") return 413;
  return 500;
}

export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}
