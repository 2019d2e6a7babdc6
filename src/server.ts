// PitchScoop - Express server and WebSocket stream handler
//
// HTTP:
//   POST /mcp/execute                       { tool, arguments } → tool envelope
//   GET  /mcp/tools, /mcp/health            tool catalogue and health
//   GET  /api/sessions                      session listing (same filters as the tool)
//   GET  /api/healthz                       liveness
//   GET  /api/audio/:event_id/:session_id   signed audio playback
//
// WebSocket:
//   /ws/sessions/:session_id?event_id=…     binary frames are audio chunks,
//                                           text frames are transcript segments

import express, {
  type Express,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from "express";
import { createServer, type IncomingMessage, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { z } from "zod";
import type { AudioStorage } from "./audio-storage.js";
import { NotFoundError, StateError, ValidationError, errorMessage, toErrorBody } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { ListSessionsSchema, type ToolRegistry } from "./mcp-tools.js";
import type { SessionManager } from "./session-manager.js";
import { DEFAULT_EVENT_ID, type StreamServerMessage } from "./types.js";
import { formatZodIssues, parseArguments } from "./validation.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Close code sent when the stream names an unknown session or event. */
export const WS_CLOSE_NOT_FOUND = 4404;
/** Close code sent when the session can no longer accept frames. */
export const WS_CLOSE_INVALID_STATE = 4409;

const STREAM_PATH = /^\/ws\/sessions\/([^/]+)\/?$/;

// Base64 audio in stop_recording inflates uploads by a third.
const JSON_BODY_LIMIT = "75mb";

const ExecuteBodySchema = z.object({
  tool: z.string().trim().min(1),
  arguments: z.record(z.unknown()).default({}),
});

const StreamClientMessageSchema = z.object({
  type: z.literal("transcript_segment"),
  text: z.string(),
  start_time: z.number().nonnegative().optional(),
  end_time: z.number().nonnegative().optional(),
});

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  registry: ToolRegistry;
  sessionManager: SessionManager;
  audioStorage: AudioStorage;
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  /** Starts listening; resolves with the bound port (useful with port 0). */
  listen(port: number): Promise<number>;
  /** Closes every stream, then the HTTP server. */
  close(): Promise<void>;
}

/** Forwards a rejected handler promise to Express's error middleware. */
function asyncRoute(
  handler: (req: Request, res: Response) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function sendError(res: Response, err: unknown): void {
  const { statusCode, body } = toErrorBody(err);
  res.status(statusCode).json({ success: false, error: body });
}

/**
 * Creates the Express app, HTTP server and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const { registry, sessionManager, audioStorage } = options;
  const logger = options.logger ?? silentLogger;

  const app = express();
  const httpServer = createServer(app);

  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  // ── Tool protocol ──

  app.post(
    "/mcp/execute",
    asyncRoute(async (req, res) => {
      const parsed = ExecuteBodySchema.safeParse(req.body);
      if (!parsed.success) {
        const issues = formatZodIssues(parsed.error);
        sendError(res, new ValidationError(`Invalid request body: ${issues.join("; ")}`, issues));
        return;
      }
      const { statusCode, body } = await registry.execute(parsed.data.tool, parsed.data.arguments);
      res.status(statusCode).json(body);
    }),
  );

  app.get("/mcp/tools", (_req, res) => {
    const tools = registry.list();
    res.json({ success: true, tools, total_count: tools.length });
  });

  app.get("/mcp/health", (_req, res) => {
    res.json({ success: true, status: "healthy", available_tools: registry.names() });
  });

  // ── REST helpers ──

  app.get("/api/healthz", (_req, res) => {
    res.json({ ok: true });
  });

  app.get(
    "/api/sessions",
    asyncRoute(async (req, res) => {
      const filter = parseArguments(ListSessionsSchema, req.query, "GET /api/sessions");
      const listing = await sessionManager.listSessions(filter);
      res.json({ success: true, ...listing });
    }),
  );

  app.get(
    "/api/audio/:event_id/:session_id",
    asyncRoute(async (req, res) => {
      const { event_id: eventId, session_id: sessionId } = req.params;
      const expires = typeof req.query.expires === "string" ? req.query.expires : "";
      const signature = typeof req.query.signature === "string" ? req.query.signature : "";

      if (!audioStorage.verifyPlaybackSignature(eventId, sessionId, expires, signature)) {
        res.status(403).json({
          success: false,
          error: { code: "INVALID_SIGNATURE", message: "Playback URL is invalid or expired" },
        });
        return;
      }
      const audio = await audioStorage.read(eventId, sessionId);
      if (!audio) {
        throw new NotFoundError("AUDIO_NOT_FOUND", `No audio recorded for session ${sessionId}`);
      }
      res.setHeader("Content-Type", audio.content_type);
      res.setHeader("Content-Length", String(audio.size));
      res.send(audio.data);
    }),
  );

  // Malformed JSON bodies and anything a route throws end up here.
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      sendError(res, new ValidationError(`Malformed JSON body: ${err.message}`));
      return;
    }
    const { statusCode } = toErrorBody(err);
    if (statusCode >= 500) {
      logger.error(`Request failed: ${errorMessage(err)}`, { method: req.method, path: req.path });
    } else {
      logger.warn(`Request rejected: ${errorMessage(err)}`, { method: req.method, path: req.path });
    }
    sendError(res, err);
  });

  // ── Streams ──

  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
    handleConnection(ws, req, sessionManager, logger);
  });

  return {
    app,
    httpServer,
    wss,
    listen(port: number): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          const address = httpServer.address();
          const bound = typeof address === "object" && address !== null ? address.port : port;
          logger.info("Server listening", { port: bound });
          resolve(bound);
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.terminate();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function handleConnection(
  ws: WebSocket,
  req: IncomingMessage,
  sessionManager: SessionManager,
  logger: Logger,
): void {
  const url = new URL(req.url ?? "/", "http://localhost");
  const match = STREAM_PATH.exec(url.pathname);
  if (!match) {
    ws.close(WS_CLOSE_NOT_FOUND, "Unknown stream path");
    return;
  }
  let sessionId: string;
  try {
    sessionId = decodeURIComponent(match[1]);
  } catch {
    logger.warn("Stream rejected: malformed session id in path", { path: url.pathname });
    ws.close(WS_CLOSE_NOT_FOUND, "Malformed session id");
    return;
  }
  const eventId = url.searchParams.get("event_id") || DEFAULT_EVENT_ID;
  const context = { event_id: eventId, session_id: sessionId };

  // Frames are handled strictly in arrival order, after the attach succeeds.
  let open = true;
  let queue: Promise<void> = sessionManager.attachStream(eventId, sessionId).then(
    (session) => {
      logger.info("Stream attached", context);
      sendMessage(ws, { type: "status", status: session.status, session_id: sessionId });
    },
    (err: unknown) => {
      open = false;
      const { body } = toErrorBody(err);
      logger.warn(`Stream rejected: ${body.message}`, context);
      sendMessage(ws, { type: "error", message: body.message, recoverable: false });
      ws.close(err instanceof NotFoundError ? WS_CLOSE_NOT_FOUND : WS_CLOSE_INVALID_STATE, body.code);
    },
  );

  ws.on("message", (data: RawData, isBinary: boolean) => {
    queue = queue.then(async () => {
      if (!open) return;
      try {
        if (isBinary) {
          await sessionManager.appendAudio(eventId, sessionId, rawDataToBuffer(data));
        } else {
          const segment = parseClientMessage(rawDataToBuffer(data).toString("utf-8"));
          const segments = await sessionManager.addTranscriptSegment(eventId, sessionId, {
            text: segment.text,
            start_time: segment.start_time,
            end_time: segment.end_time,
          });
          sendMessage(ws, { type: "segment_ack", segments });
        }
      } catch (err) {
        const recoverable = !(err instanceof StateError || err instanceof NotFoundError);
        logger.warn(`Stream frame rejected: ${errorMessage(err)}`, context);
        sendMessage(ws, { type: "error", message: errorMessage(err), recoverable });
      }
    });
  });

  ws.on("close", () => {
    open = false;
    logger.info("Stream closed", context);
  });

  ws.on("error", (err) => {
    logger.error(`Stream error: ${err.message}`, context);
  });
}

function parseClientMessage(text: string): z.output<typeof StreamClientMessageSchema> {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new ValidationError("Stream text frames must be JSON");
  }
  return parseArguments(StreamClientMessageSchema, json, "transcript_segment");
}

function rawDataToBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

// ─── Message Sending ────────────────────────────────────────────────────────────

export function sendMessage(ws: WebSocket, message: StreamServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}
