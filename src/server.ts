// Voice Relay - Express Server
// HTTP surface over the voice pipeline: audio chat, session history, standalone
// speech, cached audio, and health.
//
// Privacy: uploads are buffered in memory (multer memoryStorage), never
// written to disk. Session data lives in server memory only.

import express, {
  type Express,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from "express";
import multer from "multer";
import { createServer, type Server as HttpServer } from "node:http";
import type { AudioCache } from "./audio-cache.js";
import { ERROR_SUMMARIES, FALLBACK_MESSAGES } from "./fallback-messages.js";
import { createConsoleLogger, errorMessage, type Logger } from "./logger.js";
import type { VoicePipeline } from "./voice-pipeline.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Default upload limit for audio recordings (25 MB). */
export const DEFAULT_MAX_UPLOAD_BYTES = 25 * 1024 * 1024;

/** Multipart field carrying the recording. */
export const AUDIO_FIELD = "audio_file";

const DEFAULT_AUDIO_MIME_TYPE = "audio/wav";

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  pipeline: VoicePipeline;
  /** Backs GET /audio/:audioId. Without it every audio id is unknown. */
  audioCache?: AudioCache;
  logger?: Logger;
  maxUploadBytes?: number;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  /** Start listening. Resolves with the bound port (useful with port 0). */
  listen(port: number): Promise<number>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app and HTTP server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const {
    pipeline,
    audioCache,
    logger = createConsoleLogger("Server"),
    maxUploadBytes = DEFAULT_MAX_UPLOAD_BYTES,
  } = options;
  const sessions = pipeline.sessionStore;

  const app = express();
  const httpServer = createServer(app);
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: maxUploadBytes } });

  app.use(express.json({ limit: "1mb" }));

  // ── Health ──
  app.get("/health", (_req, res) => {
    const services = pipeline.providerStatus();
    const healthy = Object.values(services).every(Boolean);
    res.json({
      status: healthy ? "healthy" : "degraded",
      services,
      timestamp: new Date().toISOString(),
    });
  });

  // ── Voice chat ──
  app.post(
    "/agent/chat/:sessionId",
    upload.single(AUDIO_FIELD),
    asyncRoute(async (req, res) => {
      const sessionId = req.params.sessionId;
      const file = req.file;

      if (!file || file.size === 0) {
        logger.warn(`Chat request for session ${sessionId} without audio`);
        res.status(400).json(invalidRequestBody("No audio file received", sessionId));
        return;
      }

      logger.info(`Chat request for session ${sessionId} (${file.size} bytes, ${file.mimetype})`);
      const { statusCode, body } = await pipeline.handle({
        sessionId,
        audio: {
          data: file.buffer,
          filename: file.originalname || "recording.wav",
          mimeType: file.mimetype || DEFAULT_AUDIO_MIME_TYPE,
        },
      });
      logger.info(`Chat response for session ${sessionId}: ${statusCode} ${body.status}`);
      res.status(statusCode).json(body);
    }),
  );

  // ── Session history ──
  app.get(
    "/agent/history/:sessionId",
    asyncRoute(async (req, res) => {
      const sessionId = req.params.sessionId;
      const { messages, isNew } = await sessions.get(sessionId);
      res.json({
        session_id: sessionId,
        messages,
        message_count: messages.length,
        status: isNew ? "new_session" : "existing_session",
      });
    }),
  );

  app.delete(
    "/agent/history/:sessionId",
    asyncRoute(async (req, res) => {
      const sessionId = req.params.sessionId;
      const existed = await sessions.clear(sessionId);
      if (existed) {
        logger.info(`Cleared history for session ${sessionId}`);
      }
      res.json({ session_id: sessionId, status: "cleared" });
    }),
  );

  app.get(
    "/agent/sessions",
    asyncRoute(async (_req, res) => {
      const summaries = await sessions.list();
      res.json({
        sessions: summaries.map((s) => ({
          session_id: s.sessionId,
          message_count: s.messageCount,
          last_message_preview: s.lastMessagePreview,
        })),
        total: summaries.length,
      });
    }),
  );

  // ── Standalone speech ──
  app.post(
    "/generate-audio",
    asyncRoute(async (req, res) => {
      const body: unknown = req.body;
      const text = readStringField(body, "text")?.trim();
      const voiceId = readStringField(body, "voice_id")?.trim() || undefined;

      if (!text) {
        res.status(400).json({
          status: "error",
          audio_url: null,
          error: "Field \"text\" is required",
          error_type: "invalid_request",
          fallback_message: "Please provide some text to speak.",
        });
        return;
      }

      const { statusCode, body: result } = await pipeline.speak(text, voiceId);
      res.status(statusCode).json(result);
    }),
  );

  // ── Cached audio ──
  app.get("/audio/:audioId", (req, res) => {
    const entry = audioCache?.get(req.params.audioId);
    if (!entry) {
      res.status(404).json({ error: "Audio not found" });
      return;
    }
    res.setHeader("Content-Type", entry.contentType);
    res.setHeader("Content-Length", String(entry.data.length));
    res.send(entry.data);
  });

  // ── Final error boundary ──
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const sessionId = typeof req.params?.sessionId === "string" ? req.params.sessionId : undefined;

    if (err instanceof multer.MulterError) {
      const tooLarge = err.code === "LIMIT_FILE_SIZE";
      logger.warn(`Upload rejected (${err.code}) for ${req.method} ${req.path}`);
      res
        .status(tooLarge ? 413 : 400)
        .json(
          invalidRequestBody(
            tooLarge
              ? `Audio file exceeds the upload limit of ${maxUploadBytes} bytes`
              : `Upload error: ${err.message}`,
            sessionId,
          ),
        );
      return;
    }

    if (isBodyParseError(err)) {
      res.status(400).json(invalidRequestBody("Request body is not valid JSON", sessionId));
      return;
    }

    logger.error(`Unhandled error on ${req.method} ${req.path}: ${errorMessage(err)}`);
    res.status(500).json({
      status: "error",
      ...(sessionId ? { session_id: sessionId } : {}),
      audio_url: null,
      error: ERROR_SUMMARIES.general_error,
      error_type: "general_error",
      fallback_message: FALLBACK_MESSAGES.general_error,
    });
  });

  return {
    app,
    httpServer,
    listen(port: number): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          const address = httpServer.address();
          const boundPort = typeof address === "object" && address !== null ? address.port : port;
          logger.info(`Server listening on port ${boundPort}`);
          resolve(boundPort);
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    },
  };
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

/** Forwards rejections from async handlers to the error middleware (Express 4). */
function asyncRoute(
  handler: (req: Request, res: Response) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function invalidRequestBody(error: string, sessionId?: string) {
  return {
    status: "error" as const,
    ...(sessionId ? { session_id: sessionId } : {}),
    audio_url: null,
    error,
    error_type: "invalid_request" as const,
    fallback_message: FALLBACK_MESSAGES.invalid_request,
  };
}

function readStringField(body: unknown, field: string): string | undefined {
  if (typeof body !== "object" || body === null) return undefined;
  const value: unknown = Reflect.get(body, field);
  return typeof value === "string" ? value : undefined;
}

function isBodyParseError(err: unknown): boolean {
  return (
    err instanceof SyntaxError &&
    "type" in err &&
    err.type === "entity.parse.failed"
  );
}
