import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { URL } from "node:url";
import { WebSocketServer } from "ws";
import { errorMessage } from "../domain/errors.js";
import { languageNames, normalizeLanguage } from "../domain/languages.js";
import type { TranslationProvider } from "../domain/providers.js";
import type { LanguageCode } from "../domain/types.js";
import { parseRoomPath, wireRoomSocket } from "../ingress/room-socket.js";
import type { TranslationOrchestrator } from "../pipeline/orchestrator.js";
import type { RoomSession, SegmentationSettings } from "../session/room-session.js";
import type { Logger } from "./logger.js";

export const SERVICE_NAME = "voice-rooms-gateway";

export type HttpServerOptions = {
  readonly translator: TranslationProvider;
  readonly segmentation: SegmentationSettings;
  readonly defaultTargetLanguage: LanguageCode;
  readonly defaultSourceLanguage: LanguageCode;
  readonly outboundMaxQueue: number;
  readonly sendDrainTimeoutMs: number;
};

export type RunningServer = {
  readonly server: Server;
  /** Sessions whose socket is still open. */
  readonly sessions: ReadonlySet<RoomSession>;
  /** Closes every session with `server_shutdown`, then stops listening. */
  close(): Promise<void>;
};

class InvalidBodyError extends Error {}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  if (!chunks.length) return {};
  try {
    return JSON.parse(Buffer.concat(chunks).toString("utf8"));
  } catch {
    throw new InvalidBodyError("malformed json body");
  }
}

function writeJson(res: ServerResponse, code: number, payload: unknown): void {
  res.statusCode = code;
  res.setHeader("content-type", "application/json");
  res.end(JSON.stringify(payload));
}

/** Undefined for a malformed percent-escape. */
function decodePathSegment(raw: string): string | undefined {
  try {
    return decodeURIComponent(raw);
  } catch {
    return undefined;
  }
}

type TranslateTextPayload = {
  text: string;
  source_lang: string;
  target_lang: string;
};

function validateTranslateTextPayload(payload: unknown): payload is TranslateTextPayload {
  if (!payload || typeof payload !== "object") return false;
  const p = payload as Record<string, unknown>;
  return (
    typeof p.text === "string" &&
    p.text.trim().length > 0 &&
    typeof p.source_lang === "string" &&
    typeof p.target_lang === "string"
  );
}

export function startHttpServer(
  port: number,
  logger: Logger,
  orchestrator: TranslationOrchestrator,
  opts: HttpServerOptions,
): RunningServer {
  const roomWs = new WebSocketServer({ noServer: true });
  const sessions = new Set<RoomSession>();

  const server = createServer(async (req, res) => {
    try {
      const method = req.method ?? "GET";
      const url = new URL(req.url ?? "/", "http://localhost");
      const pathname = url.pathname;

      if (method === "GET" && pathname === "/") {
        return writeJson(res, 200, { message: "Voice translation rooms are running" });
      }

      if (method === "GET" && pathname === "/health") {
        return writeJson(res, 200, { ok: true, service: SERVICE_NAME });
      }

      if (method === "GET" && pathname === "/create-room") {
        const roomId = orchestrator.createRoom();
        return writeJson(res, 200, { room_id: roomId });
      }

      if (method === "GET" && pathname === "/available-languages") {
        return writeJson(res, 200, { languages: languageNames() });
      }

      const participants = /^\/rooms\/([^/]+)\/participants$/.exec(pathname);
      if (method === "GET" && participants?.[1]) {
        const roomId = decodePathSegment(participants[1]);
        if (roomId === undefined || !orchestrator.hasRoom(roomId)) {
          return writeJson(res, 404, { error: "room_not_found" });
        }
        return writeJson(res, 200, { participants: orchestrator.participantCount(roomId) });
      }

      if (method === "POST" && pathname === "/translate-text") {
        const payload = await readJsonBody(req);
        if (!validateTranslateTextPayload(payload)) {
          return writeJson(res, 400, { error: "invalid_payload" });
        }
        const sourceLanguage = normalizeLanguage(payload.source_lang);
        const targetLanguage = normalizeLanguage(payload.target_lang);
        if (!sourceLanguage || !targetLanguage) {
          return writeJson(res, 400, { error: "unsupported_language" });
        }
        if (sourceLanguage === targetLanguage) {
          return writeJson(res, 200, { translated_text: payload.text });
        }

        let translated: string | undefined;
        try {
          const chunk = await opts.translator.translate(
            {
              participantId: "http",
              sequence: 0,
              text: payload.text,
              language: sourceLanguage,
              timestampMs: Date.now(),
            },
            targetLanguage,
          );
          translated = chunk?.text;
        } catch (error) {
          logger.warn("text translation failed", { error: errorMessage(error) });
        }
        if (!translated) {
          return writeJson(res, 502, { error: "translation_failed" });
        }
        return writeJson(res, 200, { translated_text: translated });
      }

      writeJson(res, 404, { error: "not_found" });
    } catch (error) {
      if (error instanceof InvalidBodyError) {
        return writeJson(res, 400, { error: "invalid_payload" });
      }
      logger.error("request failed", { error: errorMessage(error) });
      writeJson(res, 500, { error: "internal_error" });
    }
  });

  server.on("upgrade", (req, socket, head) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const roomId = parseRoomPath(url.pathname);

    if (!roomId) {
      socket.destroy();
      return;
    }

    roomWs.handleUpgrade(req, socket, head, (ws) => {
      const session = wireRoomSocket(
        ws,
        {
          roomId,
          targetLanguage: url.searchParams.get("target_lang"),
          sourceLanguage: url.searchParams.get("source_lang"),
        },
        {
          orchestrator,
          logger,
          segmentation: opts.segmentation,
          defaultTargetLanguage: opts.defaultTargetLanguage,
          defaultSourceLanguage: opts.defaultSourceLanguage,
          outboundMaxQueue: opts.outboundMaxQueue,
          sendDrainTimeoutMs: opts.sendDrainTimeoutMs,
        },
      );
      sessions.add(session);
      ws.on("close", () => sessions.delete(session));
    });
  });

  server.listen(port, () => {
    logger.info("http server started", { port, roomWsPath: "/ws/{room_id}" });
  });

  return {
    server,
    sessions,
    close: async () => {
      await Promise.all([...sessions].map((session) => session.close("server_shutdown")));
      roomWs.close();
      await new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) reject(error);
          else resolve();
        });
      });
    },
  };
}
