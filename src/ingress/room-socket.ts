import WebSocket from "ws";
import type { Logger } from "../server/logger.js";
import type { TranslationOrchestrator } from "../pipeline/orchestrator.js";
import type { LanguageCode } from "../domain/types.js";
import type { OutboundFrame } from "../session/outbound-queue.js";
import {
  RoomSession,
  type SegmentationSettings,
  type SessionConnection,
} from "../session/room-session.js";

export type RoomSocketParams = {
  readonly roomId: string;
  readonly targetLanguage: string | null;
  readonly sourceLanguage: string | null;
};

export type RoomSocketDeps = {
  readonly orchestrator: TranslationOrchestrator;
  readonly logger: Logger;
  readonly segmentation: SegmentationSettings;
  readonly defaultTargetLanguage: LanguageCode;
  readonly defaultSourceLanguage: LanguageCode;
  readonly outboundMaxQueue: number;
  readonly sendDrainTimeoutMs: number;
};

const ROOM_PATH = /^\/ws\/([^/]+)\/?$/;

/** Extracts the room id from `/ws/{room_id}`. */
export function parseRoomPath(pathname: string): string | undefined {
  const match = ROOM_PATH.exec(pathname);
  if (!match?.[1]) return undefined;
  try {
    return decodeURIComponent(match[1]);
  } catch {
    return undefined;
  }
}

function toBuffer(raw: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(raw)) return raw;
  if (Array.isArray(raw)) return Buffer.concat(raw);
  return Buffer.from(raw);
}

export function makeSocketConnection(ws: WebSocket): SessionConnection {
  return {
    send: (frame: OutboundFrame) =>
      new Promise<void>((resolve, reject) => {
        if (ws.readyState !== WebSocket.OPEN) {
          reject(new Error("socket is not open"));
          return;
        }
        const data = frame.kind === "json" ? frame.text : frame.payload;
        ws.send(data, { binary: frame.kind === "audio" }, (error) => {
          if (error) reject(error);
          else resolve();
        });
      }),
    close: (code, reason) => {
      if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
        ws.close(code, reason);
      }
    },
  };
}

export function wireRoomSocket(
  ws: WebSocket,
  params: RoomSocketParams,
  deps: RoomSocketDeps,
): RoomSession {
  const session = new RoomSession({
    roomId: params.roomId,
    targetLanguage: params.targetLanguage,
    sourceLanguage: params.sourceLanguage,
    defaultTargetLanguage: deps.defaultTargetLanguage,
    defaultSourceLanguage: deps.defaultSourceLanguage,
    connection: makeSocketConnection(ws),
    orchestrator: deps.orchestrator,
    logger: deps.logger,
    segmentation: deps.segmentation,
    outboundMaxQueue: deps.outboundMaxQueue,
    sendDrainTimeoutMs: deps.sendDrainTimeoutMs,
  });

  ws.on("message", (raw, isBinary) => {
    if (isBinary) {
      session.onAudio(toBuffer(raw));
      return;
    }
    session.onText(toBuffer(raw).toString("utf8"));
  });

  ws.on("error", (err) => {
    deps.logger.warn("room socket error", {
      roomId: params.roomId,
      participantId: session.id,
      error: err.message,
    });
    void session.close("transport_error");
  });

  ws.on("close", () => {
    void session.close("client_closed");
  });

  void session.open();
  return session;
}
