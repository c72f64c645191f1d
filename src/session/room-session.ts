import { randomUUID } from "node:crypto";
import { errorMessage } from "../domain/errors.js";
import { normalizeLanguage } from "../domain/languages.js";
import type {
  AudioFormat,
  AudioSegment,
  LanguageCode,
  ParticipantSink,
  ServerMessage,
  SessionState,
  TranslationArtifact,
} from "../domain/types.js";
import { AudioChunkBuffer } from "../pipeline/chunk-buffer.js";
import type { TranslationOrchestrator } from "../pipeline/orchestrator.js";
import type { Logger } from "../server/logger.js";
import { OutboundQueue, framesOf, type OutboundEntry, type OutboundFrame } from "./outbound-queue.js";

export const CLOSE_NORMAL = 1000;
export const CLOSE_GOING_AWAY = 1001;
export const CLOSE_INTERNAL_ERROR = 1011;
export const CLOSE_REJECTED = 4400;

export type CloseReason = "client_closed" | "transport_error" | "server_shutdown";

const CLOSE_CODES: Record<CloseReason, number> = {
  client_closed: CLOSE_NORMAL,
  transport_error: CLOSE_INTERNAL_ERROR,
  server_shutdown: CLOSE_GOING_AWAY,
};

/** The transport half of a session; `send` settles once the frame is written. */
export interface SessionConnection {
  send(frame: OutboundFrame): Promise<void>;
  close(code: number, reason: string): void;
}

export type SegmentationSettings = {
  readonly format: AudioFormat;
  readonly maxSegmentMs: number;
  readonly minSegmentMs: number;
  readonly silenceGapMs: number;
  readonly silenceThreshold: number;
  readonly inactivityFlushMs: number;
};

export type RoomSessionOptions = {
  readonly roomId: string;
  /** Raw `target_lang` query value; absent means the default. */
  readonly targetLanguage?: string | null;
  /** Raw `source_lang` query value; absent means the default. */
  readonly sourceLanguage?: string | null;
  readonly defaultTargetLanguage: LanguageCode;
  readonly defaultSourceLanguage: LanguageCode;
  readonly connection: SessionConnection;
  readonly orchestrator: TranslationOrchestrator;
  readonly logger: Logger;
  readonly segmentation: SegmentationSettings;
  readonly outboundMaxQueue: number;
  readonly sendDrainTimeoutMs: number;
};

type ClientMessage =
  | { readonly type: "ping" }
  | { readonly type: "set_target_lang"; readonly target_lang: string };

function parseClientMessage(raw: string): ClientMessage | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (!parsed || typeof parsed !== "object") return undefined;
  const msg = parsed as Record<string, unknown>;
  if (msg.type === "ping") return { type: "ping" };
  if (msg.type === "set_target_lang" && typeof msg.target_lang === "string") {
    return { type: "set_target_lang", target_lang: msg.target_lang };
  }
  return undefined;
}

/**
 * One participant's connection: connecting → active → closing → closed.
 *
 * Inbound audio is segmented here and handed to the orchestrator without
 * waiting on inference; outbound frames are written one at a time in the
 * order they were produced.
 */
export class RoomSession implements ParticipantSink {
  public readonly id: string = randomUUID();
  private currentState: SessionState = "connecting";
  private targetLanguage: LanguageCode;
  private buffer: AudioChunkBuffer | undefined;
  private readonly outbound: OutboundQueue;
  private readonly log: Logger;
  private pumping: Promise<void> | undefined;
  private closing: Promise<void> | undefined;

  public constructor(private readonly opts: RoomSessionOptions) {
    this.outbound = new OutboundQueue(opts.outboundMaxQueue);
    this.targetLanguage = opts.defaultTargetLanguage;
    this.log = opts.logger.child({ roomId: opts.roomId, participantId: this.id });
  }

  public get state(): SessionState {
    return this.currentState;
  }

  public get roomId(): string {
    return this.opts.roomId;
  }

  public get target(): LanguageCode {
    return this.targetLanguage;
  }

  /** Validates the handshake and joins the room; false means the connection was rejected. */
  public async open(): Promise<boolean> {
    if (this.currentState !== "connecting") return false;

    const targetLanguage = this.resolveLanguage(this.opts.targetLanguage, this.opts.defaultTargetLanguage);
    const sourceLanguage = this.resolveLanguage(this.opts.sourceLanguage, this.opts.defaultSourceLanguage);
    if (!targetLanguage || !sourceLanguage) {
      const bad = targetLanguage ? this.opts.sourceLanguage : this.opts.targetLanguage;
      await this.reject("unsupported_language", `Unsupported language: ${bad ?? ""}`);
      return false;
    }
    if (!this.opts.orchestrator.hasRoom(this.opts.roomId)) {
      await this.reject("room_not_found", `Room ${this.opts.roomId} does not exist`);
      return false;
    }

    this.targetLanguage = targetLanguage;
    this.currentState = "active";
    this.notify({
      type: "connection_established",
      room_id: this.opts.roomId,
      user_id: this.id,
      target_lang: targetLanguage,
    });

    this.opts.orchestrator.join(this.opts.roomId, {
      participantId: this.id,
      sourceLanguage,
      targetLanguage,
      sink: this,
    });

    this.buffer = new AudioChunkBuffer({
      participantId: this.id,
      sourceLanguage,
      ...this.opts.segmentation,
      onSegment: (segment) => this.onSegment(segment),
      logger: this.log,
    });
    this.log.info("session active", { targetLanguage, sourceLanguage });
    return true;
  }

  public onAudio(payload: Buffer): void {
    if (this.currentState !== "active") return;
    this.buffer?.append(payload);
  }

  public onText(raw: string): void {
    if (this.currentState !== "active") return;

    const msg = parseClientMessage(raw);
    if (!msg) {
      this.log.warn("unrecognized client message", { preview: raw.slice(0, 50) });
      return;
    }

    if (msg.type === "ping") {
      this.notify({ type: "pong" });
      return;
    }

    const language = normalizeLanguage(msg.target_lang);
    if (!language) {
      this.notify({
        type: "error",
        error: "unsupported_language",
        detail: `Unsupported language: ${msg.target_lang}`,
      });
      return;
    }
    const updated = this.opts.orchestrator.updateTargetLanguage(this.opts.roomId, this.id, language);
    if (!updated) return;
    this.targetLanguage = language;
    this.notify({ type: "target_lang_updated", target_lang: language });
  }

  public deliver(artifact: TranslationArtifact): void {
    if (this.currentState !== "active") return;
    this.enqueue({
      kind: "translation",
      caption: {
        kind: "json",
        text: JSON.stringify({
          type: "translation",
          speaker_id: artifact.speakerId,
          sequence: artifact.sequence,
          language: artifact.language,
          original_text: artifact.originalText,
          translated_text: artifact.translatedText,
        } satisfies ServerMessage),
      },
      audio: { kind: "audio", payload: artifact.audio.payload },
    });
  }

  public notify(message: ServerMessage): void {
    if (this.currentState !== "active") return;
    this.enqueue({ kind: "control", frame: { kind: "json", text: JSON.stringify(message) } });
  }

  public close(reason: CloseReason): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown(reason);
    }
    return this.closing;
  }

  private async shutdown(reason: CloseReason): Promise<void> {
    if (this.currentState !== "active") {
      this.currentState = "closed";
      return;
    }

    this.currentState = "closing";
    this.buffer?.close();
    await this.drainOutbound();
    const discarded = this.outbound.clear();

    this.currentState = "closed";
    this.opts.orchestrator.leave(this.opts.roomId, this.id);
    this.log.info("session closed", {
      reason,
      discardedEntries: discarded,
      droppedTranslations: this.outbound.droppedCount,
    });

    this.opts.connection.close(CLOSE_CODES[reason], reason);
  }

  private onSegment(segment: AudioSegment): void {
    const result = this.opts.orchestrator.submitSegment(segment);
    if (result === "overloaded") {
      this.notify({ type: "backpressure", dropped_sequence: segment.sequence });
    }
  }

  private resolveLanguage(raw: string | null | undefined, fallback: LanguageCode): LanguageCode | undefined {
    if (raw === undefined || raw === null || raw === "") return fallback;
    return normalizeLanguage(raw);
  }

  private async reject(error: string, detail: string): Promise<void> {
    this.currentState = "closed";
    this.log.warn("connection rejected", { error, detail });
    const frame: ServerMessage = { type: "error", error, detail };
    try {
      await this.opts.connection.send({ kind: "json", text: JSON.stringify(frame) });
    } catch (sendError) {
      this.log.debug("rejection notice not delivered", { error: errorMessage(sendError) });
    } finally {
      this.opts.connection.close(CLOSE_REJECTED, error);
    }
  }

  private enqueue(entry: OutboundEntry): void {
    const result = this.outbound.enqueue(entry);
    if (result.droppedOldest) {
      this.log.debug("outbound queue full, dropped oldest translation", { queueSize: result.queueSize });
    }
    if (!this.pumping) {
      this.pumping = this.pump();
    }
  }

  private async pump(): Promise<void> {
    try {
      for (let entry = this.outbound.dequeue(); entry; entry = this.outbound.dequeue()) {
        for (const frame of framesOf(entry)) {
          await this.opts.connection.send(frame);
        }
      }
      this.pumping = undefined;
    } catch (error) {
      this.pumping = undefined;
      this.outbound.clear();
      this.log.warn("send failed", { error: errorMessage(error) });
      void this.close("transport_error");
    }
  }

  private async drainOutbound(): Promise<void> {
    const pending = this.pumping;
    if (!pending) return;

    let timer: NodeJS.Timeout | undefined;
    const timedOut = await Promise.race([
      pending.then(() => false),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(true), this.opts.sendDrainTimeoutMs);
      }),
    ]);
    clearTimeout(timer);
    if (timedOut) {
      this.log.warn("outbound drain timed out", { pendingEntries: this.outbound.size });
    }
  }
}
