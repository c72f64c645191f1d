import type { AudioFormat, AudioSegment, FlushReason, LanguageCode } from "../domain/types.js";
import type { Logger } from "../server/logger.js";
import { bytesForMs, bytesPerSample, msForBytes, rms } from "./pcm.js";

export type ChunkBufferOptions = {
  readonly participantId: string;
  readonly sourceLanguage: LanguageCode;
  readonly format: AudioFormat;
  readonly maxSegmentMs: number;
  readonly minSegmentMs: number;
  readonly silenceGapMs: number;
  readonly silenceThreshold: number;
  /** 0 disables the inactivity flush. */
  readonly inactivityFlushMs: number;
  readonly onSegment: (segment: AudioSegment) => void;
  readonly logger?: Logger;
};

type Frame = {
  readonly payload: Buffer;
  readonly silent: boolean;
};

/**
 * Accumulates one participant's raw PCM into inference-sized segments.
 *
 * A segment is emitted when the buffered audio reaches `maxSegmentMs`, when a
 * run of silent frames of `silenceGapMs` follows speech, when no audio arrives
 * for `inactivityFlushMs`, or on `close()`. Audio that never rose above the
 * silence threshold is dropped without consuming a sequence number.
 *
 * Fragments need not end on a sample boundary; the partial sample is held
 * back and joined to the next fragment.
 */
export class AudioChunkBuffer {
  private frames: Frame[] = [];
  private carry: Buffer = Buffer.alloc(0);
  private totalBytes = 0;
  private nextSequence = 1;
  private inactivityTimer: NodeJS.Timeout | undefined;
  private closed = false;
  private readonly maxBytes: number;
  private readonly silenceGapBytes: number;
  private readonly sampleWidth: number;

  public constructor(private readonly opts: ChunkBufferOptions) {
    this.sampleWidth = bytesPerSample(opts.format.encoding);
    this.maxBytes = bytesForMs(opts.format, opts.maxSegmentMs);
    this.silenceGapBytes = bytesForMs(opts.format, opts.silenceGapMs);
  }

  public get bufferedMs(): number {
    return msForBytes(this.opts.format, this.totalBytes);
  }

  public get emittedSegments(): number {
    return this.nextSequence - 1;
  }

  public append(fragment: Buffer): void {
    if (this.closed || fragment.length === 0) return;

    const payload = this.takeWholeSamples(fragment);
    if (payload.length === 0) return;

    const silent = rms(payload, this.opts.format.encoding) < this.opts.silenceThreshold;
    this.frames.push({ payload, silent });
    this.totalBytes += payload.length;

    while (this.totalBytes >= this.maxBytes) {
      this.emit(this.takeHead(this.maxBytes), "max_duration");
    }

    if (this.trailingSilenceBytes() >= this.silenceGapBytes) {
      if (this.hasVoice(this.frames)) {
        this.flush("silence");
      } else {
        this.reset();
      }
    }

    this.armInactivityTimer();
  }

  public flush(reason: FlushReason): AudioSegment | undefined {
    this.clearInactivityTimer();
    const frames = this.frames;
    this.reset();
    return this.emit(frames, reason);
  }

  public close(): AudioSegment | undefined {
    if (this.closed) return undefined;
    const segment = this.flush("close");
    this.closed = true;
    this.carry = Buffer.alloc(0);
    return segment;
  }

  private emit(frames: readonly Frame[], reason: FlushReason): AudioSegment | undefined {
    if (frames.length === 0) return undefined;

    const payload = Buffer.concat(frames.map((frame) => frame.payload));
    const durationMs = msForBytes(this.opts.format, payload.length);
    if (!this.hasVoice(frames)) {
      this.opts.logger?.debug("discarding silent audio", { reason, durationMs });
      return undefined;
    }
    if (reason !== "close" && reason !== "max_duration" && durationMs < this.opts.minSegmentMs) {
      this.opts.logger?.debug("discarding short segment", { reason, durationMs });
      return undefined;
    }

    const segment: AudioSegment = Object.freeze({
      participantId: this.opts.participantId,
      sequence: this.nextSequence,
      sourceLanguage: this.opts.sourceLanguage,
      encoding: this.opts.format.encoding,
      sampleRateHz: this.opts.format.sampleRateHz,
      durationMs,
      flushReason: reason,
      createdAtMs: Date.now(),
      payload,
    });
    this.nextSequence += 1;
    this.opts.onSegment(segment);
    return segment;
  }

  private takeWholeSamples(fragment: Buffer): Buffer {
    const joined = this.carry.length > 0 ? Buffer.concat([this.carry, fragment]) : fragment;
    const whole = joined.length - (joined.length % this.sampleWidth);
    this.carry = Buffer.from(joined.subarray(whole));
    return joined.subarray(0, whole);
  }

  /** Removes exactly `bytes` from the front, splitting a frame if needed. */
  private takeHead(bytes: number): Frame[] {
    const head: Frame[] = [];
    let taken = 0;
    while (taken < bytes) {
      const frame = this.frames.shift();
      if (!frame) break;
      const room = bytes - taken;
      if (frame.payload.length <= room) {
        head.push(frame);
        taken += frame.payload.length;
        continue;
      }
      head.push({ payload: frame.payload.subarray(0, room), silent: frame.silent });
      this.frames.unshift({ payload: frame.payload.subarray(room), silent: frame.silent });
      taken += room;
    }
    this.totalBytes -= taken;
    return head;
  }

  private hasVoice(frames: readonly Frame[]): boolean {
    return frames.some((frame) => !frame.silent);
  }

  private trailingSilenceBytes(): number {
    let bytes = 0;
    for (let i = this.frames.length - 1; i >= 0; i -= 1) {
      const frame = this.frames[i];
      if (!frame || !frame.silent) break;
      bytes += frame.payload.length;
    }
    return bytes;
  }

  private reset(): void {
    this.frames = [];
    this.totalBytes = 0;
  }

  private armInactivityTimer(): void {
    this.clearInactivityTimer();
    if (this.opts.inactivityFlushMs <= 0 || this.totalBytes === 0) return;
    this.inactivityTimer = setTimeout(() => {
      this.inactivityTimer = undefined;
      this.flush("inactivity");
    }, this.opts.inactivityFlushMs);
    this.inactivityTimer.unref();
  }

  private clearInactivityTimer(): void {
    if (!this.inactivityTimer) return;
    clearTimeout(this.inactivityTimer);
    this.inactivityTimer = undefined;
  }
}
