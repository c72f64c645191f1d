import type { LanguageCode } from "./languages.js";

export type { LanguageCode };

export type AudioEncoding = "pcm_s16le" | "pcm_f32le";

export type SessionState = "connecting" | "active" | "closing" | "closed";

export type FlushReason = "max_duration" | "silence" | "inactivity" | "close";

export interface AudioFormat {
  readonly encoding: AudioEncoding;
  readonly sampleRateHz: number;
}

export interface AudioSegment extends AudioFormat {
  readonly participantId: string;
  readonly sequence: number;
  readonly sourceLanguage: LanguageCode;
  readonly durationMs: number;
  readonly flushReason: FlushReason;
  readonly createdAtMs: number;
  readonly payload: Buffer;
}

export interface TranscriptionChunk {
  readonly participantId: string;
  readonly sequence: number;
  readonly text: string;
  readonly language: LanguageCode;
  readonly confidence?: number;
  readonly timestampMs: number;
}

export interface TranslationChunk {
  readonly participantId: string;
  readonly sequence: number;
  readonly text: string;
  readonly sourceLanguage: LanguageCode;
  readonly targetLanguage: LanguageCode;
  readonly timestampMs: number;
}

export interface TtsChunk {
  readonly participantId: string;
  readonly sequence: number;
  readonly language: LanguageCode;
  readonly encoding: AudioEncoding;
  readonly sampleRateHz: number;
  readonly payload: Buffer;
  readonly timestampMs: number;
}

/** One synthesized utterance in one target language. */
export interface TranslationArtifact {
  readonly speakerId: string;
  readonly sequence: number;
  readonly language: LanguageCode;
  readonly originalText: string;
  readonly translatedText: string;
  readonly audio: TtsChunk;
}

export type ServerMessage =
  | {
      readonly type: "connection_established";
      readonly room_id: string;
      readonly user_id: string;
      readonly target_lang: LanguageCode;
    }
  | { readonly type: "participant_count"; readonly room_id: string; readonly count: number }
  | {
      readonly type: "translation";
      readonly speaker_id: string;
      readonly sequence: number;
      readonly language: LanguageCode;
      readonly original_text: string;
      readonly translated_text: string;
    }
  | { readonly type: "backpressure"; readonly dropped_sequence: number }
  | { readonly type: "target_lang_updated"; readonly target_lang: LanguageCode }
  | { readonly type: "pong" }
  | { readonly type: "error"; readonly error: string; readonly detail?: string };

/** Connection-side endpoint the registry hands translated output to. */
export interface ParticipantSink {
  deliver(artifact: TranslationArtifact): void;
  notify(message: ServerMessage): void;
}

export interface Participant {
  readonly id: string;
  readonly roomId: string;
  readonly joinedAtMs: number;
  readonly sourceLanguage: LanguageCode;
  readonly targetLanguage: LanguageCode;
  readonly sink: ParticipantSink;
}

export interface ParticipantMetrics {
  readonly participantId: string;
  readonly sttLatencyMs?: number;
  readonly translationLatencyMs?: number;
  readonly ttsLatencyMs?: number;
  readonly pipelineLatencyMs?: number;
  readonly translatedSegments?: number;
  readonly skippedSegments?: number;
  readonly failedSegments?: number;
  readonly failedBranches?: number;
  readonly droppedSegments?: number;
  readonly inFlightPeak?: number;
}
