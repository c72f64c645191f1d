import type {
  AudioSegment,
  LanguageCode,
  TranscriptionChunk,
  TranslationChunk,
  TtsChunk,
} from "./types.js";

// Implementations throw InferenceError on transport failure and return null
// when the service produced nothing usable.

export interface SpeechToTextProvider {
  readonly name: string;
  transcribe(segment: AudioSegment, signal?: AbortSignal): Promise<TranscriptionChunk | null>;
}

export interface TranslationProvider {
  readonly name: string;
  translate(
    chunk: TranscriptionChunk,
    targetLanguage: LanguageCode,
    signal?: AbortSignal,
  ): Promise<TranslationChunk | null>;
}

export interface TtsProvider {
  readonly name: string;
  synthesize(chunk: TranslationChunk, signal?: AbortSignal): Promise<TtsChunk | null>;
}
