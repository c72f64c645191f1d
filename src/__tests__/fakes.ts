import { setImmediate as tick } from "node:timers/promises";
import type { SpeechToTextProvider, TranslationProvider, TtsProvider } from "../domain/providers.js";
import type {
  AudioSegment,
  LanguageCode,
  ParticipantSink,
  ServerMessage,
  TranscriptionChunk,
  TranslationArtifact,
  TranslationChunk,
  TtsChunk,
} from "../domain/types.js";

/** 16-bit PCM at a constant level of 8000, well above any silence threshold. */
export function tone(ms: number, sampleRateHz = 16000): Buffer {
  const samples = Math.round((sampleRateHz * ms) / 1000);
  const out = Buffer.alloc(samples * 2);
  for (let i = 0; i < samples; i += 1) {
    out.writeInt16LE(8000, i * 2);
  }
  return out;
}

export function silence(ms: number, sampleRateHz = 16000): Buffer {
  return Buffer.alloc(Math.round((sampleRateHz * ms) / 1000) * 2);
}

export function segment(
  participantId: string,
  sequence: number,
  sourceLanguage: LanguageCode = "en",
): AudioSegment {
  return {
    participantId,
    sequence,
    sourceLanguage,
    durationMs: 100,
    flushReason: "silence",
    createdAtMs: Date.now(),
    encoding: "pcm_s16le",
    sampleRateHz: 16000,
    payload: tone(100),
  };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Lets pending promise chains and immediates run. */
export async function settle(rounds = 5): Promise<void> {
  for (let i = 0; i < rounds; i += 1) {
    await tick();
  }
}

export class RecordingSink implements ParticipantSink {
  public readonly delivered: TranslationArtifact[] = [];
  public readonly notices: ServerMessage[] = [];

  public deliver(artifact: TranslationArtifact): void {
    this.delivered.push(artifact);
  }

  public notify(message: ServerMessage): void {
    this.notices.push(message);
  }
}

/** Transcribes every segment as `text #<sequence>` after an optional per-sequence delay. */
export class ScriptedStt implements SpeechToTextProvider {
  public readonly name = "scripted-stt";
  public calls = 0;

  public constructor(
    private readonly delays: Readonly<Record<number, number>> = {},
    private readonly text = "text",
  ) {}

  public async transcribe(input: AudioSegment): Promise<TranscriptionChunk | null> {
    this.calls += 1;
    const wait = this.delays[input.sequence];
    if (wait) await delay(wait);
    return {
      participantId: input.participantId,
      sequence: input.sequence,
      text: `${this.text} #${input.sequence}`,
      language: input.sourceLanguage,
      timestampMs: Date.now(),
    };
  }
}

/** Prefixes the text with the target language, e.g. `fr:hello`. */
export class PrefixTranslator implements TranslationProvider {
  public readonly name = "prefix-translator";
  public readonly requested: LanguageCode[] = [];

  public constructor(private readonly failFor: ReadonlySet<LanguageCode> = new Set()) {}

  public async translate(
    chunk: TranscriptionChunk,
    targetLanguage: LanguageCode,
  ): Promise<TranslationChunk | null> {
    this.requested.push(targetLanguage);
    if (this.failFor.has(targetLanguage)) {
      throw new Error(`no route to ${targetLanguage}`);
    }
    return {
      participantId: chunk.participantId,
      sequence: chunk.sequence,
      text: `${targetLanguage}:${chunk.text}`,
      sourceLanguage: chunk.language,
      targetLanguage,
      timestampMs: Date.now(),
    };
  }
}

export class ByteTts implements TtsProvider {
  public readonly name = "byte-tts";

  public async synthesize(chunk: TranslationChunk): Promise<TtsChunk | null> {
    return {
      participantId: chunk.participantId,
      sequence: chunk.sequence,
      language: chunk.targetLanguage,
      encoding: "pcm_s16le",
      sampleRateHz: 16000,
      payload: Buffer.from([chunk.sequence & 0xff, 0x00]),
      timestampMs: Date.now(),
    };
  }
}
