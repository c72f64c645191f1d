import { PollyClient, SynthesizeSpeechCommand, type VoiceId } from "@aws-sdk/client-polly";
import { InferenceError, errorMessage } from "../../domain/errors.js";
import { getLanguage } from "../../domain/languages.js";
import type { TtsProvider } from "../../domain/providers.js";
import type { LanguageCode, TranslationChunk, TtsChunk } from "../../domain/types.js";

// Polly's pcm output only comes in 8000 and 16000 Hz.
const POLLY_SAMPLE_RATE_HZ = 16000;

async function toBuffer(audioStream: unknown): Promise<Buffer> {
  if (!audioStream || typeof audioStream !== "object") {
    return Buffer.alloc(0);
  }

  if ("transformToByteArray" in audioStream && typeof audioStream.transformToByteArray === "function") {
    const bytes = await audioStream.transformToByteArray();
    return Buffer.from(bytes);
  }

  if (Symbol.asyncIterator in audioStream) {
    const chunks: Buffer[] = [];
    for await (const chunk of audioStream as AsyncIterable<Uint8Array>) {
      chunks.push(Buffer.from(chunk));
    }
    return Buffer.concat(chunks);
  }

  return Buffer.alloc(0);
}

/** Emits a few bytes of silence so the delivery path runs without credentials. */
export class StubTtsProvider implements TtsProvider {
  public readonly name = "tts-stub";

  public async synthesize(chunk: TranslationChunk): Promise<TtsChunk | null> {
    if (!chunk.text.trim()) return null;

    return {
      participantId: chunk.participantId,
      sequence: chunk.sequence,
      language: chunk.targetLanguage,
      encoding: "pcm_s16le",
      sampleRateHz: POLLY_SAMPLE_RATE_HZ,
      payload: Buffer.from([0x00, 0x00, 0x00, 0x00]),
      timestampMs: Date.now(),
    };
  }
}

export type PollyOptions = {
  readonly region: string;
  /** Overrides the built-in voice for a language. */
  readonly voices?: Readonly<Partial<Record<LanguageCode, string>>>;
  readonly client?: PollyClient;
};

export class PollyStandardProvider implements TtsProvider {
  public readonly name = "aws-polly-standard";
  private readonly client: PollyClient;

  public constructor(private readonly opts: PollyOptions) {
    this.client = opts.client ?? new PollyClient({ region: opts.region });
  }

  public voiceFor(language: LanguageCode): string | undefined {
    return this.opts.voices?.[language] ?? getLanguage(language)?.pollyVoice;
  }

  public async synthesize(chunk: TranslationChunk): Promise<TtsChunk | null> {
    if (!chunk.text.trim()) return null;

    const voiceId = this.voiceFor(chunk.targetLanguage);
    if (!voiceId) {
      throw new InferenceError("tts", `no polly voice for ${chunk.targetLanguage}`);
    }

    let payload: Buffer;
    try {
      const command = new SynthesizeSpeechCommand({
        Engine: "standard",
        OutputFormat: "pcm",
        SampleRate: String(POLLY_SAMPLE_RATE_HZ),
        Text: chunk.text,
        TextType: "text",
        VoiceId: voiceId as VoiceId,
      });
      const out = await this.client.send(command);
      payload = await toBuffer(out.AudioStream);
    } catch (error) {
      throw new InferenceError("tts", errorMessage(error));
    }

    if (payload.length === 0) return null;

    return {
      participantId: chunk.participantId,
      sequence: chunk.sequence,
      language: chunk.targetLanguage,
      encoding: "pcm_s16le",
      sampleRateHz: POLLY_SAMPLE_RATE_HZ,
      payload,
      timestampMs: Date.now(),
    };
  }
}
