import { InferenceError, errorMessage } from "../../domain/errors.js";
import { getLanguage } from "../../domain/languages.js";
import type { TtsProvider } from "../../domain/providers.js";
import type { LanguageCode, TranslationChunk, TtsChunk } from "../../domain/types.js";

type GoogleTtsOptions = {
  readonly apiKey: string;
  readonly sampleRateHz: number;
  /** Optional voice name per language; otherwise the service picks one for the locale. */
  readonly voices?: Readonly<Partial<Record<LanguageCode, string>>>;
  readonly endpoint?: string;
};

type GoogleTtsResponse = {
  audioContent?: string;
};

export class GoogleTtsProvider implements TtsProvider {
  public readonly name = "google-tts";

  public constructor(private readonly opts: GoogleTtsOptions) {}

  public async synthesize(chunk: TranslationChunk, signal?: AbortSignal): Promise<TtsChunk | null> {
    if (!chunk.text.trim()) return null;

    const languageCode = getLanguage(chunk.targetLanguage)?.locale ?? chunk.targetLanguage;
    const voiceName = this.opts.voices?.[chunk.targetLanguage];

    const payload = {
      input: { text: chunk.text },
      voice: voiceName ? { languageCode, name: voiceName } : { languageCode },
      audioConfig: { audioEncoding: "LINEAR16", sampleRateHertz: this.opts.sampleRateHz },
    };
    const endpoint =
      this.opts.endpoint ??
      `https://texttospeech.googleapis.com/v1/text:synthesize?key=${encodeURIComponent(this.opts.apiKey)}`;

    let response: Response;
    try {
      response = await fetch(endpoint, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(payload),
        signal,
      });
    } catch (error) {
      throw new InferenceError("tts", errorMessage(error));
    }
    if (!response.ok) {
      throw new InferenceError("tts", `google tts responded ${response.status}`);
    }

    let body: GoogleTtsResponse;
    try {
      body = (await response.json()) as GoogleTtsResponse;
    } catch {
      throw new InferenceError("tts", "google tts returned malformed json");
    }

    if (!body.audioContent) return null;

    const audio = Buffer.from(body.audioContent, "base64");
    if (audio.length === 0) return null;

    return {
      participantId: chunk.participantId,
      sequence: chunk.sequence,
      language: chunk.targetLanguage,
      encoding: "pcm_s16le",
      sampleRateHz: this.opts.sampleRateHz,
      payload: audio,
      timestampMs: Date.now(),
    };
  }
}
