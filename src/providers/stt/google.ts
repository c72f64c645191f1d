import { InferenceError, errorMessage } from "../../domain/errors.js";
import { getLanguage, normalizeLanguage } from "../../domain/languages.js";
import type { SpeechToTextProvider } from "../../domain/providers.js";
import type { AudioSegment, TranscriptionChunk } from "../../domain/types.js";
import { toPcm16 } from "../../pipeline/pcm.js";

type GoogleSttOptions = {
  readonly apiKey: string;
  readonly model?: string;
  readonly endpoint?: string;
};

type GoogleSttResponse = {
  results?: Array<{
    alternatives?: Array<{ transcript?: string; confidence?: number }>;
    languageCode?: string;
  }>;
};

export class StubSpeechToTextProvider implements SpeechToTextProvider {
  public readonly name = "stt-stub";
  public constructor(private readonly text: string = "") {}

  public async transcribe(segment: AudioSegment): Promise<TranscriptionChunk | null> {
    return {
      participantId: segment.participantId,
      sequence: segment.sequence,
      text: this.text,
      language: segment.sourceLanguage,
      timestampMs: Date.now(),
    };
  }
}

/** Recognizes one whole segment per request through `speech:recognize`. */
export class GoogleSpeechProvider implements SpeechToTextProvider {
  public readonly name = "google-stt";

  public constructor(private readonly opts: GoogleSttOptions) {}

  public async transcribe(
    segment: AudioSegment,
    signal?: AbortSignal,
  ): Promise<TranscriptionChunk | null> {
    if (segment.payload.length === 0) return null;

    const languageCode = getLanguage(segment.sourceLanguage)?.locale ?? segment.sourceLanguage;
    const endpoint =
      this.opts.endpoint ??
      `https://speech.googleapis.com/v1/speech:recognize?key=${encodeURIComponent(this.opts.apiKey)}`;

    const payload = {
      config: {
        encoding: "LINEAR16",
        sampleRateHertz: segment.sampleRateHz,
        languageCode,
        model: this.opts.model ?? "latest_short",
        enableAutomaticPunctuation: true,
      },
      audio: {
        content: toPcm16(segment.payload, segment.encoding).toString("base64"),
      },
    };

    let response: Response;
    try {
      response = await fetch(endpoint, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(payload),
        signal,
      });
    } catch (error) {
      throw new InferenceError("stt", errorMessage(error));
    }
    if (!response.ok) {
      throw new InferenceError("stt", `google speech responded ${response.status}`);
    }

    let body: GoogleSttResponse;
    try {
      body = (await response.json()) as GoogleSttResponse;
    } catch {
      throw new InferenceError("stt", "google speech returned malformed json");
    }

    const results = body.results ?? [];
    const transcript = results
      .map((result) => result.alternatives?.[0]?.transcript?.trim() ?? "")
      .filter((text) => text.length > 0)
      .join(" ");
    if (!transcript) return null;

    const confidences = results
      .map((result) => result.alternatives?.[0]?.confidence)
      .filter((value): value is number => typeof value === "number");
    const detected = normalizeLanguage(results[0]?.languageCode);

    return {
      participantId: segment.participantId,
      sequence: segment.sequence,
      text: transcript,
      language: detected ?? segment.sourceLanguage,
      confidence: confidences.length > 0 ? Math.min(...confidences) : undefined,
      timestampMs: Date.now(),
    };
  }
}
