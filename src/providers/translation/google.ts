import { InferenceError, errorMessage } from "../../domain/errors.js";
import type { TranslationProvider } from "../../domain/providers.js";
import type { LanguageCode, TranscriptionChunk, TranslationChunk } from "../../domain/types.js";

/** Returns the transcript unchanged, labelled with the requested language. */
export class StubTranslationProvider implements TranslationProvider {
  public readonly name = "translate-stub";

  public async translate(
    chunk: TranscriptionChunk,
    targetLanguage: LanguageCode,
  ): Promise<TranslationChunk | null> {
    if (!chunk.text.trim()) return null;

    return {
      participantId: chunk.participantId,
      sequence: chunk.sequence,
      text: chunk.text,
      sourceLanguage: chunk.language,
      targetLanguage,
      timestampMs: Date.now(),
    };
  }
}

export type GoogleTranslateOptions = {
  readonly apiKey: string;
  readonly endpoint?: string;
};

export class GoogleTranslationProvider implements TranslationProvider {
  public readonly name = "google-translate-v2";

  public constructor(private readonly opts: GoogleTranslateOptions) {}

  public async translate(
    chunk: TranscriptionChunk,
    targetLanguage: LanguageCode,
    signal?: AbortSignal,
  ): Promise<TranslationChunk | null> {
    if (!chunk.text.trim()) return null;

    const translated = await this.translateText(chunk.text, chunk.language, targetLanguage, signal);
    if (!translated) return null;

    return {
      participantId: chunk.participantId,
      sequence: chunk.sequence,
      text: translated,
      sourceLanguage: chunk.language,
      targetLanguage,
      timestampMs: Date.now(),
    };
  }

  public async translateText(
    text: string,
    sourceLanguage: LanguageCode,
    targetLanguage: LanguageCode,
    signal?: AbortSignal,
  ): Promise<string | undefined> {
    const endpoint =
      this.opts.endpoint ??
      `https://translation.googleapis.com/language/translate/v2?key=${encodeURIComponent(this.opts.apiKey)}`;

    let response: Response;
    try {
      response = await fetch(endpoint, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({
          q: text,
          source: sourceLanguage,
          target: targetLanguage,
          format: "text",
        }),
        signal,
      });
    } catch (error) {
      throw new InferenceError("translate", errorMessage(error));
    }
    if (!response.ok) {
      throw new InferenceError("translate", `google translate responded ${response.status}`);
    }

    try {
      const data = (await response.json()) as {
        data?: { translations?: Array<{ translatedText?: string }> };
      };
      return data.data?.translations?.[0]?.translatedText;
    } catch {
      throw new InferenceError("translate", "google translate returned malformed json");
    }
  }
}
