import type { AppConfig } from "../config.js";
import type { Logger } from "../server/logger.js";
import type { SpeechToTextProvider, TranslationProvider, TtsProvider } from "../domain/providers.js";
import { GoogleSpeechProvider, StubSpeechToTextProvider } from "./stt/google.js";
import { GoogleTranslationProvider, StubTranslationProvider } from "./translation/google.js";
import { GoogleTtsProvider } from "./tts/google.js";
import { PollyStandardProvider, StubTtsProvider } from "./tts/polly.js";

export type ProviderBundle = {
  readonly stt: SpeechToTextProvider;
  readonly translator: TranslationProvider;
  readonly tts: TtsProvider;
};

export function makeProviders(config: AppConfig, logger: Logger): ProviderBundle {
  const stt = config.googleSttApiKey
    ? new GoogleSpeechProvider({ apiKey: config.googleSttApiKey, model: config.googleSttModel })
    : new StubSpeechToTextProvider(config.stubSttText ?? "");

  const translator = config.googleTranslateApiKey
    ? new GoogleTranslationProvider({ apiKey: config.googleTranslateApiKey })
    : new StubTranslationProvider();

  let tts: TtsProvider;
  if (config.ttsProvider === "google") {
    tts = config.googleTtsApiKey
      ? new GoogleTtsProvider({ apiKey: config.googleTtsApiKey, sampleRateHz: config.sampleRateHz })
      : new StubTtsProvider();
  } else if (config.ttsProvider === "stub") {
    tts = new StubTtsProvider();
  } else {
    tts = new PollyStandardProvider({ region: config.awsRegion, voices: config.pollyVoices });
  }

  logger.info("provider selection", {
    stt: stt.name,
    translation: translator.name,
    tts: tts.name,
  });

  return { stt, translator, tts };
}
