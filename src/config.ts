import { normalizeLanguage } from "./domain/languages.js";
import type { AudioEncoding, LanguageCode } from "./domain/types.js";
import { isLogLevel, type LogLevel } from "./server/logger.js";

export type TtsProviderName = "polly" | "google" | "stub";

export interface AppConfig {
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly sampleRateHz: number;
  readonly encoding: AudioEncoding;
  readonly segmentMaxMs: number;
  readonly segmentMinMs: number;
  readonly silenceGapMs: number;
  readonly silenceThreshold: number;
  readonly inactivityFlushMs: number;
  readonly maxInFlightSegments: number;
  readonly stageTimeoutMs: number;
  readonly sendDrainTimeoutMs: number;
  readonly outboundMaxQueue: number;
  readonly emptyRoomTtlMs: number;
  readonly unclaimedRoomTtlMs: number;
  readonly defaultTargetLanguage: LanguageCode;
  readonly defaultSourceLanguage: LanguageCode;
  readonly echoToSpeaker: boolean;
  readonly minTranscriptChars: number;
  readonly minTranscriptConfidence: number;
  readonly googleSttApiKey?: string;
  readonly googleSttModel?: string;
  readonly googleTranslateApiKey?: string;
  readonly ttsProvider: TtsProviderName;
  readonly googleTtsApiKey?: string;
  readonly awsRegion: string;
  readonly pollyVoices: Readonly<Partial<Record<LanguageCode, string>>>;
  readonly stubSttText?: string;
}

function readNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: string,
  isValid: (value: number) => boolean,
): number {
  const value = Number(env[name] ?? fallback);
  if (!Number.isFinite(value) || !isValid(value)) {
    throw new Error(`Invalid ${name}: ${env[name]}`);
  }
  return value;
}

function readLanguage(env: NodeJS.ProcessEnv, name: string, fallback: LanguageCode): LanguageCode {
  const raw = env[name];
  if (raw === undefined) return fallback;
  const language = normalizeLanguage(raw);
  if (!language) {
    throw new Error(`Invalid ${name}: ${raw}`);
  }
  return language;
}

function readBoolean(env: NodeJS.ProcessEnv, name: string): boolean {
  const raw = env[name];
  if (raw === undefined || raw === "" || raw === "0" || raw === "false") return false;
  if (raw === "1" || raw === "true") return true;
  throw new Error(`Invalid ${name}: ${raw}`);
}

/** Parses `en:Joanna,fr:Lea` into a language → voice map. */
export function parseVoiceMap(raw: string | undefined): Partial<Record<LanguageCode, string>> {
  const out: Partial<Record<LanguageCode, string>> = {};
  if (!raw) return out;
  for (const entry of raw.split(",")) {
    const [code, voice] = entry.split(":").map((part) => part.trim());
    const language = normalizeLanguage(code);
    if (!language || !voice) {
      throw new Error(`Invalid POLLY_VOICES entry: ${entry}`);
    }
    out[language] = voice;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const port = readNumber(env, "PORT", "8080", (v) => v > 0);

  const logLevel = env.LOG_LEVEL ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid LOG_LEVEL: ${env.LOG_LEVEL}`);
  }

  const encoding = env.AUDIO_ENCODING ?? "pcm_s16le";
  if (encoding !== "pcm_s16le" && encoding !== "pcm_f32le") {
    throw new Error(`Invalid AUDIO_ENCODING: ${env.AUDIO_ENCODING}`);
  }

  const ttsProvider = env.TTS_PROVIDER ?? "polly";
  if (ttsProvider !== "polly" && ttsProvider !== "google" && ttsProvider !== "stub") {
    throw new Error(`Invalid TTS_PROVIDER: ${env.TTS_PROVIDER}`);
  }

  const segmentMaxMs = readNumber(env, "SEGMENT_MAX_MS", "3000", (v) => v >= 100);
  const segmentMinMs = readNumber(env, "SEGMENT_MIN_MS", "300", (v) => v >= 0);
  if (segmentMinMs > segmentMaxMs) {
    throw new Error(`Invalid SEGMENT_MIN_MS: ${env.SEGMENT_MIN_MS} exceeds SEGMENT_MAX_MS`);
  }

  return {
    port,
    logLevel,
    sampleRateHz: readNumber(env, "AUDIO_SAMPLE_RATE_HZ", "16000", (v) => v >= 8000),
    encoding,
    segmentMaxMs,
    segmentMinMs,
    silenceGapMs: readNumber(env, "SEGMENT_SILENCE_GAP_MS", "700", (v) => v > 0),
    silenceThreshold: readNumber(env, "SILENCE_RMS_THRESHOLD", "0.01", (v) => v >= 0 && v < 1),
    inactivityFlushMs: readNumber(env, "INACTIVITY_FLUSH_MS", "1000", (v) => v >= 0),
    maxInFlightSegments: readNumber(env, "MAX_IN_FLIGHT_SEGMENTS", "4", (v) => v >= 1),
    stageTimeoutMs: readNumber(env, "STAGE_TIMEOUT_MS", "8000", (v) => v >= 100),
    sendDrainTimeoutMs: readNumber(env, "SEND_DRAIN_TIMEOUT_MS", "2000", (v) => v >= 0),
    outboundMaxQueue: readNumber(env, "OUTBOUND_MAX_QUEUE", "64", (v) => v >= 1),
    emptyRoomTtlMs: readNumber(env, "EMPTY_ROOM_TTL_MS", "60000", (v) => v >= 0),
    unclaimedRoomTtlMs: readNumber(env, "UNCLAIMED_ROOM_TTL_MS", "600000", (v) => v >= 0),
    defaultTargetLanguage: readLanguage(env, "DEFAULT_TARGET_LANGUAGE", "es"),
    defaultSourceLanguage: readLanguage(env, "DEFAULT_SOURCE_LANGUAGE", "en"),
    echoToSpeaker: readBoolean(env, "ECHO_TO_SPEAKER"),
    minTranscriptChars: readNumber(env, "MIN_TRANSCRIPT_CHARS", "2", (v) => v >= 0),
    minTranscriptConfidence: readNumber(
      env,
      "MIN_TRANSCRIPT_CONFIDENCE",
      "0",
      (v) => v >= 0 && v <= 1,
    ),
    googleSttApiKey: env.GOOGLE_STT_API_KEY,
    googleSttModel: env.GOOGLE_STT_MODEL,
    googleTranslateApiKey: env.GOOGLE_TRANSLATE_API_KEY,
    ttsProvider,
    googleTtsApiKey: env.GOOGLE_TTS_API_KEY,
    awsRegion: env.AWS_REGION ?? "us-west-2",
    pollyVoices: parseVoiceMap(env.POLLY_VOICES),
    stubSttText: env.STUB_STT_TEXT,
  };
}
