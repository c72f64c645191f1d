import { InferenceError, errorMessage, type InferenceStage } from "../domain/errors.js";
import type { SpeechToTextProvider, TranslationProvider, TtsProvider } from "../domain/providers.js";
import type {
  AudioSegment,
  LanguageCode,
  TranscriptionChunk,
  TranslationArtifact,
  TranslationChunk,
} from "../domain/types.js";
import type { Logger } from "../server/logger.js";

export type TranslationPipelineDeps = {
  readonly logger: Logger;
  readonly stt: SpeechToTextProvider;
  readonly translator: TranslationProvider;
  readonly tts: TtsProvider;
  readonly stageTimeoutMs: number;
  readonly minTranscriptChars?: number;
  readonly minTranscriptConfidence?: number;
};

export type SkipReason = "empty_transcript" | "low_confidence" | "no_listeners";

export type BranchFailure = {
  readonly language: LanguageCode;
  readonly stage: InferenceStage;
  readonly error: string;
  readonly timedOut: boolean;
};

export type PipelineTimings = {
  readonly sttLatencyMs: number;
  readonly translationLatencyMs: number;
  readonly ttsLatencyMs: number;
  readonly pipelineLatencyMs: number;
};

export type PipelineOutcome =
  | {
      readonly status: "skipped";
      readonly reason: SkipReason;
      readonly sttLatencyMs: number;
    }
  | {
      readonly status: "failed";
      readonly stage: "stt";
      readonly error: string;
      readonly timedOut: boolean;
      readonly sttLatencyMs: number;
    }
  | {
      readonly status: "translated";
      readonly transcript: TranscriptionChunk;
      readonly artifacts: readonly TranslationArtifact[];
      readonly failures: readonly BranchFailure[];
      readonly timings: PipelineTimings;
    };

type BranchResult =
  | {
      readonly ok: true;
      readonly artifact: TranslationArtifact;
      readonly translationLatencyMs: number;
      readonly ttsLatencyMs: number;
    }
  | { readonly ok: false; readonly failure: BranchFailure };

/**
 * Drives one segment through speech-to-text, then one translate → synthesize
 * branch per target language. Never rejects: failures come back in the outcome.
 */
export class TranslationPipeline {
  public constructor(private readonly deps: TranslationPipelineDeps) {}

  public async translateSegment(
    segment: AudioSegment,
    resolveTargets: () => readonly LanguageCode[],
  ): Promise<PipelineOutcome> {
    const log = this.deps.logger.child({
      participantId: segment.participantId,
      sequence: segment.sequence,
    });

    const sttStart = Date.now();
    let transcript: TranscriptionChunk | null;
    try {
      transcript = await this.runStage("stt", (signal) => this.deps.stt.transcribe(segment, signal));
    } catch (error) {
      const failure = toInferenceError("stt", error);
      log.warn("speech-to-text failed", { error: failure.message, timedOut: failure.timedOut });
      return {
        status: "failed",
        stage: "stt",
        error: failure.message,
        timedOut: failure.timedOut,
        sttLatencyMs: Date.now() - sttStart,
      };
    }
    const sttLatencyMs = Date.now() - sttStart;

    const text = transcript?.text.trim() ?? "";
    if (!transcript || text.length === 0 || text.length < (this.deps.minTranscriptChars ?? 0)) {
      log.debug("empty transcript", { sttLatencyMs });
      return { status: "skipped", reason: "empty_transcript", sttLatencyMs };
    }
    const minConfidence = this.deps.minTranscriptConfidence ?? 0;
    if (transcript.confidence !== undefined && transcript.confidence < minConfidence) {
      log.debug("transcript below confidence threshold", { confidence: transcript.confidence });
      return { status: "skipped", reason: "low_confidence", sttLatencyMs };
    }

    const targets = [...new Set(resolveTargets())];
    if (targets.length === 0) {
      return { status: "skipped", reason: "no_listeners", sttLatencyMs };
    }

    const cleaned: TranscriptionChunk = { ...transcript, text };
    const results = await Promise.all(targets.map((language) => this.runBranch(cleaned, language)));

    const artifacts: TranslationArtifact[] = [];
    const failures: BranchFailure[] = [];
    let translationLatencyMs = 0;
    let ttsLatencyMs = 0;
    for (const result of results) {
      if (result.ok) {
        artifacts.push(result.artifact);
        translationLatencyMs = Math.max(translationLatencyMs, result.translationLatencyMs);
        ttsLatencyMs = Math.max(ttsLatencyMs, result.ttsLatencyMs);
      } else {
        failures.push(result.failure);
        log.warn("translation branch failed", { ...result.failure });
      }
    }

    return {
      status: "translated",
      transcript: cleaned,
      artifacts,
      failures,
      timings: {
        sttLatencyMs,
        translationLatencyMs,
        ttsLatencyMs,
        pipelineLatencyMs: Date.now() - sttStart,
      },
    };
  }

  private async runBranch(
    transcript: TranscriptionChunk,
    language: LanguageCode,
  ): Promise<BranchResult> {
    let stage: InferenceStage = "translate";
    try {
      const translateStart = Date.now();
      const translation =
        transcript.language === language
          ? passThrough(transcript)
          : await this.runStage("translate", (signal) =>
              this.deps.translator.translate(transcript, language, signal),
            );
      const translationLatencyMs = Date.now() - translateStart;
      if (!translation || !translation.text.trim()) {
        return { ok: false, failure: emptyResult(language, "translate") };
      }

      stage = "tts";
      const ttsStart = Date.now();
      const audio = await this.runStage("tts", (signal) =>
        this.deps.tts.synthesize({ ...translation, targetLanguage: language }, signal),
      );
      const ttsLatencyMs = Date.now() - ttsStart;
      if (!audio || audio.payload.length === 0) {
        return { ok: false, failure: emptyResult(language, "tts") };
      }

      return {
        ok: true,
        translationLatencyMs,
        ttsLatencyMs,
        artifact: {
          speakerId: transcript.participantId,
          sequence: transcript.sequence,
          language,
          originalText: transcript.text,
          translatedText: translation.text,
          audio,
        },
      };
    } catch (error) {
      const failure = toInferenceError(stage, error);
      return {
        ok: false,
        failure: { language, stage, error: failure.message, timedOut: failure.timedOut },
      };
    }
  }

  private async runStage<T>(stage: InferenceStage, run: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Settles the race before the provider observes the abort.
        reject(new InferenceError(stage, `timed out after ${this.deps.stageTimeoutMs}ms`, true));
        controller.abort();
      }, this.deps.stageTimeoutMs);
    });
    try {
      return await Promise.race([run(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function passThrough(transcript: TranscriptionChunk): TranslationChunk {
  return {
    participantId: transcript.participantId,
    sequence: transcript.sequence,
    text: transcript.text,
    sourceLanguage: transcript.language,
    targetLanguage: transcript.language,
    timestampMs: Date.now(),
  };
}

function emptyResult(language: LanguageCode, stage: InferenceStage): BranchFailure {
  return { language, stage, error: "empty result", timedOut: false };
}

function toInferenceError(stage: InferenceStage, error: unknown): InferenceError {
  if (error instanceof InferenceError) return error;
  return new InferenceError(stage, errorMessage(error));
}
