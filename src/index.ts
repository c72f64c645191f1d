import { loadConfig } from "./config.js";
import { errorMessage } from "./domain/errors.js";
import { TranslationOrchestrator } from "./pipeline/orchestrator.js";
import { RoomRegistry } from "./pipeline/room-registry.js";
import { TranslationPipeline } from "./pipeline/translation-pipeline.js";
import { makeProviders } from "./providers/factory.js";
import { makeLogger } from "./server/logger.js";
import { startHttpServer } from "./server/http.js";

function main(): void {
  const config = loadConfig(process.env);
  const logger = makeLogger(config.logLevel);
  const providers = makeProviders(config, logger);

  const registry = new RoomRegistry({
    emptyRoomTtlMs: config.emptyRoomTtlMs,
    unclaimedRoomTtlMs: config.unclaimedRoomTtlMs,
    logger,
  });

  const orchestrator = new TranslationOrchestrator({
    logger,
    registry,
    pipeline: new TranslationPipeline({
      logger,
      stt: providers.stt,
      translator: providers.translator,
      tts: providers.tts,
      stageTimeoutMs: config.stageTimeoutMs,
      minTranscriptChars: config.minTranscriptChars,
      minTranscriptConfidence: config.minTranscriptConfidence,
    }),
    maxInFlightSegments: config.maxInFlightSegments,
    echoToSpeaker: config.echoToSpeaker,
  });

  const running = startHttpServer(config.port, logger, orchestrator, {
    translator: providers.translator,
    segmentation: {
      format: { encoding: config.encoding, sampleRateHz: config.sampleRateHz },
      maxSegmentMs: config.segmentMaxMs,
      minSegmentMs: config.segmentMinMs,
      silenceGapMs: config.silenceGapMs,
      silenceThreshold: config.silenceThreshold,
      inactivityFlushMs: config.inactivityFlushMs,
    },
    defaultTargetLanguage: config.defaultTargetLanguage,
    defaultSourceLanguage: config.defaultSourceLanguage,
    outboundMaxQueue: config.outboundMaxQueue,
    sendDrainTimeoutMs: config.sendDrainTimeoutMs,
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info("shutdown signal received", { signal, sessions: running.sessions.size });
    running
      .close()
      .then(() => orchestrator.idle())
      .catch((error: unknown) => {
        logger.error("failed to close http server", { error: errorMessage(error) });
        process.exitCode = 1;
      })
      .finally(() => {
        registry.close();
        process.exit();
      });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main();
