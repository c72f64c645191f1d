import { errorMessage } from "../domain/errors.js";
import type {
  AudioSegment,
  LanguageCode,
  Participant,
  ParticipantMetrics,
  ParticipantSink,
  TranslationArtifact,
} from "../domain/types.js";
import type { Logger } from "../server/logger.js";
import { DeliverySequencer } from "./delivery-sequencer.js";
import type { RoomRegistry } from "./room-registry.js";
import type { PipelineOutcome, TranslationPipeline } from "./translation-pipeline.js";

export type OrchestratorDeps = {
  readonly logger: Logger;
  readonly registry: RoomRegistry;
  readonly pipeline: TranslationPipeline;
  readonly maxInFlightSegments: number;
  /** Deliver a speaker's own utterances back to them in their target language. */
  readonly echoToSpeaker?: boolean;
};

export type JoinRequest = {
  readonly participantId?: string;
  readonly sourceLanguage: LanguageCode;
  readonly targetLanguage: LanguageCode;
  readonly sink: ParticipantSink;
};

export type SubmitResult = "accepted" | "overloaded" | "rejected";

type SourceState = {
  readonly roomId: string;
  readonly sequencer: DeliverySequencer<TranslationArtifact>;
  inFlight: number;
  left: boolean;
};

type CountField =
  | "translatedSegments"
  | "skippedSegments"
  | "failedSegments"
  | "failedBranches"
  | "droppedSegments";

/**
 * Runs translation jobs for every connected speaker. Jobs run concurrently,
 * within and across speakers; each speaker's results pass through a
 * DeliverySequencer so listeners hear that speaker's utterances in order.
 */
export class TranslationOrchestrator {
  private readonly sources = new Map<string, SourceState>();
  private readonly metrics = new Map<string, ParticipantMetrics>();
  private readonly jobs = new Set<Promise<void>>();

  public constructor(private readonly deps: OrchestratorDeps) {}

  public createRoom(): string {
    return this.deps.registry.createRoom();
  }

  public hasRoom(roomId: string): boolean {
    return this.deps.registry.hasRoom(roomId);
  }

  public participantCount(roomId: string): number {
    return this.deps.registry.participantCount(roomId);
  }

  /** Throws RoomNotFoundError for an unknown room. */
  public join(roomId: string, request: JoinRequest): Participant {
    const participant = this.deps.registry.join(roomId, {
      id: request.participantId,
      sourceLanguage: request.sourceLanguage,
      targetLanguage: request.targetLanguage,
      sink: request.sink,
    });

    this.sources.set(participant.id, {
      roomId,
      inFlight: 0,
      left: false,
      sequencer: new DeliverySequencer((artifacts) =>
        this.dispatch(roomId, participant.id, artifacts),
      ),
    });
    this.metrics.set(participant.id, { participantId: participant.id });

    this.deps.logger.info("participant joined", {
      roomId,
      participantId: participant.id,
      targetLanguage: participant.targetLanguage,
    });
    this.broadcastParticipantCount(roomId);
    return participant;
  }

  public leave(roomId: string, participantId: string): void {
    if (!this.deps.registry.leave(roomId, participantId)) return;

    const source = this.sources.get(participantId);
    if (source) {
      source.left = true;
      this.releaseSourceIfIdle(participantId, source);
    }

    this.deps.logger.info("participant left", {
      roomId,
      participantId,
      metrics: this.metrics.get(participantId),
    });
    this.metrics.delete(participantId);
    this.broadcastParticipantCount(roomId);
  }

  public updateTargetLanguage(
    roomId: string,
    participantId: string,
    targetLanguage: LanguageCode,
  ): Participant | undefined {
    const updated = this.deps.registry.updateTargetLanguage(roomId, participantId, targetLanguage);
    if (updated) {
      this.deps.logger.info("target language updated", { roomId, participantId, targetLanguage });
    }
    return updated;
  }

  /**
   * Starts a job for the segment unless the speaker already has
   * `maxInFlightSegments` jobs running, in which case it is dropped.
   */
  public submitSegment(segment: AudioSegment): SubmitResult {
    const source = this.sources.get(segment.participantId);
    if (!source) {
      this.deps.logger.warn("segment from unknown participant", {
        participantId: segment.participantId,
        sequence: segment.sequence,
      });
      return "rejected";
    }

    if (source.inFlight >= this.deps.maxInFlightSegments) {
      source.sequencer.skip(segment.sequence);
      this.incrementMetric(segment.participantId, "droppedSegments");
      this.deps.logger.warn("segment dropped, too many in flight", {
        roomId: source.roomId,
        participantId: segment.participantId,
        sequence: segment.sequence,
        inFlight: source.inFlight,
      });
      return "overloaded";
    }

    source.inFlight += 1;
    this.trackMetrics(segment.participantId, {
      inFlightPeak: Math.max(this.metrics.get(segment.participantId)?.inFlightPeak ?? 0, source.inFlight),
    });

    const job = this.runJob(source, segment).finally(() => {
      this.jobs.delete(job);
      source.inFlight -= 1;
      this.releaseSourceIfIdle(segment.participantId, source);
    });
    this.jobs.add(job);
    return "accepted";
  }

  public getMetrics(participantId: string): ParticipantMetrics | undefined {
    return this.metrics.get(participantId);
  }

  public inFlight(participantId: string): number {
    return this.sources.get(participantId)?.inFlight ?? 0;
  }

  /** Resolves once every job started so far has settled. */
  public async idle(): Promise<void> {
    while (this.jobs.size > 0) {
      await Promise.allSettled([...this.jobs]);
    }
  }

  private async runJob(source: SourceState, segment: AudioSegment): Promise<void> {
    const { participantId, sequence } = segment;
    let outcome: PipelineOutcome;
    try {
      outcome = await this.deps.pipeline.translateSegment(segment, () =>
        this.deps.registry.targetLanguages(
          source.roomId,
          this.deps.echoToSpeaker ? undefined : participantId,
        ),
      );
    } catch (error) {
      this.deps.logger.error("translation job crashed", {
        participantId,
        sequence,
        error: errorMessage(error),
      });
      this.incrementMetric(participantId, "failedSegments");
      source.sequencer.skip(sequence);
      return;
    }

    this.recordOutcome(participantId, outcome);
    source.sequencer.settle(sequence, outcome.status === "translated" ? outcome.artifacts : []);
  }

  private dispatch(roomId: string, speakerId: string, artifacts: readonly TranslationArtifact[]): void {
    const members = this.deps.registry.members(roomId);
    for (const artifact of artifacts) {
      for (const member of members) {
        if (member.targetLanguage !== artifact.language) continue;
        if (member.id === speakerId && !this.deps.echoToSpeaker) continue;
        try {
          member.sink.deliver(artifact);
        } catch (error) {
          this.deps.logger.warn("delivery failed", {
            roomId,
            speakerId,
            recipientId: member.id,
            error: errorMessage(error),
          });
        }
      }
    }
  }

  private broadcastParticipantCount(roomId: string): void {
    const members = this.deps.registry.members(roomId);
    for (const member of members) {
      member.sink.notify({ type: "participant_count", room_id: roomId, count: members.length });
    }
  }

  private releaseSourceIfIdle(participantId: string, source: SourceState): void {
    if (source.left && source.inFlight === 0 && this.sources.get(participantId) === source) {
      this.sources.delete(participantId);
    }
  }

  private recordOutcome(participantId: string, outcome: PipelineOutcome): void {
    if (outcome.status === "skipped") {
      this.trackMetrics(participantId, { sttLatencyMs: outcome.sttLatencyMs });
      this.incrementMetric(participantId, "skippedSegments");
      return;
    }
    if (outcome.status === "failed") {
      this.trackMetrics(participantId, { sttLatencyMs: outcome.sttLatencyMs });
      this.incrementMetric(participantId, "failedSegments");
      return;
    }

    this.trackMetrics(participantId, outcome.timings);
    this.incrementMetric(participantId, "translatedSegments");
    for (let i = 0; i < outcome.failures.length; i += 1) {
      this.incrementMetric(participantId, "failedBranches");
    }
    this.deps.logger.debug("translated segment", {
      participantId,
      sequence: outcome.transcript.sequence,
      transcript: outcome.transcript.text,
      languages: outcome.artifacts.map((artifact) => artifact.language),
      pipelineLatencyMs: outcome.timings.pipelineLatencyMs,
    });
  }

  private trackMetrics(participantId: string, delta: Omit<ParticipantMetrics, "participantId">): void {
    const previous = this.metrics.get(participantId);
    if (!previous) return;
    this.metrics.set(participantId, { ...previous, ...delta });
  }

  private incrementMetric(participantId: string, field: CountField): void {
    const current = this.metrics.get(participantId);
    if (!current) return;
    this.metrics.set(participantId, { ...current, [field]: (current[field] ?? 0) + 1 });
  }
}
