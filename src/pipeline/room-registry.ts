import { randomUUID } from "node:crypto";
import { RoomNotFoundError } from "../domain/errors.js";
import type { LanguageCode, Participant, ParticipantSink } from "../domain/types.js";
import type { Logger } from "../server/logger.js";

export type RoomRegistryOptions = {
  /** Grace period before an emptied room is deleted; 0 deletes it immediately. */
  readonly emptyRoomTtlMs: number;
  /** How long a created room waits for its first participant; 0 keeps it forever. */
  readonly unclaimedRoomTtlMs: number;
  readonly logger?: Logger;
  readonly makeRoomId?: () => string;
};

export type NewParticipant = {
  readonly id?: string;
  readonly sourceLanguage: LanguageCode;
  readonly targetLanguage: LanguageCode;
  readonly sink: ParticipantSink;
};

type Room = {
  readonly id: string;
  readonly createdAtMs: number;
  readonly participants: Map<string, Participant>;
  reapTimer?: NodeJS.Timeout;
};

const MAX_ID_ATTEMPTS = 16;

function defaultRoomId(): string {
  return `room-${randomUUID().replace(/-/g, "").slice(0, 6)}`;
}

/**
 * Owns the room → participants mapping. Every mutation goes through a method
 * here and runs to completion on the event loop, so joins and leaves on a
 * room never interleave; reads return copies.
 */
export class RoomRegistry {
  private readonly rooms = new Map<string, Room>();

  public constructor(private readonly opts: RoomRegistryOptions) {}

  public createRoom(): string {
    const makeId = this.opts.makeRoomId ?? defaultRoomId;
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt += 1) {
      const id = makeId();
      if (this.rooms.has(id)) continue;

      const room: Room = { id, createdAtMs: Date.now(), participants: new Map() };
      this.rooms.set(id, room);
      if (this.opts.unclaimedRoomTtlMs > 0) {
        this.scheduleReap(room, this.opts.unclaimedRoomTtlMs);
      }
      this.opts.logger?.info("room created", { roomId: id });
      return id;
    }
    throw new Error("Room id space exhausted");
  }

  public hasRoom(roomId: string): boolean {
    return this.rooms.has(roomId);
  }

  public join(roomId: string, input: NewParticipant): Participant {
    const room = this.requireRoom(roomId);
    this.cancelReap(room);

    const participant: Participant = {
      id: input.id ?? randomUUID(),
      roomId,
      joinedAtMs: Date.now(),
      sourceLanguage: input.sourceLanguage,
      targetLanguage: input.targetLanguage,
      sink: input.sink,
    };
    room.participants.set(participant.id, participant);
    return participant;
  }

  /** Idempotent; returns whether the participant was a member. */
  public leave(roomId: string, participantId: string): boolean {
    const room = this.rooms.get(roomId);
    if (!room || !room.participants.delete(participantId)) return false;

    if (room.participants.size === 0) {
      if (this.opts.emptyRoomTtlMs === 0) {
        this.deleteRoom(room, "empty");
      } else {
        this.scheduleReap(room, this.opts.emptyRoomTtlMs);
      }
    }
    return true;
  }

  public participantCount(roomId: string): number {
    return this.requireRoom(roomId).participants.size;
  }

  /** Snapshot of the room's members; empty for an unknown room. */
  public members(roomId: string): readonly Participant[] {
    const room = this.rooms.get(roomId);
    if (!room) return [];
    return [...room.participants.values()].map((participant) => ({ ...participant }));
  }

  public targetLanguages(roomId: string, excludeParticipantId?: string): LanguageCode[] {
    const languages = new Set<LanguageCode>();
    for (const participant of this.members(roomId)) {
      if (participant.id === excludeParticipantId) continue;
      languages.add(participant.targetLanguage);
    }
    return [...languages];
  }

  public updateTargetLanguage(
    roomId: string,
    participantId: string,
    targetLanguage: LanguageCode,
  ): Participant | undefined {
    const room = this.rooms.get(roomId);
    const existing = room?.participants.get(participantId);
    if (!room || !existing) return undefined;

    const updated: Participant = { ...existing, targetLanguage };
    room.participants.set(participantId, updated);
    return { ...updated };
  }

  public close(): void {
    for (const room of this.rooms.values()) {
      this.cancelReap(room);
    }
    this.rooms.clear();
  }

  private requireRoom(roomId: string): Room {
    const room = this.rooms.get(roomId);
    if (!room) throw new RoomNotFoundError(roomId);
    return room;
  }

  private scheduleReap(room: Room, delayMs: number): void {
    this.cancelReap(room);
    room.reapTimer = setTimeout(() => {
      room.reapTimer = undefined;
      if (room.participants.size === 0 && this.rooms.get(room.id) === room) {
        this.deleteRoom(room, "idle");
      }
    }, delayMs);
    room.reapTimer.unref();
  }

  private cancelReap(room: Room): void {
    if (!room.reapTimer) return;
    clearTimeout(room.reapTimer);
    room.reapTimer = undefined;
  }

  private deleteRoom(room: Room, reason: "empty" | "idle"): void {
    this.cancelReap(room);
    this.rooms.delete(room.id);
    this.opts.logger?.info("room deleted", {
      roomId: room.id,
      reason,
      ageMs: Date.now() - room.createdAtMs,
    });
  }
}
