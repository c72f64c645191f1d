export type InferenceStage = "stt" | "translate" | "tts";

export class RoomNotFoundError extends Error {
  public readonly code = "room_not_found";

  public constructor(public readonly roomId: string) {
    super(`Room not found: ${roomId}`);
    this.name = "RoomNotFoundError";
  }
}

export class InferenceError extends Error {
  public readonly code = "inference_failed";

  public constructor(
    public readonly stage: InferenceStage,
    message: string,
    public readonly timedOut = false,
  ) {
    super(`${stage}: ${message}`);
    this.name = "InferenceError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
