import type { AudioEncoding, AudioFormat } from "../domain/types.js";

export function bytesPerSample(encoding: AudioEncoding): number {
  return encoding === "pcm_f32le" ? 4 : 2;
}

export function bytesForMs(format: AudioFormat, ms: number): number {
  const width = bytesPerSample(format.encoding);
  const samples = Math.max(1, Math.round((format.sampleRateHz * ms) / 1000));
  return samples * width;
}

export function msForBytes(format: AudioFormat, bytes: number): number {
  const samples = Math.floor(bytes / bytesPerSample(format.encoding));
  return (samples * 1000) / format.sampleRateHz;
}

/** Root-mean-square level normalized to 0..1; trailing partial samples are ignored. */
export function rms(payload: Buffer, encoding: AudioEncoding): number {
  const width = bytesPerSample(encoding);
  const samples = Math.floor(payload.length / width);
  if (samples === 0) return 0;

  let sum = 0;
  for (let i = 0; i < samples; i += 1) {
    const value =
      encoding === "pcm_f32le" ? payload.readFloatLE(i * width) : payload.readInt16LE(i * width) / 32768;
    sum += value * value;
  }
  return Math.sqrt(sum / samples);
}

/** Converts float samples to 16-bit PCM, which most speech services expect. */
export function toPcm16(payload: Buffer, encoding: AudioEncoding): Buffer {
  if (encoding === "pcm_s16le") return payload;

  const samples = Math.floor(payload.length / 4);
  const out = Buffer.alloc(samples * 2);
  for (let i = 0; i < samples; i += 1) {
    const clamped = Math.max(-1, Math.min(1, payload.readFloatLE(i * 4)));
    out.writeInt16LE(Math.round(clamped * 32767), i * 2);
  }
  return out;
}
