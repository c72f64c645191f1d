import assert from "node:assert/strict";
import test from "node:test";
import type { AudioSegment } from "../domain/types.js";
import { AudioChunkBuffer, type ChunkBufferOptions } from "../pipeline/chunk-buffer.js";
import { delay, silence, tone } from "./fakes.js";

function makeBuffer(overrides: Partial<ChunkBufferOptions> = {}) {
  const segments: AudioSegment[] = [];
  const buffer = new AudioChunkBuffer({
    participantId: "p1",
    sourceLanguage: "en",
    format: { encoding: "pcm_s16le", sampleRateHz: 16000 },
    maxSegmentMs: 100,
    minSegmentMs: 20,
    silenceGapMs: 40,
    silenceThreshold: 0.01,
    inactivityFlushMs: 0,
    onSegment: (segment) => segments.push(segment),
    ...overrides,
  });
  return { buffer, segments };
}

test("audio longer than the maximum is cut into full-length segments", () => {
  const { buffer, segments } = makeBuffer();

  buffer.append(tone(250));

  assert.deepEqual(
    segments.map((s) => [s.sequence, s.durationMs, s.flushReason, s.payload.length]),
    [
      [1, 100, "max_duration", 3200],
      [2, 100, "max_duration", 3200],
    ],
  );
  assert.equal(buffer.bufferedMs, 50);
});

test("a silence gap after speech flushes the segment", () => {
  const { buffer, segments } = makeBuffer();

  buffer.append(tone(50));
  buffer.append(silence(20));
  assert.equal(segments.length, 0);
  buffer.append(silence(20));

  assert.equal(segments.length, 1);
  assert.equal(segments[0]?.flushReason, "silence");
  assert.equal(segments[0]?.durationMs, 90);
  assert.equal(segments[0]?.participantId, "p1");
  assert.equal(segments[0]?.sourceLanguage, "en");
  assert.equal(buffer.bufferedMs, 0);
});

test("pure silence is discarded without consuming a sequence number", () => {
  const { buffer, segments } = makeBuffer();

  buffer.append(silence(40));
  buffer.append(tone(30));
  const closing = buffer.close();

  assert.equal(segments.length, 1);
  assert.equal(closing, segments[0]);
  assert.equal(closing?.sequence, 1);
  assert.equal(closing?.flushReason, "close");
  assert.equal(closing?.durationMs, 30);
});

test("segments shorter than the minimum are dropped on a silence flush", () => {
  const { buffer, segments } = makeBuffer({ minSegmentMs: 80 });

  buffer.append(tone(10));
  buffer.append(silence(40));

  assert.equal(segments.length, 0);
  assert.equal(buffer.emittedSegments, 0);
  assert.equal(buffer.bufferedMs, 0);
});

test("a pause in incoming audio flushes what is buffered", async () => {
  const { buffer, segments } = makeBuffer({ inactivityFlushMs: 20 });

  buffer.append(tone(30));
  await delay(80);

  assert.equal(segments.length, 1);
  assert.equal(segments[0]?.flushReason, "inactivity");
  assert.equal(segments[0]?.durationMs, 30);
});

test("close flushes once and ignores later audio", () => {
  const { buffer, segments } = makeBuffer();

  buffer.append(tone(30));
  assert.equal(buffer.close()?.sequence, 1);
  assert.equal(buffer.close(), undefined);
  buffer.append(tone(30));

  assert.equal(segments.length, 1);
  assert.equal(buffer.bufferedMs, 0);
});

test("emitted segments are frozen", () => {
  const { buffer, segments } = makeBuffer();

  buffer.append(tone(100));

  assert.equal(Object.isFrozen(segments[0]), true);
});

function level(ms: number, value: number): Buffer {
  const out = Buffer.alloc(Math.round((16000 * ms) / 1000) * 2);
  for (let i = 0; i < out.length; i += 2) {
    out.writeInt16LE(value, i);
  }
  return out;
}

function appendInPieces(buffer: AudioChunkBuffer, audio: Buffer, size: number): void {
  for (let offset = 0; offset < audio.length; offset += size) {
    buffer.append(audio.subarray(offset, offset + size));
  }
}

test("quiet audio split mid-sample is still treated as silence", () => {
  const { buffer, segments } = makeBuffer();

  appendInPieces(buffer, level(100, 128), 3);
  buffer.close();

  assert.deepEqual(segments, []);
});

test("fragments that split samples are rejoined into whole samples", () => {
  const { buffer, segments } = makeBuffer();

  appendInPieces(buffer, tone(30), 3);
  buffer.append(Buffer.from([0x01]));
  const closing = buffer.close();

  assert.equal(segments.length, 1);
  assert.equal(closing?.durationMs, 30);
  assert.deepEqual(closing?.payload, tone(30));
});
