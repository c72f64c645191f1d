import assert from "node:assert/strict";
import test from "node:test";
import { OutboundQueue, framesOf, type OutboundEntry } from "../session/outbound-queue.js";

function control(text: string): OutboundEntry {
  return { kind: "control", frame: { kind: "json", text } };
}

function translation(sequence: number): OutboundEntry {
  return {
    kind: "translation",
    caption: { kind: "json", text: `caption ${sequence}` },
    audio: { kind: "audio", payload: Buffer.from([sequence]) },
  };
}

test("OutboundQueue enqueue/dequeue is FIFO", () => {
  const queue = new OutboundQueue(10);
  queue.enqueue(control("first"));
  queue.enqueue(translation(1));

  assert.deepEqual(queue.dequeue(), control("first"));
  assert.deepEqual(queue.dequeue(), translation(1));
  assert.equal(queue.dequeue(), undefined);
});

test("a translation entry writes its caption before its audio", () => {
  assert.deepEqual(framesOf(translation(2)), [
    { kind: "json", text: "caption 2" },
    { kind: "audio", payload: Buffer.from([2]) },
  ]);
});

test("OutboundQueue drops the oldest translation when over the limit", () => {
  const queue = new OutboundQueue(2);
  queue.enqueue(translation(1));
  queue.enqueue(translation(2));
  const result = queue.enqueue(translation(3));

  assert.deepEqual(result, { queueSize: 2, droppedOldest: true });
  assert.equal(queue.droppedCount, 1);
  assert.deepEqual(queue.dequeue(), translation(2));
});

test("control entries are never evicted and do not count toward the limit", () => {
  const queue = new OutboundQueue(1);
  queue.enqueue(control("count"));
  queue.enqueue(translation(1));
  queue.enqueue(control("pong"));
  const result = queue.enqueue(translation(2));

  assert.deepEqual(result, { queueSize: 3, droppedOldest: true });
  assert.deepEqual(
    [queue.dequeue(), queue.dequeue(), queue.dequeue(), queue.dequeue()],
    [control("count"), control("pong"), translation(2), undefined],
  );
});

test("a dequeued translation frees its slot", () => {
  const queue = new OutboundQueue(1);
  queue.enqueue(translation(1));
  queue.dequeue();

  assert.deepEqual(queue.enqueue(translation(2)), { queueSize: 1, droppedOldest: false });
});

test("OutboundQueue clear reports discarded entries", () => {
  const queue = new OutboundQueue(4);
  queue.enqueue(control("1"));
  queue.enqueue(translation(1));

  assert.equal(queue.clear(), 2);
  assert.equal(queue.size, 0);
});
