import assert from "node:assert/strict";
import test from "node:test";
import { DeliverySequencer } from "../pipeline/delivery-sequencer.js";

function recorder() {
  const released: Array<[number, readonly string[]]> = [];
  const sequencer = new DeliverySequencer<string>((items, sequence) => {
    released.push([sequence, items]);
  });
  return { released, sequencer };
}

test("DeliverySequencer holds later results until earlier ones settle", () => {
  const { released, sequencer } = recorder();

  sequencer.settle(3, ["c"]);
  sequencer.settle(2, ["b"]);
  assert.deepEqual(released, []);
  assert.equal(sequencer.pending, 2);

  sequencer.settle(1, ["a"]);

  assert.deepEqual(released, [
    [1, ["a"]],
    [2, ["b"]],
    [3, ["c"]],
  ]);
  assert.equal(sequencer.expectedSequence, 4);
  assert.equal(sequencer.pending, 0);
});

test("skipped sequences unblock later ones without releasing anything", () => {
  const { released, sequencer } = recorder();

  sequencer.settle(2, ["b"]);
  sequencer.skip(1);
  sequencer.settle(3, []);
  sequencer.settle(4, ["d"]);

  assert.deepEqual(released, [
    [2, ["b"]],
    [4, ["d"]],
  ]);
});

test("settle refuses stale and duplicate sequences", () => {
  const { released, sequencer } = recorder();

  assert.equal(sequencer.settle(1, ["a"]), true);
  assert.equal(sequencer.settle(1, ["again"]), false);
  assert.equal(sequencer.settle(3, ["c"]), true);
  assert.equal(sequencer.settle(3, ["c2"]), false);

  assert.deepEqual(released, [[1, ["a"]]]);
});
