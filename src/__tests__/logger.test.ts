import assert from "node:assert/strict";
import test from "node:test";
import { isLogLevel, makeLogger } from "../server/logger.js";

test("makeLogger drops lines below the configured level", () => {
  const lines: string[] = [];
  const logger = makeLogger("warn", (line) => lines.push(line));

  logger.info("ignored");
  logger.warn("kept", { roomId: "room-abc123" });

  assert.equal(lines.length, 1);
  assert.match(lines[0] ?? "", /^\[\d{4}-\d{2}-\d{2}T[^\]]+\] WARN kept \{"roomId":"room-abc123"\}$/);
});

test("child loggers merge their bindings under the call context", () => {
  const lines: string[] = [];
  const logger = makeLogger("debug", (line) => lines.push(line)).child({ roomId: "r1", sequence: 1 });

  logger.debug("segment", { sequence: 2 });

  assert.match(lines[0] ?? "", / DEBUG segment \{"roomId":"r1","sequence":2\}$/);
});

test("isLogLevel only accepts known levels", () => {
  assert.equal(isLogLevel("error"), true);
  assert.equal(isLogLevel("verbose"), false);
  assert.equal(isLogLevel("toString"), false);
});
