import assert from "node:assert/strict";
import test from "node:test";
import { loadConfig } from "../config.js";
import { makeProviders } from "../providers/factory.js";
import { makeLogger } from "../server/logger.js";

test("makeProviders falls back to stubs when keys are missing", () => {
  const providers = makeProviders(loadConfig({ TTS_PROVIDER: "stub" }), makeLogger("error"));
  assert.equal(providers.stt.name, "stt-stub");
  assert.equal(providers.translator.name, "translate-stub");
  assert.equal(providers.tts.name, "tts-stub");
});

test("makeProviders uses polly by default", () => {
  const providers = makeProviders(loadConfig({}), makeLogger("error"));
  assert.equal(providers.tts.name, "aws-polly-standard");
});

test("makeProviders enables cloud providers when keys are present", () => {
  const providers = makeProviders(
    loadConfig({
      GOOGLE_STT_API_KEY: "test-key",
      GOOGLE_TRANSLATE_API_KEY: "test-key",
      GOOGLE_TTS_API_KEY: "test-key",
      TTS_PROVIDER: "google",
    }),
    makeLogger("error"),
  );

  assert.equal(providers.stt.name, "google-stt");
  assert.equal(providers.translator.name, "google-translate-v2");
  assert.equal(providers.tts.name, "google-tts");
});

test("google tts without a key falls back to the stub", () => {
  const providers = makeProviders(loadConfig({ TTS_PROVIDER: "google" }), makeLogger("error"));
  assert.equal(providers.tts.name, "tts-stub");
});
