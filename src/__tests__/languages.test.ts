import assert from "node:assert/strict";
import test from "node:test";
import {
  SUPPORTED_LANGUAGES,
  getLanguage,
  isSupportedLanguage,
  languageNames,
  normalizeLanguage,
} from "../domain/languages.js";
import type { LanguageCode } from "../domain/types.js";

test("normalizeLanguage narrows regional and upper-case tags to a supported code", () => {
  const codes: Array<LanguageCode | undefined> = [
    normalizeLanguage("fr"),
    normalizeLanguage("FR"),
    normalizeLanguage(" pt-BR "),
    normalizeLanguage("zh_TW"),
  ];

  assert.deepEqual(codes, ["fr", "fr", "pt", "zh"]);
});

test("normalizeLanguage rejects unknown and empty input", () => {
  assert.equal(normalizeLanguage("klingon"), undefined);
  assert.equal(normalizeLanguage(""), undefined);
  assert.equal(normalizeLanguage(null), undefined);
  assert.equal(isSupportedLanguage("xx"), false);
});

test("every supported language has a name and locale", () => {
  const names = languageNames();

  assert.equal(Object.keys(names).length, SUPPORTED_LANGUAGES.length);
  assert.equal(names.ja, "Japanese");
  assert.equal(getLanguage("zh")?.locale, "cmn-CN");
  assert.equal(getLanguage("es")?.pollyVoice, "Lupe");
});
