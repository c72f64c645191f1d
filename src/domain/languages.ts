export const SUPPORTED_LANGUAGES = [
  { code: "en", name: "English", locale: "en-US", pollyVoice: "Joanna" },
  { code: "es", name: "Spanish", locale: "es-US", pollyVoice: "Lupe" },
  { code: "fr", name: "French", locale: "fr-FR", pollyVoice: "Lea" },
  { code: "de", name: "German", locale: "de-DE", pollyVoice: "Vicki" },
  { code: "it", name: "Italian", locale: "it-IT", pollyVoice: "Bianca" },
  { code: "pt", name: "Portuguese", locale: "pt-BR", pollyVoice: "Camila" },
  { code: "nl", name: "Dutch", locale: "nl-NL", pollyVoice: "Lotte" },
  { code: "pl", name: "Polish", locale: "pl-PL", pollyVoice: "Ewa" },
  { code: "ru", name: "Russian", locale: "ru-RU", pollyVoice: "Tatyana" },
  { code: "tr", name: "Turkish", locale: "tr-TR", pollyVoice: "Filiz" },
  { code: "ar", name: "Arabic", locale: "ar-XA", pollyVoice: "Zeina" },
  { code: "hi", name: "Hindi", locale: "hi-IN", pollyVoice: "Aditi" },
  { code: "ja", name: "Japanese", locale: "ja-JP", pollyVoice: "Mizuki" },
  { code: "ko", name: "Korean", locale: "ko-KR", pollyVoice: "Seoyeon" },
  { code: "zh", name: "Chinese", locale: "cmn-CN", pollyVoice: "Zhiyu" },
  { code: "sv", name: "Swedish", locale: "sv-SE", pollyVoice: "Astrid" },
] as const;

export type Language = (typeof SUPPORTED_LANGUAGES)[number];

export type LanguageCode = Language["code"];

const LANGUAGE_MAP = new Map<string, Language>(
  SUPPORTED_LANGUAGES.map((language): [string, Language] => [language.code, language]),
);

export function isSupportedLanguage(code: string): code is LanguageCode {
  return LANGUAGE_MAP.has(code);
}

export function getLanguage(code: LanguageCode): Language | undefined {
  return LANGUAGE_MAP.get(code);
}

export function languageNames(): Record<string, string> {
  return Object.fromEntries(SUPPORTED_LANGUAGES.map((language) => [language.code, language.name]));
}

/** Accepts `fr`, `FR` or `fr-CA` and returns the supported base code. */
export function normalizeLanguage(input: string | null | undefined): LanguageCode | undefined {
  if (!input) return undefined;
  const base = input.trim().toLowerCase().split(/[-_]/)[0];
  if (!base || !isSupportedLanguage(base)) return undefined;
  return base;
}
