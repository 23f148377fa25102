import { VideoMetadata } from "../entities/video-metadata";

/**
 * Platform subtitle codes that name the same language.
 * "-orig" marks the automatic track in the video's spoken language.
 */
export const LANGUAGE_VARIANTS: Record<string, string[]> = {
  "zh-TW": ["zh-TW", "zh-Hant", "zh"],
  "zh-CN": ["zh-CN", "zh-Hans", "zh"],
  en: ["en-orig", "en"],
  ja: ["ja-orig", "ja"],
  ko: ["ko-orig", "ko"],
  es: ["es-orig", "es"],
  fr: ["fr-orig", "fr"],
  de: ["de-orig", "de"],
  it: ["it-orig", "it"],
  pt: ["pt-orig", "pt"],
  ru: ["ru-orig", "ru"],
  ar: ["ar-orig", "ar"],
  hi: ["hi-orig", "hi"],
  th: ["th-orig", "th"],
  vi: ["vi-orig", "vi"],
  id: ["id-orig", "id"],
};

const MANUAL_PRIORITY: Array<[string, string]> = [
  ["zh-TW", "zh-TW"],
  ["zh-Hant", "zh-TW"],
  ["zh-CN", "zh-CN"],
  ["zh-Hans", "zh-CN"],
  ["zh", "zh-TW"],
  ["en-orig", "en"],
  ["en", "en"],
  ["ja-orig", "ja"],
  ["ja", "ja"],
  ["ko-orig", "ko"],
  ["ko", "ko"],
];

const PREFERRED_ORIGINALS = ["en-orig", "ja-orig", "ko-orig"];

const CHINESE_CODES: Array<[string, string]> = [
  ["zh-TW", "zh-TW"],
  ["zh-Hant", "zh-TW"],
  ["zh", "zh-TW"],
  ["zh-CN", "zh-CN"],
  ["zh-Hans", "zh-CN"],
];

export interface SubtitleLanguageChoice {
  language: string; // canonical code, e.g. "zh-TW"
  variants: string[]; // platform codes to try, in order
  isAutoGenerated: boolean;
}

export function languageVariants(language: string): string[] {
  return LANGUAGE_VARIANTS[language] ?? [language];
}

function stripOrig(code: string): string {
  return code.endsWith("-orig") ? code.slice(0, -"-orig".length) : code;
}

/**
 * Auto-detect order: manual tracks by priority, then automatic "-orig" tracks,
 * then automatic Chinese (only when no English track exists), then automatic
 * en/ja/ko, then whatever exists first. Defaults to "en".
 */
export function detectBestSubtitleLanguage(metadata: VideoMetadata): string {
  const manual = new Set(metadata.availableSubtitles);
  const automatic = new Set(metadata.automaticCaptions);

  for (const [code, canonical] of MANUAL_PRIORITY) {
    if (manual.has(code)) {
      return canonical;
    }
  }

  for (const code of PREFERRED_ORIGINALS) {
    if (automatic.has(code)) {
      return stripOrig(code);
    }
  }
  for (const code of metadata.automaticCaptions) {
    if (code.endsWith("-orig")) {
      return stripOrig(code);
    }
  }

  const hasEnglish = automatic.has("en") || automatic.has("en-orig");
  if (!hasEnglish) {
    for (const [code, canonical] of CHINESE_CODES) {
      if (automatic.has(code)) {
        return canonical;
      }
    }
  }

  for (const code of ["en", "ja", "ko"]) {
    if (automatic.has(code)) {
      return code;
    }
  }

  if (metadata.availableSubtitles.length > 0) {
    return metadata.availableSubtitles[0];
  }
  if (metadata.automaticCaptions.length > 0) {
    return stripOrig(metadata.automaticCaptions[0]);
  }
  return "en";
}

function isAutoGenerated(metadata: VideoMetadata, language: string): boolean {
  const variants = languageVariants(language);
  if (variants.some((code) => metadata.availableSubtitles.includes(code))) {
    return false;
  }
  return variants.some((code) => metadata.automaticCaptions.includes(code));
}

function isAvailable(metadata: VideoMetadata, language: string): boolean {
  const variants = languageVariants(language);
  return variants.some(
    (code) => metadata.availableSubtitles.includes(code) || metadata.automaticCaptions.includes(code)
  );
}

/**
 * Picks the subtitle language for a job. An explicit preference list wins in
 * order (first language with any track); otherwise auto-detect.
 */
export function selectSubtitleLanguage(
  metadata: VideoMetadata,
  preference?: string[]
): SubtitleLanguageChoice {
  const preferred = preference?.find((language) => isAvailable(metadata, language));
  const language = preferred ?? (preference && preference.length > 0 ? preference[0] : detectBestSubtitleLanguage(metadata));

  return {
    language,
    variants: languageVariants(language),
    isAutoGenerated: isAutoGenerated(metadata, language),
  };
}
