import { describe, expect, it } from "vitest";
import { VideoMetadata } from "../src/domain/entities/video-metadata";
import { languageName } from "../src/domain/utils/language-names";
import { validateAndNormalizeLanguage } from "../src/domain/utils/language.validator";
import { detectBestSubtitleLanguage, selectSubtitleLanguage } from "../src/domain/utils/subtitle-language";

function metadata(availableSubtitles: string[], automaticCaptions: string[]): VideoMetadata {
  return { id: "v1", title: "Video", availableSubtitles, automaticCaptions };
}

describe("detectBestSubtitleLanguage", () => {
  it("prefers manual tracks by priority", () => {
    expect(detectBestSubtitleLanguage(metadata(["en", "zh-Hant"], []))).toBe("zh-TW");
  });

  it("takes an automatic original-language track next", () => {
    expect(detectBestSubtitleLanguage(metadata([], ["fr-orig", "fr", "en"]))).toBe("fr");
  });

  it("picks automatic Chinese only when there is no English", () => {
    expect(detectBestSubtitleLanguage(metadata([], ["zh-Hans", "ja"]))).toBe("zh-CN");
    expect(detectBestSubtitleLanguage(metadata([], ["zh-Hans", "en"]))).toBe("en");
  });

  it("falls back to the first manual track, then to English", () => {
    expect(detectBestSubtitleLanguage(metadata(["de"], []))).toBe("de");
    expect(detectBestSubtitleLanguage(metadata([], []))).toBe("en");
  });
});

describe("selectSubtitleLanguage", () => {
  it("uses the first preferred language that has any track", () => {
    expect(selectSubtitleLanguage(metadata(["en"], ["es-orig"]), ["fr", "es"])).toEqual({
      language: "es",
      variants: ["es-orig", "es"],
      isAutoGenerated: true,
    });
  });

  it("keeps the first preference when none is available", () => {
    expect(selectSubtitleLanguage(metadata(["en"], []), ["fr"])).toEqual({
      language: "fr",
      variants: ["fr-orig", "fr"],
      isAutoGenerated: false,
    });
  });

  it("auto-detects without a preference", () => {
    expect(selectSubtitleLanguage(metadata(["en"], []))).toEqual({
      language: "en",
      variants: ["en-orig", "en"],
      isAutoGenerated: false,
    });
  });
});

describe("validateAndNormalizeLanguage", () => {
  it("normalizes case per subtag", () => {
    expect(validateAndNormalizeLanguage("EN")).toBe("en");
    expect(validateAndNormalizeLanguage("zh-hant")).toBe("zh-Hant");
    expect(validateAndNormalizeLanguage("pt-br")).toBe("pt-BR");
    expect(validateAndNormalizeLanguage("es-419")).toBe("es-419");
  });

  it("rejects unknown codes", () => {
    expect(validateAndNormalizeLanguage("xx")).toBeUndefined();
    expect(validateAndNormalizeLanguage("english")).toBeUndefined();
    expect(validateAndNormalizeLanguage("")).toBeUndefined();
  });
});

describe("languageName", () => {
  it("falls back to the base language, then the code", () => {
    expect(languageName("zh-TW")).toBe("Traditional Chinese (繁體中文)");
    expect(languageName("pt-BR")).toBe("Portuguese");
    expect(languageName("sw")).toBe("sw");
  });
});
