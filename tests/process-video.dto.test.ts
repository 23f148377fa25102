import { describe, expect, it } from "vitest";
import { parseProcessVideoRequest, parseVideoInfoRequest } from "../src/presentation/dto/process-video.dto";

const URL = "https://video.example.com/watch?v=abc";

function errorOf(body: unknown): string | undefined {
  const result = parseProcessVideoRequest(body);
  return result.ok ? undefined : result.error;
}

describe("parseProcessVideoRequest", () => {
  it("fills in defaults", () => {
    const result = parseProcessVideoRequest({ url: URL });

    expect(result).toEqual({
      ok: true,
      value: {
        url: URL,
        quality: "720",
        translateTo: null,
        translationEngine: "machine",
        screenshotPosition: "middle",
        screenshotOffset: 0,
        generateOutline: false,
        useAiTranscription: false,
      },
    });
  });

  it("defaults the engine to ai when a provider is named", () => {
    const result = parseProcessVideoRequest({ url: URL, aiProvider: "claude", translateTo: "zh-tw" });

    expect(result.ok && result.value.translationEngine).toBe("ai");
    expect(result.ok && result.value.translateTo).toBe("zh-TW");
  });

  it("accepts numeric quality and platform track codes", () => {
    const result = parseProcessVideoRequest({
      url: URL,
      quality: 1080,
      subtitleLanguagePreference: ["en-orig", "zh-Hant"],
      screenshotOffset: -60,
      screenshotPosition: "end",
    });

    expect(result.ok && result.value.quality).toBe("1080");
    expect(result.ok && result.value.subtitleLanguagePreference).toEqual(["en-orig", "zh-Hant"]);
    expect(result.ok && result.value.screenshotOffset).toBe(-60);
    expect(result.ok && result.value.screenshotPosition).toBe("end");
  });

  it("treats an empty preference list as auto-detect", () => {
    const result = parseProcessVideoRequest({ url: URL, subtitleLanguagePreference: [] });

    expect(result.ok && result.value.subtitleLanguagePreference).toBeUndefined();
  });

  it("rejects bad urls", () => {
    expect(errorOf({})).toBe("url is required and must be a string");
    expect(errorOf({ url: "not a url" })).toBe("url must be a valid URL");
    expect(errorOf({ url: "ftp://video.example.com/a" })).toBe("url must use http or https");
  });

  it("rejects invalid options", () => {
    expect(errorOf(null)).toBe("Request body must be a JSON object");
    expect(errorOf({ url: URL, quality: "4k" })).toBe("quality must be one of: 360, 480, 720, 1080");
    expect(errorOf({ url: URL, subtitleLanguagePreference: ["en", 3] })).toBe(
      "subtitleLanguagePreference must be an array of language codes"
    );
    expect(errorOf({ url: URL, translateTo: "xx" })).toBe("translateTo is not a valid language code: xx");
    expect(errorOf({ url: URL, aiProvider: "gpt" })).toBe("aiProvider must be one of: openai, claude, gemini, ollama");
    expect(errorOf({ url: URL, screenshotOffset: 61 })).toBe("screenshotOffset must be a number between -60 and 60");
    expect(errorOf({ url: URL, generateOutline: "yes" })).toBe("generateOutline and useAiTranscription must be booleans");
    expect(errorOf({ url: URL, apiKey: 42 })).toBe("aiModel, apiKey and transcriptionApiKey must be strings");
  });
});

describe("parseVideoInfoRequest", () => {
  it("normalizes the url", () => {
    expect(parseVideoInfoRequest({ url: "https://video.example.com" })).toEqual({
      ok: true,
      value: { url: "https://video.example.com/" },
    });
  });
});
