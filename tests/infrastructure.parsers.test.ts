import { describe, expect, it } from "vitest";
import { parseVerboseTranscription } from "../src/infrastructure/openai/openai.transcription.provider";
import { assertSafeSegment } from "../src/infrastructure/storage/local.artifact.storage";
import { parseGoogleResponse, toGoogleLanguage } from "../src/infrastructure/translation/google-web.translator";
import { formatSelector, parseVideoInfo } from "../src/infrastructure/video/ytdlp.video.source";

describe("parseVideoInfo", () => {
  it("maps yt-dlp fields", () => {
    const info = parseVideoInfo({
      id: "abc123",
      title: "Cooking Rice",
      duration: 245.5,
      uploader: "Kitchen Channel",
      subtitles: { en: [], live_chat: [] },
      automatic_captions: { "en-orig": [], fr: [] },
    });

    expect(info).toEqual({
      id: "abc123",
      title: "Cooking Rice",
      durationSec: 245.5,
      channel: "Kitchen Channel",
      availableSubtitles: ["en"],
      automaticCaptions: ["en-orig", "fr"],
    });
  });

  it("falls back to the id for the title", () => {
    expect(parseVideoInfo({ display_id: "xyz" }).title).toBe("xyz");
  });

  it("rejects output without an id", () => {
    expect(() => parseVideoInfo({ title: "No id" })).toThrow("yt-dlp returned no video id");
    expect(() => parseVideoInfo([])).toThrow("yt-dlp returned malformed video information");
  });

  it("caps the format at the requested height", () => {
    expect(formatSelector("480")).toBe(
      "bestvideo[height<=480][ext=mp4]+bestaudio[ext=m4a]/best[height<=480][ext=mp4]/best[height<=480]/best"
    );
  });
});

describe("parseGoogleResponse", () => {
  it("joins the translated segments", () => {
    expect(parseGoogleResponse([[["Hola. ", "Hello. "], ["Adiós", "Bye"]], null, "en"])).toBe("Hola. Adiós");
  });

  it("rejects unexpected shapes", () => {
    expect(() => parseGoogleResponse({ text: "Hola" })).toThrow("Unexpected translation response shape");
    expect(() => parseGoogleResponse([[]])).toThrow("Translation response contained no text");
  });

  it("maps Chinese codes", () => {
    expect(toGoogleLanguage("zh-Hant")).toBe("zh-TW");
    expect(toGoogleLanguage("zh")).toBe("zh-CN");
    expect(toGoogleLanguage("ja")).toBe("ja");
  });
});

describe("parseVerboseTranscription", () => {
  it("reads segments and converts the language name", () => {
    const result = parseVerboseTranscription(
      {
        language: "english",
        segments: [
          { start: 0, end: 2.5, text: " Hello there. " },
          { start: 2.5, text: "No end given." },
          { start: 4, end: 5 },
        ],
      },
      "en"
    );

    expect(result).toEqual({
      language: "en",
      segments: [
        { startSec: 0, endSec: 2.5, text: "Hello there." },
        { startSec: 2.5, endSec: 2.5, text: "No end given." },
      ],
    });
  });

  it("uses the fallback language when none is reported", () => {
    expect(parseVerboseTranscription({ segments: [] }, "ja").language).toBe("ja");
  });
});

describe("assertSafeSegment", () => {
  it("accepts plain names and rejects traversal", () => {
    expect(() => assertSafeSegment("artifact name", "frame_0001.jpg")).not.toThrow();
    expect(() => assertSafeSegment("artifact name", "../x")).toThrow("Invalid artifact name: ../x");
    expect(() => assertSafeSegment("job id", "a/b")).toThrow("Invalid job id: a/b");
  });
});
