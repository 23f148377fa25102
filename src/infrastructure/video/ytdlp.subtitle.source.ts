import { readdir, readFile } from "fs/promises";
import path from "path";
import { VideoHandle, VideoMetadata } from "../../domain/entities/video-metadata";
import { ISubtitleSource, SubtitleTrack } from "../../domain/interfaces/isubtitle.source";
import { selectSubtitleLanguage } from "../../domain/utils/subtitle-language";
import { runProcess } from "./process.runner";

export class YtDlpSubtitleSource implements ISubtitleSource {
  constructor(private readonly ytDlpPath: string) {}

  async fetch(
    videoHandle: VideoHandle,
    metadata: VideoMetadata,
    languagePreference?: string[],
    options: { signal?: AbortSignal } = {}
  ): Promise<SubtitleTrack | null> {
    const choice = selectSubtitleLanguage(metadata, languagePreference);
    const published = new Set([...metadata.availableSubtitles, ...metadata.automaticCaptions]);
    const variants = choice.variants.filter((code) => published.has(code));
    if (variants.length === 0) {
      console.log(`[YtDlpSubtitleSource] No ${choice.language} subtitles published for ${metadata.id}`);
      return null;
    }

    const dir = path.dirname(videoHandle.filePath);
    await runProcess(
      this.ytDlpPath,
      [
        "--skip-download",
        "--no-playlist",
        "--write-subs",
        "--write-auto-subs",
        "--sub-langs",
        variants.join(","),
        "--sub-format",
        "srt/vtt/best",
        "--convert-subs",
        "srt",
        "--output",
        path.join(dir, "subtitles.%(ext)s"),
        "--no-warnings",
        videoHandle.sourceUrl,
      ],
      { signal: options.signal }
    );

    const files = new Set(await readdir(dir));
    for (const code of variants) {
      const name = `subtitles.${code}.srt`;
      if (files.has(name)) {
        const rawText = await readFile(path.join(dir, name), "utf-8");
        console.log(`[YtDlpSubtitleSource] Using ${name}`);
        return {
          rawText,
          language: choice.language,
          isAutoGenerated: !metadata.availableSubtitles.includes(code),
        };
      }
    }
    return null;
  }
}
