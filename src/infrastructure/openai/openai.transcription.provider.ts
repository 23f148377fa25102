import OpenAI, { toFile } from "openai";
import { VideoHandle } from "../../domain/entities/video-metadata";
import {
  ITranscriptionProvider,
  TranscriptionOptions,
  TranscriptionResult,
  TranscriptionSegment,
} from "../../domain/interfaces/itranscription.provider";
import { baseLanguage } from "../../domain/utils/language.validator";
import { runProcess } from "../video/process.runner";

// Whisper rejects uploads above 25 MB
const MAX_UPLOAD_BYTES = 25 * 1024 * 1024;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Reads segments out of a verbose_json transcription response. */
export function parseVerboseTranscription(response: unknown, fallbackLanguage: string): TranscriptionResult {
  if (!isRecord(response)) {
    throw new Error("Transcription response is not an object");
  }
  const rawSegments = Array.isArray(response.segments) ? response.segments : [];
  const segments: TranscriptionSegment[] = [];
  for (const segment of rawSegments) {
    if (!isRecord(segment) || typeof segment.text !== "string") continue;
    const startSec = typeof segment.start === "number" ? segment.start : 0;
    const endSec = typeof segment.end === "number" ? segment.end : startSec;
    segments.push({ startSec, endSec, text: segment.text.trim() });
  }

  const language = typeof response.language === "string" ? response.language : fallbackLanguage;
  return { language: normalizeWhisperLanguage(language), segments };
}

// verbose_json reports names ("english"); the rest of the pipeline uses codes
const WHISPER_LANGUAGE_CODES: Record<string, string> = {
  english: "en",
  chinese: "zh-TW",
  japanese: "ja",
  korean: "ko",
  spanish: "es",
  french: "fr",
  german: "de",
  italian: "it",
  portuguese: "pt",
  russian: "ru",
  arabic: "ar",
  hindi: "hi",
  thai: "th",
  vietnamese: "vi",
  indonesian: "id",
};

export function normalizeWhisperLanguage(language: string): string {
  return WHISPER_LANGUAGE_CODES[language.toLowerCase()] ?? language;
}

export interface OpenAIWhisperConfig {
  apiKey?: string;
  ffmpegPath: string;
}

export class OpenAIWhisperTranscriptionProvider implements ITranscriptionProvider {
  private client?: OpenAI;

  constructor(private readonly config: OpenAIWhisperConfig) {
    if (config.apiKey) {
      this.client = new OpenAI({ apiKey: config.apiKey });
    }
  }

  async transcribe(videoHandle: VideoHandle, options: TranscriptionOptions = {}): Promise<TranscriptionResult> {
    const client = options.apiKey ? new OpenAI({ apiKey: options.apiKey }) : this.client;
    if (!client) {
      throw new Error("No OpenAI API key configured for transcription");
    }

    console.log(`[OpenAIWhisperTranscriptionProvider] Extracting audio from ${videoHandle.videoId}`);
    const { stdout: audio } = await runProcess(
      this.config.ffmpegPath,
      ["-hide_banner", "-loglevel", "error", "-i", videoHandle.filePath, "-vn", "-ac", "1", "-ar", "16000", "-b:a", "48k", "-f", "mp3", "pipe:1"],
      { signal: options.signal }
    );
    if (audio.length === 0) {
      throw new Error("Audio extraction produced no data");
    }
    if (audio.length > MAX_UPLOAD_BYTES) {
      throw new Error(`Audio is ${Math.round(audio.length / 1024 / 1024)} MB, above the 25 MB transcription limit`);
    }

    console.log(`[OpenAIWhisperTranscriptionProvider] Transcribing ${audio.length} bytes with whisper-1`);
    const response: unknown = await client.audio.transcriptions.create(
      {
        model: "whisper-1",
        file: await toFile(audio, "audio.mp3", { type: "audio/mpeg" }),
        response_format: "verbose_json",
        timestamp_granularities: ["segment"],
        language: options.language ? baseLanguage(options.language) : undefined,
      },
      { signal: options.signal, maxRetries: 0 }
    );

    return parseVerboseTranscription(response, options.language ?? "en");
  }
}
