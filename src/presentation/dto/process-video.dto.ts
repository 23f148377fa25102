import { JobRequest } from "../../domain/entities/job";
import { JobStatus } from "../../domain/enums/job-status";
import { AiProvider, AiProviders, isAiProvider } from "../../domain/enums/ai-provider";
import { isScreenshotPosition, ScreenshotPositions } from "../../domain/enums/screenshot-position";
import { isTranslationEngine, TranslationEngines } from "../../domain/enums/translation-engine";
import { isVideoQuality, VideoQualities } from "../../domain/enums/video-quality";
import { validateAndNormalizeLanguage } from "../../domain/utils/language.validator";

export interface ProcessVideoResponse {
  jobId: string;
  status: JobStatus;
  message: string;
}

export interface VideoInfoRequest {
  url: string;
}

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

// Platform track codes such as "en-orig" or "zh-Hant" are accepted as preferences
const TRACK_CODE = /^[A-Za-z]{2,3}(?:-[A-Za-z0-9]{2,8})*$/;
const MAX_OFFSET_SEC = 60;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(body: Record<string, unknown>, key: string): string | undefined | null {
  const value = body[key];
  if (value === undefined || value === null || value === "") return undefined;
  return typeof value === "string" ? value.trim() : null;
}

function optionalBoolean(body: Record<string, unknown>, key: string): boolean | undefined | null {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  return typeof value === "boolean" ? value : null;
}

export function parseVideoUrl(value: unknown): ParseResult<string> {
  if (typeof value !== "string" || !value.trim()) {
    return { ok: false, error: "url is required and must be a string" };
  }
  let parsed: URL;
  try {
    parsed = new URL(value.trim());
  } catch {
    return { ok: false, error: "url must be a valid URL" };
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return { ok: false, error: "url must use http or https" };
  }
  return { ok: true, value: parsed.toString() };
}

export function parseVideoInfoRequest(body: unknown): ParseResult<VideoInfoRequest> {
  if (!isRecord(body)) {
    return { ok: false, error: "Request body must be a JSON object" };
  }
  const url = parseVideoUrl(body.url);
  return url.ok ? { ok: true, value: { url: url.value } } : url;
}

/**
 * Validates a process request body and fills in defaults. The engine defaults
 * to "ai" when a provider is named, otherwise "machine".
 */
export function parseProcessVideoRequest(body: unknown): ParseResult<JobRequest> {
  if (!isRecord(body)) {
    return { ok: false, error: "Request body must be a JSON object" };
  }

  const url = parseVideoUrl(body.url);
  if (!url.ok) return url;

  const quality = body.quality === undefined ? "720" : String(body.quality);
  if (!isVideoQuality(quality)) {
    return { ok: false, error: `quality must be one of: ${VideoQualities.join(", ")}` };
  }

  let subtitleLanguagePreference: string[] | undefined;
  const preference: unknown = body.subtitleLanguagePreference;
  if (preference !== undefined && preference !== null) {
    if (!Array.isArray(preference)) {
      return { ok: false, error: "subtitleLanguagePreference must be an array of language codes" };
    }
    const codes = preference.filter((code): code is string => typeof code === "string" && TRACK_CODE.test(code));
    if (codes.length !== preference.length) {
      return { ok: false, error: "subtitleLanguagePreference must be an array of language codes" };
    }
    subtitleLanguagePreference = codes.length > 0 ? codes : undefined;
  }

  const rawTranslateTo = optionalString(body, "translateTo");
  if (rawTranslateTo === null) {
    return { ok: false, error: "translateTo must be a language code" };
  }
  let translateTo: string | null = null;
  if (rawTranslateTo !== undefined) {
    const normalized = validateAndNormalizeLanguage(rawTranslateTo);
    if (!normalized) {
      return { ok: false, error: `translateTo is not a valid language code: ${rawTranslateTo}` };
    }
    translateTo = normalized;
  }

  let aiProvider: AiProvider | undefined;
  const rawProvider: unknown = body.aiProvider;
  if (rawProvider !== undefined && rawProvider !== null) {
    if (!isAiProvider(rawProvider)) {
      return { ok: false, error: `aiProvider must be one of: ${AiProviders.join(", ")}` };
    }
    aiProvider = rawProvider;
  }

  const translationEngine = body.translationEngine ?? (aiProvider ? "ai" : "machine");
  if (!isTranslationEngine(translationEngine)) {
    return { ok: false, error: `translationEngine must be one of: ${TranslationEngines.join(", ")}` };
  }

  const screenshotPosition = body.screenshotPosition ?? "middle";
  if (!isScreenshotPosition(screenshotPosition)) {
    return { ok: false, error: `screenshotPosition must be one of: ${ScreenshotPositions.join(", ")}` };
  }

  const screenshotOffset = body.screenshotOffset ?? 0;
  if (typeof screenshotOffset !== "number" || !Number.isFinite(screenshotOffset) || Math.abs(screenshotOffset) > MAX_OFFSET_SEC) {
    return { ok: false, error: `screenshotOffset must be a number between -${MAX_OFFSET_SEC} and ${MAX_OFFSET_SEC}` };
  }

  const generateOutline = optionalBoolean(body, "generateOutline");
  const useAiTranscription = optionalBoolean(body, "useAiTranscription");
  if (generateOutline === null || useAiTranscription === null) {
    return { ok: false, error: "generateOutline and useAiTranscription must be booleans" };
  }

  const aiModel = optionalString(body, "aiModel");
  const apiKey = optionalString(body, "apiKey");
  const transcriptionApiKey = optionalString(body, "transcriptionApiKey");
  if (aiModel === null || apiKey === null || transcriptionApiKey === null) {
    return { ok: false, error: "aiModel, apiKey and transcriptionApiKey must be strings" };
  }

  return {
    ok: true,
    value: {
      url: url.value,
      quality,
      subtitleLanguagePreference,
      translateTo,
      translationEngine,
      screenshotPosition,
      screenshotOffset,
      generateOutline: generateOutline ?? false,
      aiProvider,
      aiModel,
      apiKey,
      useAiTranscription: useAiTranscription ?? false,
      transcriptionApiKey,
    },
  };
}
