import { IMachineTranslator } from "../../domain/interfaces/imachine.translator";

const ENDPOINT = "https://translate.googleapis.com/translate_a/single";

/** The endpoint's language codes differ from ours for Chinese. */
export function toGoogleLanguage(code: string): string {
  if (code === "zh-Hant") return "zh-TW";
  if (code === "zh-Hans" || code === "zh") return "zh-CN";
  return code;
}

/**
 * Reads the translated text out of the endpoint's nested-array reply:
 * [[["translated", "source", ...], ...], ...].
 */
export function parseGoogleResponse(body: unknown): string {
  if (!Array.isArray(body) || !Array.isArray(body[0])) {
    throw new Error("Unexpected translation response shape");
  }
  const parts: string[] = [];
  for (const segment of body[0]) {
    if (Array.isArray(segment) && typeof segment[0] === "string") {
      parts.push(segment[0]);
    }
  }
  if (parts.length === 0) {
    throw new Error("Translation response contained no text");
  }
  return parts.join("");
}

/**
 * Key-less machine translation through Google's public web endpoint.
 */
export class GoogleWebTranslator implements IMachineTranslator {
  async translate(
    text: string,
    sourceLang: string,
    targetLang: string,
    options: { signal?: AbortSignal } = {}
  ): Promise<string> {
    const params = new URLSearchParams({
      client: "gtx",
      sl: sourceLang ? toGoogleLanguage(sourceLang) : "auto",
      tl: toGoogleLanguage(targetLang),
      dt: "t",
      q: text,
    });

    const response = await fetch(`${ENDPOINT}?${params.toString()}`, { signal: options.signal });
    if (!response.ok) {
      throw new Error(`Translation request failed with HTTP ${response.status}`);
    }
    const body: unknown = await response.json();
    return parseGoogleResponse(body);
  }
}
