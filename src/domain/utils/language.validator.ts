/**
 * Language tag validation for subtitle and translation targets.
 * Accepts an ISO-639-1 base code with an optional region or script subtag
 * ("en", "zh-TW", "zh-Hant", "pt-BR").
 */

import isoCodes from "./iso-639-1.json";

const ISO_639_1_CODES = new Set<string>(isoCodes);

const LANGUAGE_TAG_PATTERN = /^([a-zA-Z]{2})(?:-([a-zA-Z]{2}|[a-zA-Z]{4}|\d{3}))?$/;

export function isValidISO6391Code(lang: string): boolean {
  if (!/^[a-z]{2}$/.test(lang)) {
    return false;
  }
  return ISO_639_1_CODES.has(lang);
}

/**
 * Normalizes a language tag: lowercase base, uppercase region, title-case script.
 * @returns the normalized tag, or undefined when the tag is not usable
 */
export function validateAndNormalizeLanguage(lang: string | undefined | null): string | undefined {
  if (!lang) {
    return undefined;
  }

  const match = LANGUAGE_TAG_PATTERN.exec(lang.trim());
  if (!match) {
    return undefined;
  }

  const base = match[1].toLowerCase();
  if (!isValidISO6391Code(base)) {
    return undefined;
  }

  const subtag = match[2];
  if (!subtag) {
    return base;
  }
  if (subtag.length === 4) {
    return `${base}-${subtag[0].toUpperCase()}${subtag.slice(1).toLowerCase()}`;
  }
  return `${base}-${subtag.toUpperCase()}`;
}

export function baseLanguage(tag: string): string {
  return tag.split("-")[0].toLowerCase();
}
