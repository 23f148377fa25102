/**
 * Turns a model's reply to an indexed batch ("[0] text\n[1] text") back into
 * per-index translations. Strategies run in order; the first that covers every
 * index wins, otherwise their results are merged and the gaps reported.
 */

export type ParseStrategyName = "strict" | "lenient" | "positional";

export interface TranslationParseStrategy {
  readonly name: ParseStrategyName;
  parse(response: string, expectedCount: number): Map<number, string>;
}

export interface StrategyCoverage {
  strategy: ParseStrategyName;
  coverage: number; // resolved / expected, 0-1
}

export interface ReconciledResponse {
  translations: Array<string | undefined>;
  strategy: ParseStrategyName | "merged" | "none";
  missing: number[]; // batch-local indices with no usable translation
  attempts: StrategyCoverage[];
}

const MARKER = /\[\s*(\d+)\s*\]/;
const STRICT_LINE = /^\s*\[(\d+)\]\s*(.*?)\s*$/;
// The marker must be followed by whitespace: "3.5 million" and "-5" are text
const ENUMERATION_PREFIX = /^(?:\(?\d+[.)]\s+|\d+\s*[-–]\s+|[-*•·]\s+)/;
const PREAMBLE = /^(?:here|sure|certainly|of course|translation|translated|note)\b/i;

function nonEmptyLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/** Only lines that are exactly "[i] text"; an index followed by stray lines is dropped. */
export const strictLineStrategy: TranslationParseStrategy = {
  name: "strict",
  parse(response, expectedCount) {
    const result = new Map<number, string>();
    const ambiguous = new Set<number>();
    let lastIndex: number | null = null;

    for (const line of nonEmptyLines(response)) {
      const match = STRICT_LINE.exec(line);
      if (!match) {
        if (lastIndex !== null) ambiguous.add(lastIndex);
        continue;
      }
      const index = Number(match[1]);
      const text = match[2];
      lastIndex = index;
      if (MARKER.test(text)) {
        ambiguous.add(index);
        continue;
      }
      if (index < expectedCount && text && !result.has(index)) {
        result.set(index, text);
      }
    }

    for (const index of ambiguous) {
      result.delete(index);
    }
    return result;
  },
};

/** Everything between one marker and the next, wrapped lines joined with spaces. */
export const lenientBlockStrategy: TranslationParseStrategy = {
  name: "lenient",
  parse(response, expectedCount) {
    const result = new Map<number, string>();
    const markers: Array<{ index: number; start: number; end: number }> = [];

    const pattern = new RegExp(MARKER.source, "g");
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(response)) !== null) {
      markers.push({ index: Number(match[1]), start: match.index, end: match.index + match[0].length });
    }

    markers.forEach((marker, i) => {
      const next = markers[i + 1];
      const block = response.slice(marker.end, next ? next.start : response.length);
      const text = nonEmptyLines(block).join(" ");
      if (marker.index < expectedCount && text && !result.has(marker.index)) {
        result.set(marker.index, text);
      }
    });
    return result;
  },
};

/**
 * For replies that dropped the markers: one line per cue, in order, with
 * enumeration and bullets stripped. Lead-in lines are dropped only when there
 * are more lines than cues.
 */
export const positionalStrategy: TranslationParseStrategy = {
  name: "positional",
  parse(response, expectedCount) {
    const result = new Map<number, string>();
    if (MARKER.test(response)) {
      return result;
    }

    let lines = nonEmptyLines(response)
      .map((line) => line.replace(ENUMERATION_PREFIX, "").trim())
      .filter((line) => line.length > 0);

    while (lines.length > expectedCount && PREAMBLE.test(lines[0])) {
      lines = lines.slice(1);
    }
    while (lines.length > expectedCount && PREAMBLE.test(lines[lines.length - 1])) {
      lines = lines.slice(0, -1);
    }

    lines.slice(0, expectedCount).forEach((line, i) => result.set(i, line));
    return result;
  },
};

export const DEFAULT_PARSE_STRATEGIES: readonly TranslationParseStrategy[] = [
  strictLineStrategy,
  lenientBlockStrategy,
  positionalStrategy,
];

export function reconcileResponse(
  response: string,
  expectedCount: number,
  strategies: readonly TranslationParseStrategy[] = DEFAULT_PARSE_STRATEGIES
): ReconciledResponse {
  const outcomes: Array<Map<number, string>> = [];
  const attempts: StrategyCoverage[] = [];

  for (const strategy of strategies) {
    const parsed = strategy.parse(response, expectedCount);
    attempts.push({ strategy: strategy.name, coverage: expectedCount === 0 ? 1 : parsed.size / expectedCount });
    if (parsed.size === expectedCount) {
      return {
        translations: Array.from({ length: expectedCount }, (_, i) => parsed.get(i)),
        strategy: strategy.name,
        missing: [],
        attempts,
      };
    }
    outcomes.push(parsed);
  }

  const merged = new Map<number, string>();
  for (const parsed of outcomes) {
    for (const [index, text] of parsed) {
      if (!merged.has(index)) merged.set(index, text);
    }
  }

  const translations = Array.from({ length: expectedCount }, (_, i) => merged.get(i));
  const missing = translations.flatMap((text, i) => (text === undefined ? [i] : []));
  return { translations, strategy: merged.size > 0 ? "merged" : "none", missing, attempts };
}
