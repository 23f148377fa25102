import { SubtitleCue, SubtitleParseWarning } from "../../domain/entities/subtitle-cue";

// One frame at 25 fps
export const MIN_CUE_DURATION_SEC = 0.04;

export interface LineBreakOptions {
  maxLatinChars: number;
  maxCjkChars: number;
}

export const DEFAULT_LINE_BREAK_OPTIONS: LineBreakOptions = {
  maxLatinChars: 42,
  maxCjkChars: 20,
};

export interface ParsedSubtitles {
  cues: SubtitleCue[];
  warnings: SubtitleParseWarning[];
}

const TIMECODE_LINE =
  /^(\d{1,2}):(\d{2}):(\d{2})[,.](\d{1,3})\s*-->\s*(\d{1,2}):(\d{2}):(\d{2})[,.](\d{1,3})/;

const CJK_CHAR = /[\u3000-\u303f\u3040-\u30ff\u3400-\u4dbf\u4e00-\u9fff\uac00-\ud7af\uf900-\ufaff\uff00-\uffef]/;
const CJK_SENTENCE_END = new Set(["。", "！", "？", "…"]);
const CJK_CLAUSE_END = new Set(["，", "、", "；", "：", "」", "』", "）"]);
const LATIN_SENTENCE_END = new Set([".", "!", "?", ";", ":"]);
const LATIN_CLAUSE_END = new Set([",", "-", "–", "—"]);
const CONJUNCTIONS = new Set([
  "and", "but", "or", "so", "because", "although", "when", "while",
  "if", "that", "which", "who", "then", "where", "until",
]);

const BREAK_SCORES = {
  sentence: 50,
  clause: 40,
  conjunction: 30,
  space: 10,
  tooShort: 1,
} as const;

function toMs(hours: string, minutes: string, seconds: string, fraction: string): number {
  // "5" after the separator means 500ms
  const millis = Number(fraction.padEnd(3, "0"));
  return ((Number(hours) * 60 + Number(minutes)) * 60 + Number(seconds)) * 1000 + millis;
}

/** Formats seconds as an SRT timecode (HH:MM:SS,mmm). */
export function formatTimecode(seconds: number): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const ms = totalMs % 1000;
  const totalSec = Math.floor(totalMs / 1000);
  const s = totalSec % 60;
  const m = Math.floor(totalSec / 60) % 60;
  const h = Math.floor(totalSec / 3600);
  const pad = (value: number, width = 2) => String(value).padStart(width, "0");
  return `${pad(h)}:${pad(m)}:${pad(s)},${pad(ms, 3)}`;
}

export function isCjkChar(char: string): boolean {
  return CJK_CHAR.test(char);
}

/** True when more than half of the non-space characters are CJK. */
export function isCjkDominant(text: string): boolean {
  const chars = Array.from(text).filter((c) => c.trim().length > 0);
  if (chars.length === 0) {
    return false;
  }
  const cjk = chars.filter(isCjkChar).length;
  return cjk / chars.length > 0.5;
}

/** Joins two fragments, without a space between CJK neighbours. */
export function joinCueText(left: string, right: string): string {
  const a = left.trim();
  const b = right.trim();
  if (!a) return b;
  if (!b) return a;
  const last = Array.from(a).pop() ?? "";
  const first = Array.from(b)[0] ?? "";
  return isCjkChar(last) && isCjkChar(first) ? `${a}${b}` : `${a} ${b}`;
}

interface RawCue {
  startMs: number;
  endMs: number;
  text: string;
  blockNumber: number;
}

interface BreakCandidate {
  position: number; // head = chars[0, position)
  skip: number; // characters dropped at the break (the space)
  score: number;
}

export class SubtitleProcessor {
  constructor(private readonly lineBreakOptions: LineBreakOptions = DEFAULT_LINE_BREAK_OPTIONS) {}

  /**
   * Tolerant SRT parse. Unusable blocks are skipped and reported as warnings;
   * cues come back sorted by start time and renumbered from 1.
   */
  parse(rawText: string): ParsedSubtitles {
    const warnings: SubtitleParseWarning[] = [];
    const normalized = rawText.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n").trim();
    if (!normalized) {
      return { cues: [], warnings };
    }

    const blocks = normalized.split(/\n\s*\n/);
    const raw: RawCue[] = [];

    blocks.forEach((block, i) => {
      const blockNumber = i + 1;
      const lines = block.split("\n").map((line) => line.trim());
      const excerpt = lines.slice(0, 2).join(" | ").slice(0, 80);

      if (!/^\d+$/.test(lines[0] ?? "")) {
        warnings.push({ blockNumber, reason: "missing or non-numeric cue index", excerpt });
        return;
      }

      const timing = TIMECODE_LINE.exec(lines[1] ?? "");
      if (!timing) {
        warnings.push({ blockNumber, reason: "unparsable timecode line", excerpt });
        return;
      }

      const text = lines.slice(2).filter((line) => line.length > 0).join("\n");
      if (!text) {
        warnings.push({ blockNumber, reason: "cue has no text", excerpt });
        return;
      }

      raw.push({
        startMs: toMs(timing[1], timing[2], timing[3], timing[4]),
        endMs: toMs(timing[5], timing[6], timing[7], timing[8]),
        text,
        blockNumber,
      });
    });

    // Array.prototype.sort is stable, so equal starts keep file order
    raw.sort((a, b) => a.startMs - b.startMs);

    const minDurationMs = Math.round(MIN_CUE_DURATION_SEC * 1000);
    const cues = raw.map((cue, i): SubtitleCue => {
      let endMs = cue.endMs;
      if (endMs <= cue.startMs) {
        endMs = cue.startMs + minDurationMs;
        warnings.push({
          blockNumber: cue.blockNumber,
          reason: "end time not after start time, duration corrected",
          excerpt: cue.text.slice(0, 80),
        });
      }
      return {
        index: i + 1,
        startOffset: cue.startMs / 1000,
        endOffset: endMs / 1000,
        sourceText: cue.text,
      };
    });

    return { cues, warnings };
  }

  /** Writes cues back to SRT, using translations where present when asked to. */
  serialize(cues: SubtitleCue[], useTranslation = false): string {
    return cues
      .map((cue) => {
        const text = useTranslation ? cue.translatedText ?? cue.sourceText : cue.sourceText;
        return `${cue.index}\n${formatTimecode(cue.startOffset)} --> ${formatTimecode(cue.endOffset)}\n${text}\n`;
      })
      .join("\n");
  }

  /** Re-wraps every cue; returns the cues and how many changed. */
  wrapCues(cues: SubtitleCue[]): { cues: SubtitleCue[]; changed: number } {
    let changed = 0;
    const wrapped = cues.map((cue) => {
      const text = this.optimizeLineBreaks(cue.sourceText);
      if (text === cue.sourceText) {
        return cue;
      }
      changed++;
      return { ...cue, sourceText: text };
    });
    return { cues: wrapped, changed };
  }

  /**
   * Wraps cue text to the per-line budget for its script. Text whose lines
   * already fit is returned unchanged. Latin words are never split.
   */
  optimizeLineBreaks(text: string): string {
    const lines = text
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    if (lines.length === 0) {
      return text;
    }

    const joined = lines.reduce((acc, line) => joinCueText(acc, line));
    const cjk = isCjkDominant(joined);
    const budget = cjk ? this.lineBreakOptions.maxCjkChars : this.lineBreakOptions.maxLatinChars;

    if (lines.every((line) => Array.from(line).length <= budget)) {
      return text;
    }

    const result: string[] = [];
    let rest = joined;
    while (Array.from(rest).length > budget) {
      const split = this.splitLine(rest, budget, cjk);
      if (!split) {
        break;
      }
      result.push(split.head);
      rest = split.tail;
    }
    if (rest) {
      result.push(rest);
    }
    return result.join("\n");
  }

  private splitLine(text: string, budget: number, cjk: boolean): { head: string; tail: string } | null {
    const chars = Array.from(text);
    const minHead = Math.floor(budget * 0.4);
    const candidates: BreakCandidate[] = [];

    for (let i = 1; i < chars.length - 1 && i <= budget; i++) {
      const char = chars[i];
      const prev = chars[i - 1];

      if (char === " ") {
        const nextWord = chars.slice(i + 1).join("").split(" ")[0].toLowerCase();
        let score: number = BREAK_SCORES.space;
        if (LATIN_SENTENCE_END.has(prev)) score = BREAK_SCORES.sentence;
        else if (LATIN_CLAUSE_END.has(prev)) score = BREAK_SCORES.clause;
        else if (CONJUNCTIONS.has(nextWord)) score = BREAK_SCORES.conjunction;
        candidates.push({ position: i, skip: 1, score: i < minHead ? BREAK_SCORES.tooShort : score });
        continue;
      }

      // Break after CJK punctuation, keeping the mark on the first line
      if (cjk && i + 1 <= budget && (CJK_SENTENCE_END.has(char) || CJK_CLAUSE_END.has(char))) {
        const score = CJK_SENTENCE_END.has(char) ? BREAK_SCORES.sentence : BREAK_SCORES.clause;
        candidates.push({ position: i + 1, skip: 0, score: i + 1 < minHead ? BREAK_SCORES.tooShort : score });
      }
    }

    let best: BreakCandidate | undefined;
    for (const candidate of candidates) {
      if (!best || candidate.score > best.score || (candidate.score === best.score && candidate.position > best.position)) {
        best = candidate;
      }
    }

    if (!best) {
      best = cjk ? this.hardBreak(chars, budget) : this.firstSpaceAfter(chars, budget);
    }
    if (!best) {
      return null;
    }

    const head = chars.slice(0, best.position).join("").trimEnd();
    const tail = chars.slice(best.position + best.skip).join("").trimStart();
    return head && tail ? { head, tail } : null;
  }

  // Latin fallback: a single word longer than the budget stays whole
  private firstSpaceAfter(chars: string[], budget: number): BreakCandidate | undefined {
    const index = chars.indexOf(" ", budget);
    return index > 0 ? { position: index, skip: 1, score: 0 } : undefined;
  }

  // CJK fallback: cut at the budget, moving off any embedded Latin word
  private hardBreak(chars: string[], budget: number): BreakCandidate | undefined {
    const isWordChar = (c: string | undefined) => c !== undefined && /[A-Za-z0-9]/.test(c);
    let position = budget;
    while (position > 0 && isWordChar(chars[position - 1]) && isWordChar(chars[position])) {
      position--;
    }
    if (position === 0) {
      position = budget;
      while (position < chars.length && isWordChar(chars[position])) {
        position++;
      }
    }
    return position > 0 && position < chars.length ? { position, skip: 0, score: 0 } : undefined;
  }
}
