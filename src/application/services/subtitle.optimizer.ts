import { SubtitleCue } from "../../domain/entities/subtitle-cue";
import { baseLanguage } from "../../domain/utils/language.validator";
import { joinCueText } from "./subtitle.processor";

export type MergeStrategy = "sentence" | "smart";

export interface SmartMergeConfig {
  minChars: number;
  targetChars: number;
  maxChars: number;
  maxGapSec: number;
}

export const DEFAULT_SMART_MERGE_CONFIG: SmartMergeConfig = {
  minChars: 40,
  targetChars: 80,
  maxChars: 150,
  maxGapSec: 1.5,
};

export interface MergeOutcome {
  cues: SubtitleCue[];
  strategy: MergeStrategy;
  originalCount: number;
  mergedCount: number;
  reductionPercentage: number;
}

const SENTENCE_END = /\.\.\.|…+|[.!?。！？]/;
const PUNCTUATION_CHARS = new Set([".", "!", "?", "。", "！", "？", ",", ";", ":", "、", "，", "；", "："]);

// Spoken endings that close a sentence in captions without punctuation
const LANGUAGE_MARKERS: Record<string, string[]> = {
  ja: ["です", "ます", "でした", "ました", "だった", "である", "でしょう", "ません", "ない", "か", "ね", "よ", "な", "わ", "ぞ", "ぜ", "さ", "の"],
  ko: ["니다", "습니다", "었습니다", "였습니다", "는데요", "어요", "아요", "요", "네요", "까요", "세요", "죠", "군요"],
  zh: ["了", "過", "著", "吧", "呢", "啊", "嗎", "嘛", "的", "喔", "哦", "耶"],
  th: ["แล้ว", "อยู่", "ไป", "มา", "ครับ", "ค่ะ", "นะ", "จ้ะ", "จ๊ะ", "ล่ะ"],
};

export function containsSentenceEnd(text: string): boolean {
  return SENTENCE_END.test(text);
}

export function endsWithLanguageMarker(text: string, language?: string): boolean {
  if (!language) {
    return false;
  }
  const markers = LANGUAGE_MARKERS[baseLanguage(language)];
  const trimmed = text.trim();
  return markers !== undefined && markers.some((marker) => trimmed.endsWith(marker));
}

/** Splits after the first sentence end; rest is "" when nothing follows. */
export function splitAtFirstSentence(text: string): [string, string] {
  const match = SENTENCE_END.exec(text);
  if (!match) {
    return [text.trim(), ""];
  }
  const end = match.index + match[0].length;
  return [text.slice(0, end).trim(), text.slice(end).trim()];
}

/**
 * Merges the fragmented cues of auto-generated tracks into sentence-sized
 * cues. Tracks with punctuation merge on sentence ends; tracks without it
 * merge on length, gaps and spoken sentence endings.
 */
export class SubtitleOptimizer {
  constructor(private readonly smartConfig: SmartMergeConfig = DEFAULT_SMART_MERGE_CONFIG) {}

  /** Punctuation in more than 30% of the first 20 cues. */
  hasPunctuation(cues: SubtitleCue[]): boolean {
    const sample = cues.slice(0, 20);
    if (sample.length === 0) {
      return false;
    }
    const withPunctuation = sample.filter((cue) => Array.from(cue.sourceText).some((c) => PUNCTUATION_CHARS.has(c)));
    return withPunctuation.length / sample.length > 0.3;
  }

  optimize(cues: SubtitleCue[], language?: string): MergeOutcome {
    const strategy: MergeStrategy = this.hasPunctuation(cues) ? "sentence" : "smart";
    const merged = strategy === "sentence" ? this.mergeIntoSentences(cues) : this.smartMerge(cues, language);
    const reduction = cues.length === 0 ? 0 : (1 - merged.length / cues.length) * 100;

    return {
      cues: merged,
      strategy,
      originalCount: cues.length,
      mergedCount: merged.length,
      reductionPercentage: Math.round(reduction * 100) / 100,
    };
  }

  /**
   * Accumulates cues until the text holds a sentence end, emits the first
   * sentence and carries the remainder into the next cue.
   */
  mergeIntoSentences(cues: SubtitleCue[]): SubtitleCue[] {
    const merged: Array<Omit<SubtitleCue, "index">> = [];
    let overflow = "";
    let i = 0;

    while (i < cues.length) {
      const startOffset = cues[i].startOffset;
      let endOffset = cues[i].endOffset;
      let text = joinCueText(overflow, cues[i].sourceText);

      while (i < cues.length - 1 && !containsSentenceEnd(text)) {
        i++;
        text = joinCueText(text, cues[i].sourceText);
        endOffset = cues[i].endOffset;
      }

      const [sentence, rest] = splitAtFirstSentence(text);
      if (sentence) {
        merged.push({ startOffset, endOffset, sourceText: sentence });
      }
      overflow = rest;
      i++;
    }

    if (overflow) {
      const last = merged[merged.length - 1];
      const at = last ? last.endOffset : 0;
      merged.push({ startOffset: at, endOffset: at, sourceText: overflow });
    }

    return merged.map((cue, index) => ({ ...cue, index: index + 1 }));
  }

  smartMerge(cues: SubtitleCue[], language?: string): SubtitleCue[] {
    const { minChars, targetChars, maxChars, maxGapSec } = this.smartConfig;
    const merged: Array<Omit<SubtitleCue, "index">> = [];
    let i = 0;

    while (i < cues.length) {
      const current = {
        startOffset: cues[i].startOffset,
        endOffset: cues[i].endOffset,
        sourceText: cues[i].sourceText,
      };

      while (i < cues.length - 1) {
        const next = cues[i + 1];
        const length = Array.from(current.sourceText).length;
        const gap = next.startOffset - current.endOffset;

        let shouldMerge = false;
        if (length < minChars) {
          shouldMerge = true;
        } else if (gap < maxGapSec && length < targetChars) {
          shouldMerge = true;
        } else if (language && !endsWithLanguageMarker(current.sourceText, language) && length < maxChars) {
          shouldMerge = true;
        }
        if (length >= maxChars || !shouldMerge) {
          break;
        }

        i++;
        current.sourceText = joinCueText(current.sourceText, next.sourceText);
        current.endOffset = next.endOffset;
      }

      merged.push(current);
      i++;
    }

    return merged.map((cue, index) => ({ ...cue, index: index + 1 }));
  }
}
