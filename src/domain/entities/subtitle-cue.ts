export interface SubtitleCue {
  index: number; // 1-based, sequential after parsing
  startOffset: number; // seconds, millisecond precision
  endOffset: number; // seconds, always > startOffset
  sourceText: string;
  translatedText?: string;
}

/**
 * A subtitle block the parser could not use. Recorded, never thrown.
 */
export interface SubtitleParseWarning {
  blockNumber: number; // 1-based position of the block in the raw text
  reason: string;
  excerpt: string;
}
