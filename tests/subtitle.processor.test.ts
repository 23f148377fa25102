import { describe, expect, it } from "vitest";
import {
  formatTimecode,
  isCjkDominant,
  joinCueText,
  SubtitleProcessor,
} from "../src/application/services/subtitle.processor";

const srt = (...lines: string[]) => lines.join("\n");

describe("SubtitleProcessor.parse", () => {
  const processor = new SubtitleProcessor();

  it("reads well-formed blocks with millisecond timecodes", () => {
    const { cues, warnings } = processor.parse(
      srt(
        "1",
        "00:00:01,000 --> 00:00:03,500",
        "Hello world",
        "",
        "2",
        "00:00:04,000 --> 00:00:06,250",
        "Second line",
        "continues",
        ""
      )
    );

    expect(warnings).toEqual([]);
    expect(cues).toEqual([
      { index: 1, startOffset: 1, endOffset: 3.5, sourceText: "Hello world" },
      { index: 2, startOffset: 4, endOffset: 6.25, sourceText: "Second line\ncontinues" },
    ]);
  });

  it("round-trips untouched cues through serialize", () => {
    const input = srt(
      "1",
      "00:00:01,000 --> 00:00:03,500",
      "Hello world",
      "",
      "2",
      "01:02:03,004 --> 01:02:05,999",
      "Second line",
      "continues",
      ""
    );

    expect(processor.serialize(processor.parse(input).cues)).toBe(input);
  });

  it("skips malformed blocks and reports each one", () => {
    const { cues, warnings } = processor.parse(
      srt(
        "abc",
        "00:00:01,000 --> 00:00:02,000",
        "No index",
        "",
        "2",
        "not a timecode",
        "Bad timing",
        "",
        "3",
        "00:00:05,000 --> 00:00:06,000",
        "",
        "4",
        "00:00:07,000 --> 00:00:08,000",
        "Kept"
      )
    );

    expect(cues).toEqual([{ index: 1, startOffset: 7, endOffset: 8, sourceText: "Kept" }]);
    expect(warnings.map((w) => [w.blockNumber, w.reason])).toEqual([
      [1, "missing or non-numeric cue index"],
      [2, "unparsable timecode line"],
      [3, "cue has no text"],
    ]);
  });

  it("strips a byte order mark and CRLF line endings", () => {
    const { cues } = processor.parse("\uFEFF1\r\n00:00:00,500 --> 00:00:01,000\r\nHi\r\n");

    expect(cues).toEqual([{ index: 1, startOffset: 0.5, endOffset: 1, sourceText: "Hi" }]);
  });

  it("accepts dot separators and short fractions", () => {
    const { cues } = processor.parse(srt("1", "00:00:01.5 --> 00:00:02.25", "Dots"));

    expect(cues[0].startOffset).toBe(1.5);
    expect(cues[0].endOffset).toBe(2.25);
  });

  it("sorts by start time and renumbers from 1", () => {
    const { cues } = processor.parse(
      srt("7", "00:00:10,000 --> 00:00:11,000", "Later", "", "3", "00:00:02,000 --> 00:00:03,000", "Earlier")
    );

    expect(cues.map((cue) => [cue.index, cue.sourceText])).toEqual([
      [1, "Earlier"],
      [2, "Later"],
    ]);
  });

  it("gives zero-length cues a minimal duration", () => {
    const { cues, warnings } = processor.parse(srt("1", "00:00:05,000 --> 00:00:05,000", "Zero"));

    expect(cues[0].endOffset).toBe(5.04);
    expect(warnings).toEqual([
      { blockNumber: 1, reason: "end time not after start time, duration corrected", excerpt: "Zero" },
    ]);
  });

  it("returns nothing for empty input", () => {
    expect(processor.parse("  \n\n ")).toEqual({ cues: [], warnings: [] });
  });
});

describe("SubtitleProcessor.serialize", () => {
  it("uses translations when asked and falls back to the source text", () => {
    const processor = new SubtitleProcessor();
    const output = processor.serialize(
      [
        { index: 1, startOffset: 0, endOffset: 1.5, sourceText: "Hello", translatedText: "Hola" },
        { index: 2, startOffset: 2, endOffset: 3, sourceText: "World" },
      ],
      true
    );

    expect(output).toBe(
      srt("1", "00:00:00,000 --> 00:00:01,500", "Hola", "", "2", "00:00:02,000 --> 00:00:03,000", "World", "")
    );
  });
});

describe("timecodes", () => {
  it("formats hours, minutes, seconds and milliseconds", () => {
    expect(formatTimecode(3661.007)).toBe("01:01:01,007");
    expect(formatTimecode(-2)).toBe("00:00:00,000");
  });
});

describe("text helpers", () => {
  it("joins CJK fragments without a space", () => {
    expect(joinCueText("你好", "世界")).toBe("你好世界");
    expect(joinCueText("Hello", "world")).toBe("Hello world");
    expect(joinCueText("", " x ")).toBe("x");
  });

  it("detects CJK-dominant text", () => {
    expect(isCjkDominant("日本語 text")).toBe(false);
    expect(isCjkDominant("日本語です ok")).toBe(true);
    expect(isCjkDominant("   ")).toBe(false);
  });
});

describe("SubtitleProcessor.optimizeLineBreaks", () => {
  const processor = new SubtitleProcessor();

  it("leaves text that already fits untouched", () => {
    expect(processor.optimizeLineBreaks("Short\nlines")).toBe("Short\nlines");
  });

  it("breaks at the last space inside the budget", () => {
    expect(processor.optimizeLineBreaks("The quick brown fox jumps over the lazy dog, and then it runs far away")).toBe(
      "The quick brown fox jumps over the lazy\ndog, and then it runs far away"
    );
  });

  it("prefers a break before a conjunction", () => {
    expect(
      processor.optimizeLineBreaks("We went to the market and bought some apples for the whole family tonight")
    ).toBe("We went to the market\nand bought some apples for the whole\nfamily tonight");
  });

  it("breaks CJK text after sentence punctuation", () => {
    expect(processor.optimizeLineBreaks("今天天气很好，我们一起去公园散步吧。然后去吃饭")).toBe(
      "今天天气很好，我们一起去公园散步吧。\n然后去吃饭"
    );
  });

  it("hard-breaks CJK text without punctuation at the budget", () => {
    expect(processor.optimizeLineBreaks("这是一个没有标点符号的很长的中文句子需要被硬性断开才可以")).toBe(
      "这是一个没有标点符号的很长的中文句子需要\n被硬性断开才可以"
    );
  });

  it("never splits a Latin word longer than the budget", () => {
    expect(processor.optimizeLineBreaks("Supercalifragilisticexpialidociousandevenlongerwordwithoutspaces ok")).toBe(
      "Supercalifragilisticexpialidociousandevenlongerwordwithoutspaces\nok"
    );
  });

  it("reports how many cues were re-wrapped", () => {
    const { cues, changed } = processor.wrapCues([
      { index: 1, startOffset: 0, endOffset: 1, sourceText: "Fits" },
      {
        index: 2,
        startOffset: 1,
        endOffset: 2,
        sourceText: "We went to the market and bought some apples for the whole family tonight",
      },
    ]);

    expect(changed).toBe(1);
    expect(cues[0].sourceText).toBe("Fits");
    expect(cues[1].sourceText.split("\n")).toHaveLength(3);
  });
});
