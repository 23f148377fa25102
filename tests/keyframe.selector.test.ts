import { describe, expect, it } from "vitest";
import { KeyframeSelector } from "../src/application/services/keyframe.selector";
import { SubtitleCue } from "../src/domain/entities/subtitle-cue";

const cues: SubtitleCue[] = [
  { index: 1, startOffset: 1, endOffset: 3, sourceText: "one" },
  { index: 2, startOffset: 5, endOffset: 7, sourceText: "two" },
  { index: 3, startOffset: 9, endOffset: 10, sourceText: "three" },
];

describe("KeyframeSelector", () => {
  const selector = new KeyframeSelector();

  it("takes the middle of each cue", () => {
    expect(selector.select(cues, { position: "middle", offset: 0, videoDuration: 60 })).toEqual([
      { index: 1, timestamp: 2, cueIndex: 1 },
      { index: 2, timestamp: 6, cueIndex: 2 },
      { index: 3, timestamp: 9.5, cueIndex: 3 },
    ]);
  });

  it("clamps negative timestamps to zero", () => {
    const frames = selector.select(cues, { position: "start", offset: -3, videoDuration: 60 });

    expect(frames.map((f) => f.timestamp)).toEqual([0, 2, 6]);
  });

  it("clamps to the video duration", () => {
    const frames = selector.select(cues, { position: "end", offset: 5, videoDuration: 12 });

    expect(frames.map((f) => f.timestamp)).toEqual([8, 12, 12]);
  });

  it("never rounds past a fractional duration", () => {
    const frames = selector.select([{ index: 1, startOffset: 9, endOffset: 12, sourceText: "late" }], {
      position: "end",
      offset: 0,
      videoDuration: 10.0005,
    });

    expect(frames[0].timestamp).toBe(10.0005);
  });

  it("falls back to the last cue end when the duration is unknown", () => {
    const frames = selector.select(cues, { position: "end", offset: 5 });

    expect(frames.map((f) => f.timestamp)).toEqual([8, 10, 10]);
  });

  it("keeps the cue index of renumbered input", () => {
    const frames = selector.select([{ index: 7, startOffset: 0, endOffset: 1, sourceText: "x" }], {
      position: "start",
      offset: 0,
    });

    expect(frames).toEqual([{ index: 1, timestamp: 0, cueIndex: 7 }]);
  });

  it("stays within [0, duration] for any offset", () => {
    for (const offset of [-100, -1.25, 0, 0.333, 4, 100]) {
      for (const position of ["start", "middle", "end"] as const) {
        for (const frame of selector.select(cues, { position, offset, videoDuration: 10 })) {
          expect(frame.timestamp).toBeGreaterThanOrEqual(0);
          expect(frame.timestamp).toBeLessThanOrEqual(10);
        }
      }
    }
  });

  it("returns nothing for no cues", () => {
    expect(selector.select([], { position: "middle", offset: 0 })).toEqual([]);
  });
});
