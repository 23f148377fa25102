import { FrameSpec } from "../../domain/entities/frame-spec";
import { SubtitleCue } from "../../domain/entities/subtitle-cue";
import { ScreenshotPosition } from "../../domain/enums/screenshot-position";

export interface KeyframeSelectionOptions {
  position: ScreenshotPosition;
  offset: number; // seconds, may be negative
  videoDuration?: number;
}

export function baseTimestamp(cue: SubtitleCue, position: ScreenshotPosition): number {
  switch (position) {
    case "start":
      return cue.startOffset;
    case "end":
      return cue.endOffset;
    case "middle":
      return (cue.startOffset + cue.endOffset) / 2;
  }
}

/**
 * One frame per cue, at the chosen point of the cue shifted by the offset and
 * clamped to the video. Without a known duration the last cue end bounds it.
 */
export class KeyframeSelector {
  select(cues: SubtitleCue[], options: KeyframeSelectionOptions): FrameSpec[] {
    if (cues.length === 0) {
      return [];
    }

    const duration =
      options.videoDuration !== undefined && Number.isFinite(options.videoDuration) && options.videoDuration > 0
        ? options.videoDuration
        : Math.max(...cues.map((cue) => cue.endOffset));

    return cues.map((cue, i) => {
      const raw = baseTimestamp(cue, options.position) + options.offset;
      // Rounded before clamping so a fractional duration stays the upper bound
      const timestamp = Math.min(Math.max(Math.round(raw * 1000) / 1000, 0), duration);
      return {
        index: i + 1,
        timestamp,
        cueIndex: cue.index,
      };
    });
  }
}
