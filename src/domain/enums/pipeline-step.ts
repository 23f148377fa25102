export const PipelineSteps = [
  "queued",
  "prepare",
  "metadata",
  "download_video",
  "fetch_subtitles",
  "ai_transcription",
  "subtitle_optimize",
  "subtitle_parse",
  "keyframe_selection",
  "translate",
  "frame_capture",
  "frame_optimize",
  "ai_outline",
  "finalize",
  "complete",
] as const;

export type PipelineStep = typeof PipelineSteps[number];

// Terminal markers that only ever appear in history, never as a runnable step
export type TerminalStep = "failed" | "cancelled";

export type HistoryStep = PipelineStep | TerminalStep;
