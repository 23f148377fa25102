import { PipelineStep } from "../../domain/enums/pipeline-step";

// Share of the 0-100 progress range each step covers. Sums to 100.
export const STEP_WEIGHTS: ReadonlyArray<readonly [PipelineStep, number]> = [
  ["queued", 5],
  ["prepare", 5],
  ["metadata", 10],
  ["download_video", 18],
  ["fetch_subtitles", 2],
  ["ai_transcription", 10],
  ["subtitle_optimize", 8],
  ["subtitle_parse", 7],
  ["keyframe_selection", 3],
  ["translate", 7],
  ["frame_capture", 11],
  ["frame_optimize", 6],
  ["ai_outline", 6],
  ["finalize", 2],
  ["complete", 0],
];

const START_PROGRESS = new Map<PipelineStep, number>();
const WEIGHT = new Map<PipelineStep, number>();

let cumulative = 0;
for (const [step, weight] of STEP_WEIGHTS) {
  START_PROGRESS.set(step, cumulative);
  WEIGHT.set(step, weight);
  cumulative += weight;
}

export function stepStartProgress(step: PipelineStep): number {
  return START_PROGRESS.get(step) ?? 0;
}

/** Progress part-way through a step; fraction is clamped to [0, 1]. */
export function stepProgress(step: PipelineStep, fraction: number): number {
  const clamped = Math.min(Math.max(fraction, 0), 1);
  return stepStartProgress(step) + Math.floor((WEIGHT.get(step) ?? 0) * clamped);
}
