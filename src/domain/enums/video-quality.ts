export const VideoQualities = ["360", "480", "720", "1080"] as const;

export type VideoQuality = typeof VideoQualities[number];

export function isVideoQuality(value: unknown): value is VideoQuality {
  return typeof value === "string" && (VideoQualities as readonly string[]).includes(value);
}

export function qualityToHeight(quality: VideoQuality): number {
  return parseInt(quality, 10);
}
