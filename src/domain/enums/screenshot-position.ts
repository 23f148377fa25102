export const ScreenshotPositions = ["start", "middle", "end"] as const;

export type ScreenshotPosition = typeof ScreenshotPositions[number];

export function isScreenshotPosition(value: unknown): value is ScreenshotPosition {
  return typeof value === "string" && (ScreenshotPositions as readonly string[]).includes(value);
}
