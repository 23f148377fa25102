export const JobStatuses = ["queued", "running", "completed", "failed", "cancelled"] as const;

export type JobStatus = typeof JobStatuses[number];

export function isTerminalStatus(status: JobStatus): boolean {
  return status === "completed" || status === "failed" || status === "cancelled";
}
