import * as cron from "node-cron";
import { CleanupExpiredJobsUseCase } from "../../application/use-cases/cleanup-expired-jobs.use-case";

export class JobCleanupCron {
  private task: cron.ScheduledTask | null = null;
  private isRunning = false;

  constructor(
    private cleanupExpiredJobsUseCase: CleanupExpiredJobsUseCase,
    private schedule = "0 * * * *"
  ) {}

  /**
   * Start the cron job (hourly unless another schedule was given)
   */
  start(): void {
    if (this.task) {
      console.log("[JobCleanupCron] Cron job is already running");
      return;
    }

    this.task = cron.schedule(this.schedule, () => this.runOnce());

    console.log(`[JobCleanupCron] Started cron job to remove expired jobs (schedule: ${this.schedule})`);
  }

  async runOnce(): Promise<void> {
    if (this.isRunning) {
      console.log("[JobCleanupCron] Previous run is still in progress, skipping this execution");
      return;
    }

    this.isRunning = true;
    const startTime = Date.now();

    try {
      console.log("[JobCleanupCron] Starting job cleanup cycle...");
      const result = await this.cleanupExpiredJobsUseCase.execute();
      const duration = Date.now() - startTime;

      if (result.jobsDeleted === 0 && result.failures.length === 0) {
        console.log("[JobCleanupCron] No expired jobs found");
      } else {
        console.log(
          `[JobCleanupCron] Cleanup cycle completed in ${duration}ms: ` +
            `${result.jobsDeleted} jobs and ${result.artifactsDeleted} artifacts removed`
        );
      }
      if (result.failures.length > 0) {
        console.warn(`[JobCleanupCron] Could not remove: ${result.failures.join(", ")}`);
      }
    } catch (error) {
      const duration = Date.now() - startTime;
      console.error(`[JobCleanupCron] Error in cleanup cycle (${duration}ms):`, error);
    } finally {
      this.isRunning = false;
    }
  }

  /**
   * Stop the cron job
   */
  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      console.log("[JobCleanupCron] Stopped cron job");
    }
  }

  isActive(): boolean {
    return this.task !== null;
  }
}
