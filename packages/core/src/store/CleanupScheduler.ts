import { isExpiringSessionRepository, type ExpiringSessionRepository } from "./SessionRepository";
import { invalidConfiguration, type Logger } from "../errors";
import { secondsToMs } from "../utils/time";

export type CleanupSchedulerOptions = {
  intervalSeconds?: number; // default 60
  logger?: Logger;
};

/**
 * Periodically sweeps expired sessions out of a repository.
 */
export class CleanupScheduler {
  private readonly intervalMs: number;
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<number> | null = null;

  constructor(
    private readonly repository: ExpiringSessionRepository,
    private readonly options?: CleanupSchedulerOptions,
  ) {
    if (!isExpiringSessionRepository(repository)) {
      throw invalidConfiguration("CleanupScheduler requires a repository with cleanUpExpiredSessions().");
    }

    const interval = options?.intervalSeconds ?? 60;
    if (!Number.isFinite(interval) || interval <= 0) {
      throw invalidConfiguration("intervalSeconds must be a positive number.", { value: interval });
    }
    this.intervalMs = secondsToMs(interval);
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.sweep().catch((error: unknown) => {
        this.options?.logger?.warn("Scheduled session cleanup failed.", { error });
      });
    }, this.intervalMs);
    this.timer.unref?.();
  }

  /**
   * Runs one sweep now. Overlapping calls share the sweep in flight.
   */
  async sweep(): Promise<number> {
    if (!this.running) {
      this.running = this.repository.cleanUpExpiredSessions().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }
}
