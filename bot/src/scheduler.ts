import logger from "./logger";

export interface ScheduledTask {
  cancel(): void;
}

/** Delayed fire-and-forget jobs. A failing job is logged at debug level and otherwise ignored. */
export class TaskScheduler {
  private pending = new Set<NodeJS.Timeout>();

  schedule(name: string, task: () => Promise<void>, delayMs: number): ScheduledTask {
    const timer = setTimeout(() => {
      this.pending.delete(timer);
      task().catch((err) => logger.debug({ err, task: name }, "Scheduled task failed"));
    }, delayMs);
    this.pending.add(timer);
    return {
      cancel: () => {
        clearTimeout(timer);
        this.pending.delete(timer);
      },
    };
  }

  get size(): number {
    return this.pending.size;
  }

  cancelAll(): void {
    this.pending.forEach((timer) => clearTimeout(timer));
    this.pending.clear();
  }
}
