/**
 * Scheduler
 * Timer seam. Production code uses the system timers; tests drive a fake.
 */

export interface ScheduledTask {
  cancel(): void;
}

export interface Scheduler {
  schedule(delayMs: number, task: () => void): ScheduledTask;
}

export const systemScheduler: Scheduler = {
  schedule(delayMs, task) {
    const handle = setTimeout(task, delayMs);
    // Pending retries must not keep the process alive
    handle.unref();
    return { cancel: () => clearTimeout(handle) };
  },
};
