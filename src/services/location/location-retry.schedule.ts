/**
 * Location retry schedule
 * Bounded exponential backoff: delay_k = min(base * 2^k, cap), k = 0..maxAttempts-1.
 * With the defaults: 2s, 4s, 8s, 16s, 30s.
 */

import type { ScheduledTask, Scheduler } from '../../lib/reliability/scheduler.js';

export interface RetrySchedule {
  /** Attempts already fired */
  attempt: number;
  nextDelay: number;
  maxAttempts: number;
  cap: number;
}

export interface RetryPolicy {
  baseDelayMs: number;
  capMs: number;
  maxAttempts: number;
}

export const LOCATION_RETRY_POLICY: RetryPolicy = {
  baseDelayMs: 2_000,
  capMs: 30_000,
  maxAttempts: 5
};

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * Math.pow(2, attempt), policy.capMs);
}

export type RetryHaltReason = 'fix_obtained' | 'permission_blocked' | 'exhausted' | 'stopped';

/**
 * Drives one retry schedule. onAttempt runs when a delay elapses;
 * the owner decides whether to keep going by calling halt().
 */
export class LocationRetryScheduler {
  private schedule: RetrySchedule | null = null;
  private pending: ScheduledTask | null = null;
  private haltReason: RetryHaltReason | null = null;

  constructor(
    private readonly scheduler: Scheduler,
    private readonly onAttempt: (attempt: number) => void,
    private readonly policy: RetryPolicy = LOCATION_RETRY_POLICY
  ) {}

  get state(): Readonly<RetrySchedule> | null {
    return this.schedule ? { ...this.schedule } : null;
  }

  get isRunning(): boolean {
    return this.schedule !== null;
  }

  get lastHaltReason(): RetryHaltReason | null {
    return this.haltReason;
  }

  start(): void {
    if (this.schedule) return;
    this.haltReason = null;
    this.schedule = {
      attempt: 0,
      nextDelay: backoffDelay(this.policy, 0),
      maxAttempts: this.policy.maxAttempts,
      cap: this.policy.capMs
    };
    this.armNext();
  }

  halt(reason: RetryHaltReason): void {
    if (!this.schedule) return;
    this.pending?.cancel();
    this.pending = null;
    this.schedule = null;
    this.haltReason = reason;
  }

  private armNext(): void {
    const schedule = this.schedule;
    if (!schedule) return;

    if (schedule.attempt >= schedule.maxAttempts) {
      this.halt('exhausted');
      return;
    }

    this.pending = this.scheduler.schedule(schedule.nextDelay, () => {
      this.pending = null;
      // Halted while the timer was pending
      if (this.schedule !== schedule) return;

      schedule.attempt += 1;
      schedule.nextDelay = backoffDelay(this.policy, schedule.attempt);
      this.onAttempt(schedule.attempt);
      this.armNext();
    });
  }
}
