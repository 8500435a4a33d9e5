import type { AppModule } from '@/app/app-context';
import type { SchedulingPort, TimerHandle } from '@/app/scheduling';
import { isNetworkFailure } from '@/services/radar-status';

export type PollPhase = 'idle' | 'blocked' | 'executing';

export type CheckTrigger = 'warmup' | 'interval' | 'visibility' | 'manual';

export type CheckOutcome =
  | { status: 'blocked'; remainingMs: number }
  | { status: 'busy' }
  | { status: 'stopped' }
  | { status: 'completed'; changed: boolean }
  | { status: 'failed'; error: unknown };

export interface PollState {
  readonly lastCheckTime: number | null;
  readonly cooldownMs: number;
  readonly intervalMs: number;
}

// Interval ticks can land slightly early by now().
const INTERVAL_TICK_SLACK_MS = 1_000;

export interface PollingSchedulerOptions {
  intervalMs: number;
  /** Defaults to intervalMs. Must not exceed it. */
  cooldownMs?: number;
  warmupMs: number;
  onUnexpectedError?: (err: unknown) => void;
}

export class PollingScheduler implements AppModule {
  private readonly check: () => Promise<boolean>;
  private readonly timers: SchedulingPort;
  private readonly intervalMs: number;
  private readonly cooldownMs: number;
  private readonly warmupMs: number;
  private readonly onUnexpectedError?: (err: unknown) => void;

  private lastCheckTime: number | null = null;
  private executing = false;
  private blockedUntil: number | null = null;
  private warmupTimer: TimerHandle | null = null;
  private intervalTimer: TimerHandle | null = null;
  private destroyed = false;

  constructor(check: () => Promise<boolean>, timers: SchedulingPort, options: PollingSchedulerOptions) {
    const cooldownMs = options.cooldownMs ?? options.intervalMs;
    if (cooldownMs > options.intervalMs) {
      throw new RangeError(`Cooldown ${cooldownMs}ms exceeds poll interval ${options.intervalMs}ms`);
    }
    this.check = check;
    this.timers = timers;
    this.intervalMs = options.intervalMs;
    this.cooldownMs = cooldownMs;
    this.warmupMs = options.warmupMs;
    this.onUnexpectedError = options.onUnexpectedError;
  }

  init(): void {
    if (this.destroyed || this.warmupTimer || this.intervalTimer) return;
    this.warmupTimer = this.timers.delay(() => {
      this.warmupTimer = null;
      void this.requestCheck('warmup');
      if (this.destroyed) return;
      this.intervalTimer = this.timers.repeat(() => void this.requestCheck('interval'), this.intervalMs);
    }, this.warmupMs);
  }

  destroy(): void {
    this.destroyed = true;
    this.warmupTimer?.cancel();
    this.warmupTimer = null;
    this.intervalTimer?.cancel();
    this.intervalTimer = null;
  }

  /** `blocked` lasts until the cooldown that rejected the last request runs out. */
  getPhase(): PollPhase {
    if (this.executing) return 'executing';
    if (this.blockedUntil !== null && this.timers.now() < this.blockedUntil) return 'blocked';
    return 'idle';
  }

  getState(): PollState {
    return { lastCheckTime: this.lastCheckTime, cooldownMs: this.cooldownMs, intervalMs: this.intervalMs };
  }

  /**
   * Runs a freshness check unless one is executing or the previous dispatch
   * is younger than the cooldown. The slot is taken before the check runs,
   * so a failed check still holds it.
   */
  async requestCheck(trigger: CheckTrigger = 'manual'): Promise<CheckOutcome> {
    if (this.destroyed) return { status: 'stopped' };
    if (this.executing) {
      console.log(`[Freshness] ${trigger} check skipped, previous check still running`);
      return { status: 'busy' };
    }

    const now = this.timers.now();
    if (this.lastCheckTime !== null) {
      const elapsed = now - this.lastCheckTime;
      const slack = trigger === 'interval' ? INTERVAL_TICK_SLACK_MS : 0;
      // A negative elapsed means the clock went backwards: the window is treated as expired.
      if (elapsed >= 0 && elapsed < this.cooldownMs - slack) {
        const remainingMs = this.cooldownMs - elapsed;
        this.blockedUntil = now + remainingMs;
        console.log(`[Freshness] ${trigger} check blocked by cooldown, ${Math.ceil(remainingMs / 1000)}s remaining`);
        return { status: 'blocked', remainingMs };
      }
    }

    this.lastCheckTime = now;
    this.blockedUntil = null;
    this.executing = true;
    try {
      const changed = await this.check();
      return { status: 'completed', changed };
    } catch (err) {
      if (isNetworkFailure(err)) {
        console.warn(`[Freshness] ${trigger} check failed:`, err.message);
      } else {
        console.error(`[Freshness] ${trigger} check crashed:`, err);
        this.onUnexpectedError?.(err);
      }
      return { status: 'failed', error: err };
    } finally {
      this.executing = false;
    }
  }
}
