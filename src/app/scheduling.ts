export interface TimerHandle {
  cancel(): void;
}

/**
 * Timer primitives the controllers depend on. The browser implementation
 * wraps the global timers; tests drive a virtual clock instead.
 */
export interface SchedulingPort {
  /** Monotonic milliseconds; only differences between readings are meaningful. */
  now(): number;
  delay(fn: () => void, ms: number): TimerHandle;
  repeat(fn: () => void, ms: number): TimerHandle;
}

export const browserScheduling: SchedulingPort = {
  now: () => performance.now(),
  delay(fn, ms) {
    const id = setTimeout(fn, ms);
    return { cancel: () => clearTimeout(id) };
  },
  repeat(fn, ms) {
    const id = setInterval(fn, ms);
    return { cancel: () => clearInterval(id) };
  },
};
