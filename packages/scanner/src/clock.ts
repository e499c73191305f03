/** Millisecond time source; `performance.now()` in production */
export type TimeSource = () => number;

/**
 * Session-local monotonic clock. Readings start at 0 when the clock is
 * created and are whole milliseconds, never decreasing.
 */
export interface SessionClock {
  now(): number;
}

export function createSessionClock(source: TimeSource = () => performance.now()): SessionClock {
  const origin = source();
  let last = 0;
  return {
    now() {
      const reading = Math.max(last, Math.floor(source() - origin));
      last = reading;
      return reading;
    },
  };
}
