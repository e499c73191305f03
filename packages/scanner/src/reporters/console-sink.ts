import type { ScanEventLog } from "../events.js";
import type { ScanEvent } from "../types.js";

/** The subset of `console` the sink writes to */
export interface ConsoleLike {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function formatEvent(event: ScanEvent): string {
  return `[${event.session}] ${event.message}`;
}

/**
 * Print every event as `[label] message`, routed by level. Returns the
 * unsubscribe function.
 */
export function attachConsoleSink(events: ScanEventLog, out: ConsoleLike = console): () => void {
  return events.subscribe((event) => {
    switch (event.level) {
      case "WARNING":
        out.warn(formatEvent(event));
        break;
      case "ERROR":
        out.error(formatEvent(event));
        break;
      case "INFO":
      case "SUCCESS":
        out.log(formatEvent(event));
        break;
    }
  });
}
