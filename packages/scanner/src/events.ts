import type { EventLevel, EventSource, ScanEvent } from "./types.js";

export type ScanEventListener = (event: ScanEvent) => void;

/** Source name for events that belong to no single session */
export const SYSTEM_SOURCE = "system";

/**
 * Per-scan structured event log. Subscribers see events as they are emitted;
 * `snapshot()` returns everything so far.
 */
export class ScanEventLog {
  private readonly events: ScanEvent[] = [];
  private readonly listeners = new Set<ScanEventListener>();
  private readonly now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  emit(session: EventSource, level: EventLevel, message: string): ScanEvent {
    const event: ScanEvent = Object.freeze({
      timestamp: this.now().toISOString(),
      session,
      level,
      message,
    });
    this.events.push(event);
    for (const listener of this.listeners) {
      listener(event);
    }
    return event;
  }

  info(session: EventSource, message: string): ScanEvent {
    return this.emit(session, "INFO", message);
  }

  warn(session: EventSource, message: string): ScanEvent {
    return this.emit(session, "WARNING", message);
  }

  error(session: EventSource, message: string): ScanEvent {
    return this.emit(session, "ERROR", message);
  }

  success(session: EventSource, message: string): ScanEvent {
    return this.emit(session, "SUCCESS", message);
  }

  /** Returns an unsubscribe function */
  subscribe(listener: ScanEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  snapshot(): readonly ScanEvent[] {
    return [...this.events];
  }
}
