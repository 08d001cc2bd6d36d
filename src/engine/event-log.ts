import type { GovernanceEvent, LoggedEvent } from '../shared/events.js';
import type { TimeSource } from './clock.js';
import { systemClock } from './clock.js';

type LogListener = (entry: LoggedEvent) => void;

/**
 * Ordered, externally observable record of committed engine events.
 * Keeps the most recent `capacity` entries; sequence numbers never repeat.
 */
export class EventLog {
  private entries: LoggedEvent[] = [];
  private nextSequence = 1;
  private listeners = new Set<LogListener>();

  constructor(
    private capacity = 1000,
    private clock: TimeSource = systemClock,
  ) {
    if (capacity < 1) {
      throw new Error('EventLog capacity must be at least 1');
    }
  }

  append(event: GovernanceEvent): LoggedEvent {
    const entry: LoggedEvent = {
      sequence: this.nextSequence++,
      recordedAt: this.clock.now(),
      event,
    };
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
    for (const listener of this.listeners) {
      listener(entry);
    }
    return entry;
  }

  /** Entries with a sequence greater than `sequence`, oldest first. */
  since(sequence = 0, limit?: number): LoggedEvent[] {
    const found = this.entries.filter((e) => e.sequence > sequence);
    return limit === undefined ? found : found.slice(0, limit);
  }

  latestSequence(): number {
    return this.nextSequence - 1;
  }

  subscribe(listener: LogListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  get size(): number {
    return this.entries.length;
  }
}
