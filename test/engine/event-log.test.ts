import { describe, it, expect } from 'vitest';
import { EventLog } from '@/engine/event-log.js';
import { ManualClock } from '@/engine/clock.js';
import type { GovernanceEvent } from '@/shared/events.js';

function deactivated(address: string): GovernanceEvent {
  return { type: 'voter:deactivated', address };
}

describe('EventLog', () => {
  it('assigns increasing sequence numbers and timestamps', () => {
    const clock = new ManualClock(100);
    const log = new EventLog(10, clock);
    const first = log.append(deactivated('a'));
    clock.advance(5);
    const second = log.append(deactivated('b'));

    expect(first).toEqual({ sequence: 1, recordedAt: 100, event: deactivated('a') });
    expect(second).toEqual({ sequence: 2, recordedAt: 105, event: deactivated('b') });
    expect(log.latestSequence()).toBe(2);
  });

  it('returns entries after a sequence, with an optional limit', () => {
    const log = new EventLog(10, new ManualClock());
    for (const address of ['a', 'b', 'c', 'd']) log.append(deactivated(address));

    expect(log.since(2).map((e) => e.sequence)).toEqual([3, 4]);
    expect(log.since(0, 2).map((e) => e.sequence)).toEqual([1, 2]);
    expect(log.since(4)).toEqual([]);
  });

  it('keeps only the most recent entries', () => {
    const log = new EventLog(2, new ManualClock());
    for (const address of ['a', 'b', 'c']) log.append(deactivated(address));

    expect(log.size).toBe(2);
    expect(log.since().map((e) => e.sequence)).toEqual([2, 3]);
    expect(log.latestSequence()).toBe(3);
  });

  it('notifies subscribers until they unsubscribe', () => {
    const log = new EventLog(10, new ManualClock());
    const seen: number[] = [];
    const unsubscribe = log.subscribe((entry) => seen.push(entry.sequence));
    log.append(deactivated('a'));
    unsubscribe();
    log.append(deactivated('b'));
    expect(seen).toEqual([1]);
  });

  it('rejects a capacity below one', () => {
    expect(() => new EventLog(0)).toThrow('EventLog capacity must be at least 1');
  });
});
