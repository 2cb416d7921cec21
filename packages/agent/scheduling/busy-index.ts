import type { CalendarEvent } from '@timekeeper/appstore';

export interface BusyInterval {
  start: Date;
  end: Date;
}

/**
 * Occupied intervals of a query range, ordered by start. Intervals may
 * overlap; empty or inverted ones are dropped.
 */
export class BusyIndex {
  private readonly items: readonly BusyInterval[];

  constructor(intervals: Iterable<BusyInterval>) {
    this.items = [...intervals]
      .filter((i) => i.start.getTime() < i.end.getTime())
      .map((i) => ({ start: new Date(i.start), end: new Date(i.end) }))
      .sort((a, b) => a.start.getTime() - b.start.getTime());
  }

  static fromEvents(events: Iterable<Pick<CalendarEvent, 'start' | 'end'>>): BusyIndex {
    const intervals: BusyInterval[] = [];
    for (const event of events) intervals.push({ start: event.start, end: event.end });
    return new BusyIndex(intervals);
  }

  static empty(): BusyIndex {
    return new BusyIndex([]);
  }

  get intervals(): readonly BusyInterval[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }

  /** First interval with `start <= instant < end`. */
  containing(instant: Date): BusyInterval | undefined {
    const t = instant.getTime();
    for (const interval of this.items) {
      if (interval.start.getTime() > t) break;
      if (t < interval.end.getTime()) return interval;
    }
    return undefined;
  }

  /** Earliest interval start strictly after `instant`. */
  nextStartAfter(instant: Date): Date | undefined {
    const t = instant.getTime();
    let lo = 0;
    let hi = this.items.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const item = this.items[mid];
      if (item && item.start.getTime() <= t) lo = mid + 1;
      else hi = mid;
    }
    return this.items[lo]?.start;
  }
}
