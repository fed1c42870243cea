import { nextOccurrence, parseTimeOfDay, type TimeOfDay } from '@invoice-bridge/shared';

/**
 * Tracks when the next daily summary is due.
 *
 * The first due instant is the configured time after `start`. Each
 * `advance(now)` moves it to the next occurrence after `now`, so a summary
 * time missed while the process was busy fires once, not once per missed day.
 */
export class DailySummarySchedule {
  private readonly time: TimeOfDay;
  private due: Date;

  constructor(timeOfDay: string, start: Date) {
    const time = parseTimeOfDay(timeOfDay);
    if (time === null) {
      throw new RangeError(`Invalid summary time "${timeOfDay}"`);
    }
    this.time = time;
    this.due = nextOccurrence(start, time);
  }

  get nextDue(): Date {
    return new Date(this.due.getTime());
  }

  isDue(now: Date): boolean {
    return now.getTime() >= this.due.getTime();
  }

  advance(now: Date): void {
    this.due = nextOccurrence(now, this.time);
  }
}
