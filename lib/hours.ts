import { z } from 'zod';

const MINUTES_IN_DAY = 24 * 60;
const MINUTES_IN_WEEK = MINUTES_IN_DAY * 7;

// day: 0 = Sunday, time: "HHMM" (same shape as Google Places opening_hours.periods)
export const DayTimeSchema = z.object({
  day: z.number().int().min(0).max(6),
  time: z.string().regex(/^([01]\d|2[0-3])[0-5]\d$/, 'time must be HHMM'),
});

export const SchedulePeriodSchema = z.object({
  open: DayTimeSchema,
  close: DayTimeSchema.optional(),
});

export type DayTime = z.infer<typeof DayTimeSchema>;
export type SchedulePeriod = z.infer<typeof SchedulePeriodSchema>;

function toMinuteOfWeek(t: DayTime): number {
  const hours = parseInt(t.time.slice(0, 2), 10);
  const minutes = parseInt(t.time.slice(2), 10);
  return t.day * MINUTES_IN_DAY + hours * 60 + minutes;
}

function minuteOfWeek(date: Date): number {
  return date.getDay() * MINUTES_IN_DAY + date.getHours() * 60 + date.getMinutes();
}

/**
 * Weekly open/close schedule in local time.
 *
 * A single period opening Sunday 00:00 with no close means open around the
 * clock. A schedule with no periods never opens.
 */
export class WeeklySchedule {
  readonly periods: readonly SchedulePeriod[];
  private readonly intervals: Array<{ start: number; end: number }>;
  private readonly alwaysOpen: boolean;

  constructor(periods: SchedulePeriod[]) {
    this.periods = periods;
    this.alwaysOpen =
      periods.length === 1 && !periods[0].close && toMinuteOfWeek(periods[0].open) === 0;

    this.intervals = periods.map(period => {
      const start = toMinuteOfWeek(period.open);
      let end = period.close ? toMinuteOfWeek(period.close) : start + MINUTES_IN_DAY;
      // Closing on an earlier weekday wraps past Saturday night
      if (end <= start) end += MINUTES_IN_WEEK;
      return { start, end };
    });
  }

  isOpenAt(date: Date): boolean {
    if (this.alwaysOpen) return true;
    const m = minuteOfWeek(date);
    return this.intervals.some(
      ({ start, end }) => (m >= start && m < end) || (m + MINUTES_IN_WEEK >= start && m + MINUTES_IN_WEEK < end)
    );
  }

  /**
   * Next time an opening period starts strictly after `date`, within a week.
   * Null when the schedule has no openings (or never closes).
   */
  nextOpeningAfter(date: Date): Date | null {
    if (this.alwaysOpen || this.intervals.length === 0) return null;

    const m = minuteOfWeek(date);
    let best = Infinity;
    for (const { start } of this.intervals) {
      let delta = (((start - m) % MINUTES_IN_WEEK) + MINUTES_IN_WEEK) % MINUTES_IN_WEEK;
      if (delta === 0) delta = MINUTES_IN_WEEK;
      best = Math.min(best, delta);
    }

    const next = new Date(date.getTime());
    next.setSeconds(0, 0);
    next.setMinutes(next.getMinutes() + best);
    return next;
  }
}
