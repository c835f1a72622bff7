import { NonNegativeSpan, ISODate, TimeOfDayString } from "@showtime/shared";
import { z } from "zod";

const MS_PER_SECOND = 1000;
const SECONDS_PER_DAY = 24 * 60 * 60;

/** Non-negative span of time, kept in milliseconds. */
export class Duration {
  private constructor(private readonly ms: number) {}

  static ofMinutes(minutes: number) {
    return new Duration(NonNegativeSpan.parse(minutes) * 60 * MS_PER_SECOND);
  }

  static ofSeconds(seconds: number) {
    return new Duration(NonNegativeSpan.parse(seconds) * MS_PER_SECOND);
  }

  toMillis() {
    return this.ms;
  }

  toMinutes() {
    return this.ms / (60 * MS_PER_SECOND);
  }
}

const Component = {
  hour: z.number().int().min(0).max(23),
  minute: z.number().int().min(0).max(59),
  second: z.number().int().min(0).max(59)
};

/**
 * Wall-clock time with no date. Arithmetic wraps at midnight, so two values
 * only order correctly within a single day; use {@link TimeOfDay.atDay} to get
 * an instant before comparing session intervals.
 */
export class TimeOfDay {
  private constructor(
    readonly hour: number,
    readonly minute: number,
    readonly second: number
  ) {}

  static of(hour: number, minute = 0, second = 0) {
    return new TimeOfDay(
      Component.hour.parse(hour),
      Component.minute.parse(minute),
      Component.second.parse(second)
    );
  }

  static parse(text: string) {
    const [h, m, s = "0"] = TimeOfDayString.parse(text).split(":");
    return new TimeOfDay(Number(h), Number(m), Number(s));
  }

  private static fromSecondOfDay(value: number) {
    const wrapped = ((value % SECONDS_PER_DAY) + SECONDS_PER_DAY) % SECONDS_PER_DAY;
    return new TimeOfDay(Math.floor(wrapped / 3600), Math.floor((wrapped % 3600) / 60), wrapped % 60);
  }

  get secondOfDay() {
    return this.hour * 3600 + this.minute * 60 + this.second;
  }

  plus(duration: Duration) {
    return TimeOfDay.fromSecondOfDay(this.secondOfDay + Math.floor(duration.toMillis() / MS_PER_SECOND));
  }

  compare(other: TimeOfDay) {
    return Math.sign(this.secondOfDay - other.secondOfDay);
  }

  isBefore(other: TimeOfDay) {
    return this.compare(other) < 0;
  }

  equals(other: TimeOfDay) {
    return this.compare(other) === 0;
  }

  /** Instant at which this time falls on `day` (YYYY-MM-DD), in UTC. */
  atDay(day: string) {
    const midnight = new Date(`${ISODate.parse(day)}T00:00:00Z`);
    return new Date(midnight.getTime() + this.secondOfDay * MS_PER_SECOND);
  }

  toString() {
    const pad = (n: number) => String(n).padStart(2, "0");
    return `${pad(this.hour)}:${pad(this.minute)}:${pad(this.second)}`;
  }
}

export function addDuration(instant: Date, duration: Duration) {
  return new Date(instant.getTime() + duration.toMillis());
}
