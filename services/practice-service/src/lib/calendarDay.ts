/**
 * UTC calendar-day helpers. "Once per day" everywhere in the service means
 * once per UTC date of the finish timestamp.
 */
import type { DayWindow } from "../types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export function utcDateOnly(d: Date): Date {
  return new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate()));
}

export function addDaysUtc(d: Date, n: number): Date {
  return new Date(d.getTime() + n * DAY_MS);
}

export function toDateStringUtc(d: Date): string {
  return d.toISOString().slice(0, 10); // YYYY-MM-DD
}

export function utcDayWindow(now: Date): DayWindow {
  const dayStart = utcDateOnly(now);
  return {
    dayStart,
    dayEnd: addDaysUtc(dayStart, 1),
    dayKey: toDateStringUtc(dayStart),
  };
}

export function isWithinWindow(t: Date, window: DayWindow): boolean {
  return t >= window.dayStart && t < window.dayEnd;
}

export function toEpochSeconds(d: Date): number {
  return Math.floor(d.getTime() / 1000);
}
