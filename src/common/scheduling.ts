export const APPOINTMENT_DURATION_MINUTES = 60;
export const OVERLAP_WINDOW_MINUTES = 30;

const MINUTE_MS = 60 * 1000;
const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

export type TimePeriod = 'AM' | 'PM';

export function isTimeOfDay(value: string): boolean {
  return TIME_OF_DAY_PATTERN.test(value);
}

/** Minutes since midnight for an `HH:mm` value. */
export function minutesOfDay(slot: string): number {
  const match = TIME_OF_DAY_PATTERN.exec(slot);
  if (!match) {
    throw new Error(`Invalid time of day: ${slot}`);
  }
  return parseInt(match[1], 10) * 60 + parseInt(match[2], 10);
}

/** `HH:mm` of an instant, read in UTC. */
export function timeOfDay(instant: Date): string {
  const hours = instant.getUTCHours().toString().padStart(2, '0');
  const minutes = instant.getUTCMinutes().toString().padStart(2, '0');
  return `${hours}:${minutes}`;
}

/** True when the instant has no seconds or milliseconds past the minute. */
export function isWholeMinute(instant: Date): boolean {
  return instant.getUTCSeconds() === 0 && instant.getUTCMilliseconds() === 0;
}

/** `YYYY-MM-DD` of an instant, read in UTC. */
export function calendarDate(instant: Date): string {
  return instant.toISOString().slice(0, 10);
}


export function dayBounds(date: string): { startOfDay: Date; endOfDay: Date } {
  return {
    startOfDay: new Date(`${date}T00:00:00.000Z`),
    endOfDay: new Date(`${date}T23:59:59.999Z`),
  };
}

export function addMinutes(instant: Date, minutes: number): Date {
  return new Date(instant.getTime() + minutes * MINUTE_MS);
}

export function overlapWindow(instant: Date): { from: Date; to: Date } {
  return {
    from: addMinutes(instant, -OVERLAP_WINDOW_MINUTES),
    to: addMinutes(instant, OVERLAP_WINDOW_MINUTES),
  };
}

export function isInPeriod(slot: string, period: TimePeriod): boolean {
  const beforeNoon = minutesOfDay(slot) < 12 * 60;
  return period === 'AM' ? beforeNoon : !beforeNoon;
}
