/**
 * Timezone helpers for the daily schedules. All wall-clock decisions (is it past the
 * sweep hour yet, which day is "today") are made in the configured timezone.
 */

export interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
}

export function getZonedParts(date: Date, timeZone: string): ZonedParts {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  });
  const parts = formatter.formatToParts(date);
  const get = (type: Intl.DateTimeFormatPartTypes) =>
    parseInt(parts.find((p) => p.type === type)?.value || '0', 10);

  return {
    year: get('year'),
    month: get('month'),
    day: get('day'),
    hour: get('hour'),
    minute: get('minute'),
  };
}

/** YYYY-MM-DD of `date` in the given timezone */
export function getZonedDateKey(date: Date, timeZone: string): string {
  return date.toLocaleDateString('en-CA', { timeZone });
}

/**
 * True once the wall clock in `timeZone` is past `hour:00` today. At exactly `hour:00`
 * the scheduled run is due itself, so this is still false.
 */
export function isPastHourToday(now: Date, hour: number, timeZone: string): boolean {
  const parts = getZonedParts(now, timeZone);
  return parts.hour > hour || (parts.hour === hour && parts.minute > 0);
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}
