// Date/time utilities with timezone awareness

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function nowISO(): string {
  return new Date().toISOString();
}

/**
 * Whether `Intl.DateTimeFormat` accepts `timezone`
 */
export function isValidTimeZone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch (error) {
    if (error instanceof RangeError) {
      return false;
    }
    throw error;
  }
}

/**
 * Calendar date of `date` in `timezone` as YYYYMMDD
 */
export function formatDateKey(date: Date, timezone = 'UTC'): string {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit'
  });
  const parts = formatter.formatToParts(date);
  const year = parts.find((p) => p.type === 'year')?.value;
  const month = parts.find((p) => p.type === 'month')?.value;
  const day = parts.find((p) => p.type === 'day')?.value;
  if (!year || !month || !day) {
    throw new Error(`Cannot format date ${date.toISOString()} in timezone ${timezone}`);
  }
  return `${year}${month}${day}`;
}

