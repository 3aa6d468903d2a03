export interface TimestampParts {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
}

// Written zero-padded; hand-edited lines with unpadded fields still read
const TIMESTAMP_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{1,2}):(\d{1,2})$/;

function pad(value: number, length = 2): string {
  return value.toString().padStart(length, '0');
}

/**
 * Local wall-clock time as stored in the expense file (YYYY-MM-DD HH:MM:SS).
 */
export function formatTimestamp(date: Date): string {
  const day = `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * Strict parse of a stored timestamp. Returns null for anything that is not a
 * real calendar date and time in the stored format.
 */
export function parseTimestamp(value: string): TimestampParts | null {
  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) return null;

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);

  if (year < 1 || month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  return { year, month, day, hour, minute, second };
}

export function daysInMonth(year: number, month: number): number {
  // setFullYear keeps years below 100 literal, unlike the Date constructor
  const date = new Date(2000, 0, 1);
  date.setFullYear(year, month, 0);
  return date.getDate();
}

export function monthLabel(month: number): string {
  const date = new Date(2000, month - 1, 1);
  return date.toLocaleString('en-US', { month: 'long' });
}
