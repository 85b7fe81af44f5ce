export interface Clock {
  now(): number;           // Epoch milliseconds
  currentHour(): number;   // Local hour, 0-23
}

export const systemClock: Clock = {
  now: () => Date.now(),
  currentHour: () => new Date().getHours()
};

const CLOCK_PATTERN = /(?:^|\D)(\d{1,2}):(\d{2})/;

export function parsePublished(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const timestamp = Date.parse(value);
  return Number.isNaN(timestamp) ? undefined : timestamp;
}

/**
 * HH:MM as written in the feed's own date string, so the feed's timezone is kept
 * instead of being converted to the host's.
 */
export function feedClockTime(published: string | undefined): string | undefined {
  if (!published || parsePublished(published) === undefined) return undefined;
  const match = published.match(CLOCK_PATTERN);
  if (!match) return undefined;
  return `${match[1].padStart(2, '0')}:${match[2]}`;
}

export function formatUtcTime(timestamp: number): string {
  const date = new Date(timestamp);
  const hours = String(date.getUTCHours()).padStart(2, '0');
  const minutes = String(date.getUTCMinutes()).padStart(2, '0');
  return `${hours}:${minutes}`;
}

export function formatUtcDate(timestamp: number): string {
  return new Date(timestamp).toLocaleDateString('en-US', {
    weekday: 'long',
    year: 'numeric',
    month: 'long',
    day: '2-digit',
    timeZone: 'UTC'
  });
}

export function formatTimestamp(timestamp: number): string {
  return new Date(timestamp).toISOString().replace('T', ' ').slice(0, 19);
}
