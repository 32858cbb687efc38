/**
 * Wall-clock readings for IANA timezones using Intl.
 */
import type { ZoneClockReading } from './types.js';

type Parts = Partial<Record<Intl.DateTimeFormatPartTypes, string>>;

function formatParts(zone: string, date: Date, options: Intl.DateTimeFormatOptions): Parts {
  const parts: Parts = {};
  for (const part of new Intl.DateTimeFormat('en-US', { ...options, timeZone: zone }).formatToParts(date)) {
    parts[part.type] = part.value;
  }
  return parts;
}

/**
 * Offset in minutes east of UTC. "GMT" alone means zero.
 */
function offsetMinutes(zone: string, date: Date): number {
  const name = formatParts(zone, date, { timeZoneName: 'longOffset' }).timeZoneName ?? 'GMT';
  const match = /^GMT([+-])(\d{2}):(\d{2})$/.exec(name);
  if (!match) {
    return 0;
  }
  const minutes = Number(match[2]) * 60 + Number(match[3]);
  return match[1] === '-' ? -minutes : minutes;
}

export function formatOffset(minutes: number): string {
  const sign = minutes < 0 ? '-' : '+';
  const abs = Math.abs(minutes);
  const hours = String(Math.floor(abs / 60)).padStart(2, '0');
  const mins = String(abs % 60).padStart(2, '0');
  return `${sign}${hours}:${mins}`;
}

/**
 * Read the clock of `zone` at `now`.
 * Returns undefined for names the runtime's timezone database does not know.
 */
export function readZoneClock(zone: string, now: Date): ZoneClockReading | undefined {
  let parts: Parts;
  try {
    parts = formatParts(zone, now, {
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
      timeZoneName: 'short',
    });
  } catch (error) {
    if (error instanceof RangeError) {
      return undefined;
    }
    throw error;
  }

  const localDate = `${parts.year}-${parts.month}-${parts.day}`;
  const hour = Number(parts.hour);
  const hour12 = String(hour % 12 === 0 ? 12 : hour % 12).padStart(2, '0');
  const offset = offsetMinutes(zone, now);

  // DST adds to the standard offset, so standard time is the smaller of January and July
  const year = now.getUTCFullYear();
  const standard = Math.min(
    offsetMinutes(zone, new Date(Date.UTC(year, 0, 1))),
    offsetMinutes(zone, new Date(Date.UTC(year, 6, 1)))
  );

  return {
    timezone: zone,
    localTime: `${localDate}T${parts.hour}:${parts.minute}:${parts.second}`,
    localDate,
    localTime12h: `${hour12}:${parts.minute} ${hour < 12 ? 'AM' : 'PM'}`,
    utcOffset: formatOffset(offset),
    utcOffsetMinutes: offset,
    abbreviation: parts.timeZoneName ?? formatOffset(offset),
    isDst: offset > standard,
  };
}
