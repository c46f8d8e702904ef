const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/;

const SNAPSHOT_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;

function offsetMinutes(zone: string | undefined): number {
  if (!zone || zone === 'Z') return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  return sign * (hours * 60 + minutes);
}

/**
 * Parses ISO-8601 dates and date-times. A value without an offset is read as
 * UTC. Returns null for anything that is not a real calendar instant.
 */
export function parseIsoTimestamp(value: string): Date | null {
  const match = ISO_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, year, month, day, hour = '0', minute = '0', second = '0', fraction = '', zone] = match;
  const parts = [year, month, day, hour, minute, second].map(Number);
  const [y, mo, d, h, mi, s] = parts;
  if (mo < 1 || mo > 12 || h > 23 || mi > 59 || s > 59) return null;

  const millis = fraction ? Number(fraction.padEnd(3, '0').slice(0, 3)) : 0;
  const utc = Date.UTC(y, mo - 1, d, h, mi, s, millis);
  const calendar = new Date(Date.UTC(y, mo - 1, d));
  if (calendar.getUTCFullYear() !== y || calendar.getUTCMonth() !== mo - 1 || calendar.getUTCDate() !== d) {
    return null;
  }

  const zoneMinutes = offsetMinutes(zone);
  if (Math.abs(zoneMinutes) > 18 * 60) return null;
  return new Date(utc - zoneMinutes * 60_000);
}

// Only `YYYY-MM-DDTHH:MM:SSZ`, the form used in snapshots and raw CSV files.
export function parseSnapshotTimestamp(value: string): Date | null {
  return SNAPSHOT_PATTERN.test(value) ? parseIsoTimestamp(value) : null;
}

export function formatTimestamp(value: Date): string {
  return `${value.toISOString().slice(0, 19)}Z`;
}
