/**
 * Comparable ordinal for a log timestamp: epoch milliseconds and the
 * microseconds within that millisecond. Kept apart because epoch microseconds
 * leave the safe integer range for distant dates.
 */
export type TimestampOrdinal = readonly [epochMs: number, micros: number];

/** Ordinal of anything that could not be parsed; sorts before all others. */
export const UNPARSEABLE_TIMESTAMP: TimestampOrdinal = [Number.NEGATIVE_INFINITY, 0];

type TimestampFormat = {
  name: string;
  pattern: RegExp;
};

/**
 * Known timestamp layouts, tried in this order. The first layout whose
 * pattern matches decides the result; there is no further disambiguation.
 */
export const TIMESTAMP_FORMATS: readonly TimestampFormat[] = [
  {
    name: 'iso-fraction-z',
    pattern:
      /^(\d{4})-(\d{1,2})-(\d{1,2})T(\d{1,2}):(\d{1,2}):(\d{1,2})\.(\d{1,6})Z$/,
  },
  {
    name: 'space-fraction',
    pattern:
      /^(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{1,2}):(\d{1,2})\.(\d{1,6})$/,
  },
  {
    name: 'iso-fraction',
    pattern:
      /^(\d{4})-(\d{1,2})-(\d{1,2})T(\d{1,2}):(\d{1,2}):(\d{1,2})\.(\d{1,6})$/,
  },
];

export function normalizeTimestamp(raw: string | null | undefined): TimestampOrdinal {
  if (typeof raw !== 'string' || !raw) {
    return UNPARSEABLE_TIMESTAMP;
  }
  for (const format of TIMESTAMP_FORMATS) {
    const match = format.pattern.exec(raw);
    if (!match) continue;
    const ordinal = toOrdinal(match);
    if (ordinal !== undefined) {
      return ordinal;
    }
  }
  return UNPARSEABLE_TIMESTAMP;
}

export function compareOrdinals(a: TimestampOrdinal, b: TimestampOrdinal): number {
  for (let i = 0; i < a.length; i++) {
    if (a[i] < b[i]) return -1;
    if (a[i] > b[i]) return 1;
  }
  return 0;
}

function toOrdinal(match: RegExpExecArray): TimestampOrdinal | undefined {
  const [year, month, day, hour, minute, second] = match
    .slice(1, 7)
    .map((part) => Number(part));
  const fraction = match[7] ?? '';
  if (hour > 23 || minute > 59 || second > 59) {
    return undefined;
  }

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);
  // Date rolls invalid calendar days over (Feb 30 -> Mar 2); reject those.
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return undefined;
  }

  const micros = Number(fraction.padEnd(6, '0'));
  return [date.getTime() + Math.floor(micros / 1000), micros % 1000];
}
