/**
 * Parses the date formats the inventory API hands back in custom attributes.
 * All results are local time; anything unrecognised or out of range is null.
 */

interface DateParts {
  year: number;
  month: number;
  day: number;
  hour?: number;
  minute?: number;
  second?: number;
  millisecond?: number;
}

type FormatParser = (match: RegExpExecArray) => DateParts;

const FORMATS: ReadonlyArray<readonly [RegExp, FormatParser]> = [
  // 15.01.2026 14:30
  [
    /^(\d{2})\.(\d{2})\.(\d{4}) (\d{2}):(\d{2})$/,
    (m) => ({ day: +m[1], month: +m[2], year: +m[3], hour: +m[4], minute: +m[5] }),
  ],
  // 15.01.2026
  [/^(\d{2})\.(\d{2})\.(\d{4})$/, (m) => ({ day: +m[1], month: +m[2], year: +m[3] })],
  // 2026-01-15 14:30:00 and 2026-01-15 14:30:00.000
  [
    /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))?$/,
    (m) => ({
      year: +m[1],
      month: +m[2],
      day: +m[3],
      hour: +m[4],
      minute: +m[5],
      second: +m[6],
      millisecond: m[7] ? Math.floor(+`0.${m[7]}` * 1000) : 0,
    }),
  ],
  // 2026-01-15
  [/^(\d{4})-(\d{2})-(\d{2})$/, (m) => ({ year: +m[1], month: +m[2], day: +m[3] })],
];

function toDate(parts: DateParts): Date | null {
  const date = new Date(
    parts.year,
    parts.month - 1,
    parts.day,
    parts.hour ?? 0,
    parts.minute ?? 0,
    parts.second ?? 0,
    parts.millisecond ?? 0,
  );

  // Date rolls 31.02 over into March; reject instead
  if (
    date.getFullYear() !== parts.year ||
    date.getMonth() !== parts.month - 1 ||
    date.getDate() !== parts.day ||
    date.getHours() !== (parts.hour ?? 0) ||
    date.getMinutes() !== (parts.minute ?? 0)
  ) {
    return null;
  }

  return date;
}

export function parseDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value !== 'string') return null;

  const input = value.trim();
  for (const [pattern, parse] of FORMATS) {
    const match = pattern.exec(input);
    if (match) return toDate(parse(match));
  }

  return null;
}
