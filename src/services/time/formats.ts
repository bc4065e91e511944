/**
 * Rendering and parsing for the supported time format tokens.
 *
 * Parsers return epoch milliseconds, or undefined when the input does not
 * match the layout.
 */
import { utcFromFields, type LocalDateTime, type Zone } from './zone.js';

export const FORMAT_TYPES = [
  'RFC3339',
  'RFC3339Nano',
  'Unix',
  'UnixMilli',
  'UnixMicro',
  'UnixNano',
  'Layout'
] as const;

export type FormatType = typeof FORMAT_TYPES[number];

export function isFormatType(value: string): value is FormatType {
  return FORMAT_TYPES.some(format => format === value);
}

// ECMAScript Date range
const MAX_EPOCH_MS = 8.64e15;

// Four-digit years only
export const MIN_YEAR = 0;
export const MAX_YEAR = 9999;

export function isRenderableYear(year: number): boolean {
  return year >= MIN_YEAR && year <= MAX_YEAR;
}

const RFC3339_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?([Zz]|[+-]\d{2}:\d{2})$/;
const LAYOUT_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2}) ([+-])(\d{2})(\d{2})$/;
const LOCAL_DATETIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const UNIX_SECONDS_PATTERN = /^-?\d+(?:\.\d+)?$/;
const INTEGER_PATTERN = /^-?\d+$/;

function pad(value: number, width = 2): string {
  return value.toString().padStart(width, '0');
}

/**
 * Formats an offset in seconds as ±HH:MM (or ±HHMM without a separator).
 */
export function formatOffset(offsetSeconds: number, separator = ':'): string {
  const sign = offsetSeconds < 0 ? '-' : '+';
  const abs = Math.abs(offsetSeconds);
  const hours = Math.floor(abs / 3600);
  const minutes = Math.floor((abs % 3600) / 60);
  return `${sign}${pad(hours)}${separator}${pad(minutes)}`;
}

function formatWallClock(fields: LocalDateTime, dateTimeSeparator: string): string {
  return `${pad(fields.year, 4)}-${pad(fields.month)}-${pad(fields.day)}` +
    `${dateTimeSeparator}${pad(fields.hour)}:${pad(fields.minute)}:${pad(fields.second)}`;
}

function formatRfc3339(epochMs: number, zone: Zone, withFraction: boolean): string {
  const fields = zone.fieldsAt(epochMs);
  const offset = zone.offsetAt(epochMs);
  const fraction = withFraction && fields.millisecond > 0
    ? '.' + pad(fields.millisecond, 3).replace(/0+$/, '')
    : '';
  const suffix = offset === 0 ? 'Z' : formatOffset(offset);
  return formatWallClock(fields, 'T') + fraction + suffix;
}

/**
 * Renders an instant in the given zone. Unix variants ignore the zone.
 */
export function formatInstant(epochMs: number, zone: Zone, format: FormatType): string {
  switch (format) {
    case 'RFC3339':
      return formatRfc3339(epochMs, zone, false);
    case 'RFC3339Nano':
      return formatRfc3339(epochMs, zone, true);
    case 'Unix':
      return Math.floor(epochMs / 1000).toString();
    case 'UnixMilli':
      return epochMs.toString();
    case 'UnixMicro':
      return (BigInt(epochMs) * 1000n).toString();
    case 'UnixNano':
      return (BigInt(epochMs) * 1000000n).toString();
    case 'Layout': {
      const fields = zone.fieldsAt(epochMs);
      return `${formatWallClock(fields, ' ')} ${formatOffset(zone.offsetAt(epochMs), '')}`;
    }
  }
}

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function daysInMonth(year: number, month: number): number {
  const leap = year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
  return month === 2 && leap ? 29 : DAYS_IN_MONTH[month - 1];
}

function fractionToMillis(fraction: string | undefined): number {
  if (!fraction) {
    return 0;
  }
  return parseInt(fraction.padEnd(3, '0').slice(0, 3), 10);
}

function toLocalDateTime(groups: string[], fraction?: string): LocalDateTime | undefined {
  const [year, month, day, hour, minute, second] = groups.map(g => parseInt(g, 10));
  if (month < 1 || month > 12) return undefined;
  if (day < 1 || day > daysInMonth(year, month)) return undefined;
  if (hour > 23 || minute > 59 || second > 59) return undefined;
  return { year, month, day, hour, minute, second, millisecond: fractionToMillis(fraction) };
}

function withinRange(epochMs: number): number | undefined {
  return Number.isFinite(epochMs) && Math.abs(epochMs) <= MAX_EPOCH_MS ? epochMs : undefined;
}

function offsetFromParts(sign: string, hours: string, minutes: string): number | undefined {
  const h = parseInt(hours, 10);
  const m = parseInt(minutes, 10);
  if (h > 23 || m > 59) {
    return undefined;
  }
  const seconds = h * 3600 + m * 60;
  return sign === '-' ? -seconds : seconds;
}

/** RFC 3339 with an optional fraction of up to nine digits */
export function parseRfc3339(input: string): number | undefined {
  const match = RFC3339_PATTERN.exec(input);
  if (!match) return undefined;

  const local = toLocalDateTime(match.slice(1, 7), match[7]);
  if (!local) return undefined;

  const designator = match[8];
  const offset = designator === 'Z' || designator === 'z'
    ? 0
    : offsetFromParts(designator[0], designator.slice(1, 3), designator.slice(4, 6));
  if (offset === undefined) return undefined;

  return withinRange(utcFromFields(local) - offset * 1000);
}

/** `YYYY-MM-DD HH:mm:ss ±HHMM` */
export function parseLayout(input: string): number | undefined {
  const match = LAYOUT_PATTERN.exec(input);
  if (!match) return undefined;

  const local = toLocalDateTime(match.slice(1, 7));
  if (!local) return undefined;

  const offset = offsetFromParts(match[7], match[8], match[9]);
  if (offset === undefined) return undefined;

  return withinRange(utcFromFields(local) - offset * 1000);
}

/** ISO date-time without an offset, read as wall time in `zone` */
export function parseLocalDateTime(input: string, zone: Zone): number | undefined {
  const match = LOCAL_DATETIME_PATTERN.exec(input);
  if (!match) return undefined;

  const local = toLocalDateTime(match.slice(1, 7), match[7]);
  return local ? withinRange(zone.toEpochMs(local)) : undefined;
}

/** `YYYY-MM-DD`, midnight in `zone` */
export function parseDate(input: string, zone: Zone): number | undefined {
  const match = DATE_PATTERN.exec(input);
  if (!match) return undefined;

  const local = toLocalDateTime([match[1], match[2], match[3], '0', '0', '0']);
  return local ? withinRange(zone.toEpochMs(local)) : undefined;
}

export function parseUnix(input: string, format: 'Unix' | 'UnixMilli' | 'UnixMicro' | 'UnixNano'): number | undefined {
  switch (format) {
    case 'Unix':
      return UNIX_SECONDS_PATTERN.test(input) ? withinRange(Math.round(Number(input) * 1000)) : undefined;
    case 'UnixMilli':
      return INTEGER_PATTERN.test(input) ? withinRange(Number(input)) : undefined;
    case 'UnixMicro':
      return INTEGER_PATTERN.test(input) ? withinRange(Number(BigInt(input) / 1000n)) : undefined;
    case 'UnixNano':
      return INTEGER_PATTERN.test(input) ? withinRange(Number(BigInt(input) / 1000000n)) : undefined;
  }
}

/**
 * Strict parse against a single format token. Zone-less layouts are not
 * accepted here; every token carries its own offset or is epoch based.
 */
export function parseWithFormat(input: string, format: FormatType): number | undefined {
  switch (format) {
    case 'RFC3339':
    case 'RFC3339Nano':
      return parseRfc3339(input);
    case 'Layout':
      return parseLayout(input);
    case 'Unix':
    case 'UnixMilli':
    case 'UnixMicro':
    case 'UnixNano':
      return parseUnix(input, format);
  }
}

/**
 * Picks the epoch unit of an integer string from its digit count.
 */
export function detectUnixFormat(input: string): 'Unix' | 'UnixMilli' | 'UnixMicro' | 'UnixNano' | undefined {
  if (UNIX_SECONDS_PATTERN.test(input) && !INTEGER_PATTERN.test(input)) {
    return 'Unix';
  }
  if (!INTEGER_PATTERN.test(input)) {
    return undefined;
  }
  const digits = input.replace('-', '').length;
  if (digits <= 11) return 'Unix';
  if (digits <= 14) return 'UnixMilli';
  if (digits <= 17) return 'UnixMicro';
  return 'UnixNano';
}
