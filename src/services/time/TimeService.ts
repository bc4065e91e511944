import type {
  FormatTimeInput,
  FormatTimeResult,
  GetTimeInput,
  GetTimeResult,
  ParseTimeInput,
  ParseTimeResult,
  TimezoneInfo,
  TimezoneInfoInput
} from '../../types/time-responses.js';
import { invalidFormat, parseFailure } from './errors.js';
import {
  detectUnixFormat,
  type FormatType,
  formatInstant,
  formatOffset,
  isFormatType,
  isRenderableYear,
  MAX_YEAR,
  MIN_YEAR,
  parseDate,
  parseLayout,
  parseLocalDateTime,
  parseRfc3339,
  parseUnix,
  parseWithFormat
} from './formats.js';
import { Zone } from './zone.js';

// Transition searches look at most a little over a year ahead or behind
const SEARCH_HORIZON_SECONDS = 370 * 24 * 60 * 60;

export interface TimeServiceOptions {
  defaultTimezone: string;
  defaultFormat: FormatType;
  supportedFormats: readonly FormatType[];
  /** Clock used for "now"; defaults to the system clock */
  now?: () => Date;
}

/**
 * The four time queries. Stateless apart from configuration, so a single
 * instance is shared by every request.
 */
export class TimeService {
  private readonly defaultTimezone: string;
  private readonly defaultFormat: FormatType;
  private readonly supportedFormats: readonly FormatType[];
  private readonly now: () => Date;

  constructor(options: TimeServiceOptions) {
    this.defaultTimezone = options.defaultTimezone;
    this.defaultFormat = options.defaultFormat;
    this.supportedFormats = options.supportedFormats;
    this.now = options.now ?? (() => new Date());
  }

  getCurrentTime(input: GetTimeInput): GetTimeResult {
    const zone = this.resolveZone(input.timezone);
    const format = this.resolveFormat(input.format);
    const epochMs = this.now().getTime();

    return {
      formatted_time: formatInstant(epochMs, zone, format),
      timezone: zone.name,
      format,
      unix_timestamp: Math.floor(epochMs / 1000)
    };
  }

  formatTime(input: FormatTimeInput): FormatTimeResult {
    const zone = this.resolveZone(input.timezone);
    const format = this.resolveFormat(input.format);
    const epochMs = this.timestampToEpochMs(input.timestamp);
    this.assertRenderable(epochMs, zone, String(input.timestamp));

    return {
      formatted_time: formatInstant(epochMs, zone, format),
      timezone: zone.name,
      format,
      unix_timestamp: Math.floor(epochMs / 1000)
    };
  }

  parseTime(input: ParseTimeInput): ParseTimeResult {
    const zone = this.resolveZone(input.timezone);
    const timeString = input.time_string.trim();

    let epochMs: number | undefined;
    if (input.format) {
      const format = this.resolveFormat(input.format);
      epochMs = parseWithFormat(timeString, format);
      if (epochMs === undefined) {
        throw parseFailure(input.time_string, `expected ${format}`);
      }
    } else {
      epochMs = this.detectAndParse(timeString, zone);
      if (epochMs === undefined) {
        throw parseFailure(input.time_string, `tried ${this.supportedFormats.join(', ')}`);
      }
    }
    this.assertRenderable(epochMs, zone, input.time_string);

    return {
      unix_timestamp: Math.floor(epochMs / 1000),
      rfc3339: formatInstant(epochMs, zone, 'RFC3339'),
      timezone: zone.name,
      is_dst: zone.isDstAt(epochMs)
    };
  }

  getTimezoneInfo(input: TimezoneInfoInput): TimezoneInfo {
    const zone = this.resolveZone(input.timezone);

    let reference = this.now().getTime();
    if (input.reference_time) {
      const parsed = this.detectAndParse(input.reference_time.trim(), zone);
      if (parsed === undefined) {
        throw parseFailure(input.reference_time, 'reference_time');
      }
      reference = parsed;
    }
    this.assertRenderable(reference, zone, input.reference_time ?? String(reference));

    const offsetSeconds = zone.offsetAt(reference);
    const isDst = zone.isDstAt(reference);
    const info: TimezoneInfo = {
      name: zone.name,
      abbreviation: zone.abbreviationAt(reference),
      offset: formatOffset(offsetSeconds),
      offset_seconds: offsetSeconds,
      is_dst: isDst
    };

    // Offset changes in zones without daylight saving time are not reported
    const { year } = zone.fieldsAt(reference);
    if (!zone.observesDst(year) && !zone.observesDst(year + 1)) {
      return info;
    }

    const period = this.findDstPeriod(zone, reference, isDst);
    if (period) {
      info.dst = period;
    }

    const next = zone.nextTransition(reference, SEARCH_HORIZON_SECONDS);
    if (next !== undefined && isRenderableYear(zone.fieldsAt(next).year)) {
      info.dst_transition = {
        next_transition: formatInstant(next, zone, 'RFC3339'),
        transition_type: zone.isDstAt(next) ? 'enter_dst' : 'exit_dst',
        offset_change: zone.offsetAt(next) - zone.offsetAt(next - 1000)
      };
    }

    return info;
  }

  private findDstPeriod(zone: Zone, reference: number, isDst: boolean): TimezoneInfo['dst'] {
    let start: number | undefined;
    let end: number | undefined;

    if (isDst) {
      start = zone.previousTransition(reference, SEARCH_HORIZON_SECONDS);
      end = zone.nextTransition(reference, SEARCH_HORIZON_SECONDS);
    } else {
      start = zone.nextTransition(reference, SEARCH_HORIZON_SECONDS);
      end = start === undefined ? undefined : zone.nextTransition(start, SEARCH_HORIZON_SECONDS);
    }

    if (start === undefined || end === undefined) {
      return undefined;
    }
    if (!isRenderableYear(zone.fieldsAt(start).year) || !isRenderableYear(zone.fieldsAt(end).year)) {
      return undefined;
    }

    return {
      start: formatInstant(start, zone, 'RFC3339'),
      end: formatInstant(end, zone, 'RFC3339'),
      saving: zone.offsetAt(start) - zone.offsetAt(start - 1000)
    };
  }

  /**
   * Wall-clock output is limited to four-digit years in the target zone.
   */
  private assertRenderable(epochMs: number, zone: Zone, input: string): void {
    if (!isRenderableYear(zone.fieldsAt(epochMs).year)) {
      throw parseFailure(input, `year outside ${MIN_YEAR.toString().padStart(4, '0')}-${MAX_YEAR} in ${zone.name}`);
    }
  }

  private resolveZone(timezone: string | undefined): Zone {
    return Zone.resolve(timezone || this.defaultTimezone);
  }

  private resolveFormat(format: string | undefined): FormatType {
    if (!format) {
      return this.defaultFormat;
    }
    if (!isFormatType(format) || !this.supportedFormats.includes(format)) {
      throw invalidFormat(format, this.supportedFormats);
    }
    return format;
  }

  /**
   * Epoch seconds (number) or a date/time string. Strings without an offset
   * are read as UTC.
   */
  private timestampToEpochMs(timestamp: number | string): number {
    if (typeof timestamp === 'number') {
      const epochMs = Math.round(timestamp * 1000);
      if (!Number.isFinite(epochMs) || Math.abs(epochMs) > 8.64e15) {
        throw parseFailure(String(timestamp), 'timestamp out of range');
      }
      return epochMs;
    }

    const input = timestamp.trim();
    const utc = Zone.resolve('UTC');
    const epochMs = parseRfc3339(input)
      ?? parseLayout(input)
      ?? parseLocalDateTime(input, utc)
      ?? parseDate(input, utc)
      ?? (/^-?\d+$/.test(input) ? parseUnix(input, 'Unix') : undefined);

    if (epochMs === undefined) {
      throw parseFailure(timestamp, 'expected a Unix timestamp, RFC3339 or ISO 8601 string');
    }
    return epochMs;
  }

  /**
   * Auto-detection order: RFC3339 / RFC3339Nano, Layout, ISO local
   * date-time, date only, then epoch numbers by digit count. Formats
   * outside the supported list are skipped.
   */
  private detectAndParse(input: string, zone: Zone): number | undefined {
    const supports = (format: FormatType) => this.supportedFormats.includes(format);

    if (supports('RFC3339') || supports('RFC3339Nano')) {
      const epochMs = parseRfc3339(input);
      if (epochMs !== undefined) return epochMs;
    }
    if (supports('Layout')) {
      const epochMs = parseLayout(input);
      if (epochMs !== undefined) return epochMs;
    }

    const local = parseLocalDateTime(input, zone) ?? parseDate(input, zone);
    if (local !== undefined) return local;

    const unixFormat = detectUnixFormat(input);
    if (unixFormat && supports(unixFormat)) {
      return parseUnix(input, unixFormat);
    }
    return undefined;
  }
}
