/**
 * Timezone lookups backed by the host's Intl timezone database.
 */
import { invalidTimezone } from './errors.js';

const SECONDS_PER_DAY = 24 * 60 * 60;

/** Wall-clock fields of an instant as seen in a particular zone */
export interface LocalDateTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

function mod(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}

/**
 * Treats wall-clock fields as if they were UTC and returns epoch milliseconds.
 */
export function utcFromFields(fields: LocalDateTime): number {
  const date = new Date(Date.UTC(
    fields.year,
    fields.month - 1,
    fields.day,
    fields.hour,
    fields.minute,
    fields.second,
    fields.millisecond
  ));
  // Date.UTC maps years 0-99 onto 1900-1999
  if (fields.year >= 0 && fields.year < 100) {
    date.setUTCFullYear(fields.year);
  }
  return date.getTime();
}

export class Zone {
  readonly name: string;
  private readonly fieldFormatter: Intl.DateTimeFormat;
  private readonly nameFormatter: Intl.DateTimeFormat;

  private constructor(name: string, fieldFormatter: Intl.DateTimeFormat, nameFormatter: Intl.DateTimeFormat) {
    this.name = name;
    this.fieldFormatter = fieldFormatter;
    this.nameFormatter = nameFormatter;
  }

  /**
   * Resolves an IANA timezone name.
   * @throws TimeServiceError (InvalidTimezone) when the host database does not know the zone
   */
  static resolve(timeZone: string): Zone {
    let fieldFormatter: Intl.DateTimeFormat;
    try {
      fieldFormatter = new Intl.DateTimeFormat('en-US', {
        timeZone,
        hourCycle: 'h23',
        era: 'short',
        year: 'numeric',
        month: 'numeric',
        day: 'numeric',
        hour: 'numeric',
        minute: 'numeric',
        second: 'numeric'
      });
    } catch (error) {
      if (error instanceof RangeError) {
        throw invalidTimezone(timeZone);
      }
      throw error;
    }

    // resolvedOptions() may return a legacy alias, so only its casing is taken
    const resolved = fieldFormatter.resolvedOptions().timeZone;
    const name = resolved.toLowerCase() === timeZone.toLowerCase() ? resolved : timeZone;
    const nameFormatter = new Intl.DateTimeFormat('en-US', { timeZone, timeZoneName: 'short' });
    return new Zone(name, fieldFormatter, nameFormatter);
  }

  fieldsAt(epochMs: number): LocalDateTime {
    const fields: LocalDateTime = {
      year: 0,
      month: 0,
      day: 0,
      hour: 0,
      minute: 0,
      second: 0,
      millisecond: mod(epochMs, 1000)
    };

    let beforeCommonEra = false;
    for (const part of this.fieldFormatter.formatToParts(new Date(epochMs))) {
      switch (part.type) {
        case 'era':
          beforeCommonEra = part.value === 'BC';
          break;
        case 'year':
        case 'month':
        case 'day':
        case 'hour':
        case 'minute':
        case 'second':
          fields[part.type] = parseInt(part.value, 10);
          break;
      }
    }

    // Astronomical numbering: 1 BC is year 0
    if (beforeCommonEra) {
      fields.year = 1 - fields.year;
    }
    return fields;
  }

  /** UTC offset in seconds at the given instant */
  offsetAt(epochMs: number): number {
    const wholeSecond = epochMs - mod(epochMs, 1000);
    const local = utcFromFields({ ...this.fieldsAt(wholeSecond), millisecond: 0 });
    return Math.round((local - wholeSecond) / 1000);
  }

  abbreviationAt(epochMs: number): string {
    const part = this.nameFormatter.formatToParts(new Date(epochMs)).find(p => p.type === 'timeZoneName');
    return part?.value ?? this.name;
  }

  /** The smaller of the January and July offsets of the year */
  standardOffset(year: number): number {
    const january = this.offsetAt(utcFromFields({ year, month: 1, day: 1, hour: 0, minute: 0, second: 0, millisecond: 0 }));
    const july = this.offsetAt(utcFromFields({ year, month: 7, day: 1, hour: 0, minute: 0, second: 0, millisecond: 0 }));
    return Math.min(january, july);
  }

  observesDst(year: number): boolean {
    const january = this.offsetAt(utcFromFields({ year, month: 1, day: 1, hour: 0, minute: 0, second: 0, millisecond: 0 }));
    const july = this.offsetAt(utcFromFields({ year, month: 7, day: 1, hour: 0, minute: 0, second: 0, millisecond: 0 }));
    return january !== july;
  }

  isDstAt(epochMs: number): boolean {
    const { year } = this.fieldsAt(epochMs);
    return this.offsetAt(epochMs) > this.standardOffset(year);
  }

  /**
   * Converts wall-clock fields in this zone to epoch milliseconds.
   * Times inside a spring-forward gap land after the gap.
   */
  toEpochMs(local: LocalDateTime): number {
    const asUtc = utcFromFields(local);
    const firstGuess = this.offsetAt(asUtc);
    const epochMs = asUtc - firstGuess * 1000;
    const secondGuess = this.offsetAt(epochMs);
    if (secondGuess === firstGuess) {
      return epochMs;
    }
    const corrected = asUtc - secondGuess * 1000;
    // Neither offset reproduces the wall time: it falls in a gap
    return this.offsetAt(corrected) === secondGuess ? corrected : epochMs;
  }

  /**
   * First instant after `fromMs` (within `horizonSeconds`) where the offset changes.
   */
  nextTransition(fromMs: number, horizonSeconds: number): number | undefined {
    const start = Math.floor(fromMs / 1000);
    const limit = start + horizonSeconds;
    const initial = this.offsetAt(start * 1000);

    let previous = start;
    while (previous < limit) {
      const step = Math.min(previous + SECONDS_PER_DAY, limit);
      if (this.offsetAt(step * 1000) !== initial) {
        return this.bisect(previous, step, initial) * 1000;
      }
      previous = step;
    }
    return undefined;
  }

  /**
   * Start of the offset segment containing `fromMs`, searched back up to `horizonSeconds`.
   */
  previousTransition(fromMs: number, horizonSeconds: number): number | undefined {
    const end = Math.floor(fromMs / 1000);
    const limit = end - horizonSeconds;
    const current = this.offsetAt(end * 1000);

    let next = end;
    while (next > limit) {
      const step = Math.max(next - SECONDS_PER_DAY, limit);
      const stepOffset = this.offsetAt(step * 1000);
      if (stepOffset !== current) {
        return this.bisect(step, next, stepOffset) * 1000;
      }
      next = step;
    }
    return undefined;
  }

  // Smallest second in (lo, hi] whose offset differs from loOffset
  private bisect(lo: number, hi: number, loOffset: number): number {
    while (hi - lo > 1) {
      const mid = Math.floor((lo + hi) / 2);
      if (this.offsetAt(mid * 1000) === loOffset) {
        lo = mid;
      } else {
        hi = mid;
      }
    }
    return hi;
  }
}
