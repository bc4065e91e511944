export type TimeErrorKind = 'InvalidTimezone' | 'InvalidFormat' | 'ParseFailure';

/**
 * Caller input error raised by the time service. Never retried.
 */
export class TimeServiceError extends Error {
  readonly kind: TimeErrorKind;

  constructor(kind: TimeErrorKind, message: string) {
    super(message);
    this.name = 'TimeServiceError';
    this.kind = kind;
  }
}

export function invalidTimezone(timezone: string): TimeServiceError {
  return new TimeServiceError(
    'InvalidTimezone',
    `Invalid timezone: ${timezone}. Use IANA timezone format like 'America/Los_Angeles' or 'UTC'.`
  );
}

export function invalidFormat(format: string, supported: readonly string[]): TimeServiceError {
  return new TimeServiceError(
    'InvalidFormat',
    `Invalid format: ${format}. Supported formats: ${supported.join(', ')}`
  );
}

export function parseFailure(input: string, detail?: string): TimeServiceError {
  const suffix = detail ? ` (${detail})` : '';
  return new TimeServiceError('ParseFailure', `Unable to parse time string: ${input}${suffix}`);
}
