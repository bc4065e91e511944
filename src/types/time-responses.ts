/**
 * Structured response records returned by the time tools.
 * Field names are the tools' snake_case wire format. Kept as type aliases so
 * they are assignable to MCP structuredContent.
 */

export type GetTimeResult = {
  formatted_time: string;
  timezone: string;
  format: string;
  unix_timestamp: number;
};

export type FormatTimeResult = GetTimeResult;

export type ParseTimeResult = {
  unix_timestamp: number;
  rfc3339: string;
  timezone: string;
  is_dst: boolean;
};

export type DstPeriod = {
  start: string;
  end: string;
  /** Seconds added to the standard offset while the period is active */
  saving: number;
};

export type DstTransition = {
  next_transition: string;
  transition_type: 'enter_dst' | 'exit_dst';
  offset_change: number;
};

export type TimezoneInfo = {
  name: string;
  abbreviation: string;
  offset: string;
  offset_seconds: number;
  is_dst: boolean;
  dst?: DstPeriod;
  dst_transition?: DstTransition;
};

export type GetTimeInput = {
  timezone?: string;
  format?: string;
};

export type FormatTimeInput = {
  timestamp: number | string;
  format: string;
  timezone?: string;
};

export type ParseTimeInput = {
  time_string: string;
  format?: string;
  timezone?: string;
};

export type TimezoneInfoInput = {
  timezone: string;
  reference_time?: string;
};
