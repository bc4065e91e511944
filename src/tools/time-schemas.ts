/**
 * Zod schemas for the time tools.
 *
 * Input schemas are validated by the MCP server before a handler runs;
 * output schemas describe the structuredContent each tool returns.
 */

import { z } from "zod";
import { FORMAT_TYPES } from "../services/time/formats.js";

const formatList = FORMAT_TYPES.join(', ');

const timezoneField = z.string()
  .optional()
  .describe("IANA timezone name (e.g., 'America/New_York', 'Europe/London'). Defaults to the server's default timezone (UTC unless configured)");

export const ToolInputSchemas = {
  get_time: z.object({
    timezone: timezoneField,
    format: z.string()
      .optional()
      .describe(`Desired output format (${formatList}). Defaults to RFC3339`)
  }),

  format_time: z.object({
    timestamp: z.union([z.number(), z.string()])
      .describe("Timestamp to format: Unix seconds as a number, or an RFC3339 / ISO 8601 string"),
    format: z.string()
      .describe(`Desired output format (${formatList})`),
    timezone: timezoneField
  }),

  parse_time: z.object({
    time_string: z.string()
      .describe("Time string to parse"),
    format: z.string()
      .optional()
      .describe(`Expected format (${formatList}). Auto-detected when omitted`),
    timezone: timezoneField
  }),

  timezone_info: z.object({
    timezone: z.string()
      .describe("IANA timezone name to describe (e.g., 'America/New_York')"),
    reference_time: z.string()
      .optional()
      .describe("Reference instant (RFC3339). Defaults to the current time")
  })
};

const formattedTimeOutput = z.object({
  formatted_time: z.string().describe("The time rendered in the requested format"),
  timezone: z.string().describe("The timezone used for rendering"),
  format: z.string().describe("The format used"),
  unix_timestamp: z.number().int().describe("Unix timestamp in seconds")
});

export const ToolOutputSchemas = {
  get_time: formattedTimeOutput,

  format_time: formattedTimeOutput,

  parse_time: z.object({
    unix_timestamp: z.number().int().describe("Unix timestamp in seconds"),
    rfc3339: z.string().describe("The instant in RFC3339, in the resolved timezone"),
    timezone: z.string().describe("The timezone used to interpret the input"),
    is_dst: z.boolean().describe("Whether the instant falls in daylight saving time")
  }),

  timezone_info: z.object({
    name: z.string(),
    abbreviation: z.string(),
    offset: z.string().describe("UTC offset as ±HH:MM"),
    offset_seconds: z.number().int(),
    is_dst: z.boolean(),
    dst: z.object({
      start: z.string(),
      end: z.string(),
      saving: z.number().int().describe("Seconds added to the standard offset")
    }).optional().describe("Active or next daylight saving period"),
    dst_transition: z.object({
      next_transition: z.string(),
      transition_type: z.enum(['enter_dst', 'exit_dst']),
      offset_change: z.number().int()
    }).optional().describe("Next UTC offset change after the reference time")
  })
};

export type ToolName = keyof typeof ToolInputSchemas;
