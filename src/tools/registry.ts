import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ToolContext } from "../handlers/core/BaseToolHandler.js";
import { GetTimeHandler } from "../handlers/core/GetTimeHandler.js";
import { FormatTimeHandler } from "../handlers/core/FormatTimeHandler.js";
import { ParseTimeHandler } from "../handlers/core/ParseTimeHandler.js";
import { TimezoneInfoHandler } from "../handlers/core/TimezoneInfoHandler.js";
import { ToolInputSchemas, ToolOutputSchemas, type ToolName } from "./time-schemas.js";

export interface ToolFilter {
  enabledTools?: string[];
  disabledTools?: string[];
}

const TOOL_DESCRIPTIONS: Record<ToolName, string> = {
  get_time: "Get the current time in a specified timezone and format",
  format_time: "Format a timestamp into a specified format and timezone",
  parse_time: "Parse a time string and return timestamp information",
  timezone_info: "Get detailed information about a timezone, including its UTC offset and daylight saving periods"
};

export class ToolRegistry {
  static getAvailableToolNames(): ToolName[] {
    return Object.keys(ToolInputSchemas).filter(ToolRegistry.isToolName);
  }

  static isToolName(name: string): name is ToolName {
    return Object.prototype.hasOwnProperty.call(ToolInputSchemas, name);
  }

  /**
   * @throws Error naming every unknown tool and the available ones
   */
  static validateToolNames(names: string[]): void {
    const invalid = names.filter(name => !ToolRegistry.isToolName(name));
    if (invalid.length > 0) {
      throw new Error(
        `Invalid tool name(s): ${invalid.join(', ')}. Available tools: ${ToolRegistry.getAvailableToolNames().join(', ')}`
      );
    }
  }

  static isToolEnabled(name: ToolName, filter: ToolFilter): boolean {
    if (filter.enabledTools) {
      return filter.enabledTools.includes(name);
    }
    if (filter.disabledTools) {
      return !filter.disabledTools.includes(name);
    }
    return true;
  }

  static getEnabledToolNames(filter: ToolFilter): ToolName[] {
    return ToolRegistry.getAvailableToolNames().filter(name => ToolRegistry.isToolEnabled(name, filter));
  }

  /**
   * Binds every enabled time tool to the server.
   */
  static registerAll(server: McpServer, context: ToolContext, filter: ToolFilter = {}): void {
    const enabled = (name: ToolName) => ToolRegistry.isToolEnabled(name, filter);

    if (enabled('get_time')) {
      const handler = new GetTimeHandler(context);
      server.registerTool('get_time', {
        title: 'Get current time',
        description: TOOL_DESCRIPTIONS.get_time,
        inputSchema: ToolInputSchemas.get_time.shape,
        outputSchema: ToolOutputSchemas.get_time.shape,
        annotations: { readOnlyHint: true, openWorldHint: false }
      }, async (args) => handler.runTool(args));
    }

    if (enabled('format_time')) {
      const handler = new FormatTimeHandler(context);
      server.registerTool('format_time', {
        title: 'Format time',
        description: TOOL_DESCRIPTIONS.format_time,
        inputSchema: ToolInputSchemas.format_time.shape,
        outputSchema: ToolOutputSchemas.format_time.shape,
        annotations: { readOnlyHint: true, openWorldHint: false }
      }, async (args) => handler.runTool(args));
    }

    if (enabled('parse_time')) {
      const handler = new ParseTimeHandler(context);
      server.registerTool('parse_time', {
        title: 'Parse time',
        description: TOOL_DESCRIPTIONS.parse_time,
        inputSchema: ToolInputSchemas.parse_time.shape,
        outputSchema: ToolOutputSchemas.parse_time.shape,
        annotations: { readOnlyHint: true, openWorldHint: false }
      }, async (args) => handler.runTool(args));
    }

    if (enabled('timezone_info')) {
      const handler = new TimezoneInfoHandler(context);
      server.registerTool('timezone_info', {
        title: 'Timezone information',
        description: TOOL_DESCRIPTIONS.timezone_info,
        inputSchema: ToolInputSchemas.timezone_info.shape,
        outputSchema: ToolOutputSchemas.timezone_info.shape,
        annotations: { readOnlyHint: true, openWorldHint: false }
      }, async (args) => handler.runTool(args));
    }

    context.logger.debug({ tools: ToolRegistry.getEnabledToolNames(filter) }, 'Registered time tools');
  }
}
