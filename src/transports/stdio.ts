import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Logger } from "../utils/logger.js";

export class StdioTransportHandler {
  private readonly server: McpServer;
  private readonly logger: Logger;

  constructor(server: McpServer, logger: Logger) {
    this.server = server;
    this.logger = logger;
  }

  async connect(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    this.logger.info('MCP server listening on stdio');
  }

  async shutdown(): Promise<void> {
    await this.server.close();
  }
}
