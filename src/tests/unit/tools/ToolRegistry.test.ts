import { describe, it, expect, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { ToolRegistry, type ToolFilter } from '../../../tools/registry.js';
import { createToolContext, textOf } from '../helpers/test-context.js';

describe('ToolRegistry', () => {
  const clients: Client[] = [];

  async function connect(filter: ToolFilter = {}): Promise<Client> {
    const server = new McpServer({ name: 'test-time-server', version: '0.0.1' });
    ToolRegistry.registerAll(server, createToolContext(), filter);

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    const client = new Client({ name: 'test-client', version: '0.0.1' });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
    clients.push(client);
    return client;
  }

  afterEach(async () => {
    await Promise.all(clients.splice(0).map(client => client.close()));
  });

  it('should list the available tools in order', () => {
    expect(ToolRegistry.getAvailableToolNames()).toEqual(['get_time', 'format_time', 'parse_time', 'timezone_info']);
  });

  it('should reject unknown tool names', () => {
    expect(() => ToolRegistry.validateToolNames(['get_time', 'get_weather', 'now'])).toThrow(
      'Invalid tool name(s): get_weather, now. Available tools: get_time, format_time, parse_time, timezone_info'
    );
    expect(() => ToolRegistry.validateToolNames(['parse_time'])).not.toThrow();
  });

  it('should apply enable and disable lists', () => {
    expect(ToolRegistry.getEnabledToolNames({ enabledTools: ['parse_time', 'get_time'] })).toEqual(['get_time', 'parse_time']);
    expect(ToolRegistry.getEnabledToolNames({ disabledTools: ['get_time'] })).toEqual(['format_time', 'parse_time', 'timezone_info']);
    expect(ToolRegistry.getEnabledToolNames({})).toHaveLength(4);
  });

  it('should register every tool with schemas and read-only annotations', async () => {
    const client = await connect();
    const { tools } = await client.listTools();

    expect(tools.map(tool => tool.name)).toEqual(['get_time', 'format_time', 'parse_time', 'timezone_info']);
    for (const tool of tools) {
      expect(tool.outputSchema).toBeDefined();
      expect(tool.annotations?.readOnlyHint).toBe(true);
    }
    const formatTime = tools.find(tool => tool.name === 'format_time');
    expect(formatTime?.inputSchema.required).toEqual(['timestamp', 'format']);
  });

  it('should register only enabled tools', async () => {
    const client = await connect({ enabledTools: ['timezone_info'] });
    const { tools } = await client.listTools();
    expect(tools.map(tool => tool.name)).toEqual(['timezone_info']);
  });

  it('should serve tool calls with structured content', async () => {
    const client = await connect();
    await client.listTools();

    const result = CallToolResultSchema.parse(
      await client.callTool({ name: 'get_time', arguments: { timezone: 'Asia/Tokyo' } })
    );
    expect(result.structuredContent).toEqual({
      formatted_time: '2024-07-04T21:00:00+09:00',
      timezone: 'Asia/Tokyo',
      format: 'RFC3339',
      unix_timestamp: 1720094400
    });
  });

  it('should return time service errors as tool errors', async () => {
    const client = await connect();

    const result = CallToolResultSchema.parse(
      await client.callTool({ name: 'get_time', arguments: { timezone: 'Nowhere/Place' } })
    );
    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe("Invalid timezone: Nowhere/Place. Use IANA timezone format like 'America/Los_Angeles' or 'UTC'.");
  });
});
