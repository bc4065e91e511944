import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import net from 'node:net';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { parseArgs } from '../../../config/ServerConfig.js';
import { MetricsCollector } from '../../../services/metrics/MetricsCollector.js';
import { TimeMcpServer } from '../../../server.js';
import { HttpTransportHandler, ShutdownTimeoutError, type HttpTransportConfig } from '../../../transports/http.js';
import { FIXED_NOW, silentLogger } from '../helpers/test-context.js';

const HealthSchema = z.object({
  status: z.string(),
  service: z.string(),
  version: z.string(),
  timestamp: z.string()
});

function transportConfig(overrides: Partial<HttpTransportConfig> = {}): HttpTransportConfig {
  return {
    host: '127.0.0.1',
    port: 0,
    serverName: 'test-time-server',
    serverVersion: '9.9.9',
    // Same port as the main listener, so /metrics is served there
    metrics: { enabled: true, port: 0, path: '/metrics' },
    ...overrides
  };
}

describe('HttpTransportHandler', () => {
  const metrics = new MetricsCollector();
  const timeServer = new TimeMcpServer(parseArgs([], {}), {
    logger: silentLogger(),
    metrics,
    now: () => FIXED_NOW
  });
  const handler = new HttpTransportHandler(() => timeServer.createServer(), transportConfig(), metrics, silentLogger());
  let baseUrl: string;

  beforeAll(async () => {
    await handler.connect();
    const address = handler.address();
    if (!address) {
      throw new Error('server is not listening');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await handler.shutdown(2000);
  });

  it('should report health', async () => {
    const response = await fetch(`${baseUrl}/health`);
    expect(response.status).toBe(200);

    const body = HealthSchema.parse(await response.json());
    expect(body).toMatchObject({ status: 'healthy', service: 'test-time-server', version: '9.9.9' });
    expect(body.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/);
  });

  it('should answer CORS preflight requests', async () => {
    const response = await fetch(`${baseUrl}/mcp`, { method: 'OPTIONS' });
    expect(response.status).toBe(200);
    expect(response.headers.get('access-control-allow-origin')).toBe('*');
    expect(response.headers.get('access-control-allow-methods')).toBe('GET, POST, DELETE, OPTIONS');
  });

  it('should refuse GET and DELETE on the stateless endpoints', async () => {
    expect((await fetch(`${baseUrl}/mcp`)).status).toBe(405);
    expect((await fetch(`${baseUrl}/streamable`, { method: 'DELETE' })).status).toBe(405);
  });

  it('should reject messages for unknown SSE sessions', async () => {
    const response = await fetch(`${baseUrl}/sse?sessionId=missing`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ jsonrpc: '2.0', id: 1, method: 'ping' })
    });

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      jsonrpc: '2.0',
      error: { code: -32001, message: 'Session not found' },
      id: null
    });
  });

  it('should announce the message endpoint on a new SSE stream', async () => {
    const response = await fetch(`${baseUrl}/sse`);
    expect(response.headers.get('content-type')).toContain('text/event-stream');
    if (!response.body) {
      throw new Error('SSE response has no body');
    }

    const reader = response.body.getReader();
    const { value } = await reader.read();
    const chunk = new TextDecoder().decode(value);
    await reader.cancel();

    expect(chunk).toContain('event: endpoint');
    expect(chunk).toMatch(/data: \/sse\?sessionId=[0-9a-f-]+/);
  });

  it('should serve tool calls over streamable HTTP', async () => {
    const client = new Client({ name: 'test-client', version: '0.0.1' });
    await client.connect(new StreamableHTTPClientTransport(new URL(`${baseUrl}/mcp`)));

    try {
      const { tools } = await client.listTools();
      expect(tools.map(tool => tool.name)).toEqual(['get_time', 'format_time', 'parse_time', 'timezone_info']);

      const result = CallToolResultSchema.parse(
        await client.callTool({ name: 'parse_time', arguments: { time_string: '2024-07-04T12:00:00Z' } })
      );
      expect(result.structuredContent).toEqual({
        unix_timestamp: 1720094400,
        rfc3339: '2024-07-04T12:00:00Z',
        timezone: 'UTC',
        is_dst: false
      });
    } finally {
      await client.close();
    }
  });

  it('should expose metrics on the main port when the ports match', async () => {
    const response = await fetch(`${baseUrl}/metrics`);
    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toMatch(/^text\/plain/);

    const text = await response.text();
    expect(text).toContain('mcp_tool_requests_total{tool="parse_time",status="success"} 1');
    expect(text).toContain('mcp_transport_requests_total{transport="streamable",method="OPTIONS",status="success"} 1');
  });
});

describe('HttpTransportHandler metrics listener', () => {
  const create = (overrides: Partial<HttpTransportConfig>) => new HttpTransportHandler(
    () => { throw new Error('not used'); },
    transportConfig(overrides),
    new MetricsCollector(),
    silentLogger()
  );

  it('should build a separate app for a separate port', () => {
    expect(create({ port: 8080, metrics: { enabled: true, port: 9090, path: '/metrics' } }).createMetricsApp()).toBeDefined();
  });

  it('should build no separate app when sharing the port or disabled', () => {
    expect(create({ port: 8080, metrics: { enabled: true, port: 8080, path: '/metrics' } }).createMetricsApp()).toBeUndefined();
    expect(create({ port: 8080, metrics: { enabled: false, port: 9090, path: '/metrics' } }).createMetricsApp()).toBeUndefined();
  });

  it('should report no address before connecting', () => {
    const handler = create({});
    expect(handler.address()).toBeUndefined();
    expect(handler.metricsAddress()).toBeUndefined();
  });
});

describe('HttpTransportHandler shutdown', () => {
  it('should give up on a request still in flight after the timeout', async () => {
    const metrics = new MetricsCollector();
    const timeServer = new TimeMcpServer(parseArgs([], {}), { logger: silentLogger(), metrics, now: () => FIXED_NOW });
    const handler = new HttpTransportHandler(() => timeServer.createServer(), transportConfig(), metrics, silentLogger());
    await handler.connect();
    const address = handler.address();
    if (!address) {
      throw new Error('server is not listening');
    }

    // Headers promise a body that never arrives
    const socket = net.connect(address.port, '127.0.0.1');
    socket.on('error', () => undefined);
    try {
      await new Promise<void>(resolve => socket.once('connect', () => resolve()));
      socket.write(
        'POST /mcp HTTP/1.1\r\nHost: 127.0.0.1\r\nContent-Type: application/json\r\nContent-Length: 100\r\n\r\n{'
      );
      await new Promise(resolve => setTimeout(resolve, 50));

      const startedAt = Date.now();
      await expect(handler.shutdown(300)).rejects.toBeInstanceOf(ShutdownTimeoutError);
      const elapsed = Date.now() - startedAt;
      expect(elapsed).toBeGreaterThanOrEqual(290);
      expect(elapsed).toBeLessThan(2000);
    } finally {
      socket.destroy();
    }
  });
});
