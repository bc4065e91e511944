import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import express, { type Express, type Request, type RequestHandler, type Response } from "express";
import http from "http";
import type { AddressInfo } from "net";
import type { MetricsCollector } from "../services/metrics/MetricsCollector.js";
import type { Logger } from "../utils/logger.js";

export interface HttpTransportConfig {
  host: string;
  port: number;
  serverName: string;
  serverVersion: string;
  metrics: {
    enabled: boolean;
    port: number;
    path: string;
  };
}

export class ShutdownTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Graceful shutdown did not finish within ${timeoutMs}ms`);
    this.name = 'ShutdownTimeoutError';
  }
}

type ShutdownOutcome =
  | { kind: 'closed' }
  | { kind: 'failed'; error: unknown }
  | { kind: 'timeout' };

const SSE_PATH = '/sse';
const STREAMABLE_PATHS = ['/streamable', '/mcp'];
const MAX_BODY_SIZE = '1mb';

function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(error => error ? reject(error) : resolve());
    server.closeIdleConnections();
  });
}

function jsonRpcError(res: Response, status: number, code: number, message: string): void {
  res.status(status).json({
    jsonrpc: '2.0',
    error: { code, message },
    id: null
  });
}

/**
 * Serves MCP over SSE (`/sse`) and stateless streamable HTTP (`/streamable`,
 * alias `/mcp`), plus `/health` and the Prometheus endpoint.
 */
export class HttpTransportHandler {
  private readonly createServer: () => McpServer;
  private readonly config: HttpTransportConfig;
  private readonly metrics: MetricsCollector;
  private readonly logger: Logger;
  private readonly sseTransports = new Map<string, SSEServerTransport>();
  private mainServer?: http.Server;
  private metricsServer?: http.Server;

  constructor(
    createServer: () => McpServer,
    config: HttpTransportConfig,
    metrics: MetricsCollector,
    logger: Logger
  ) {
    this.createServer = createServer;
    this.config = config;
    this.metrics = metrics;
    this.logger = logger;
  }

  private get metricsOnMainPort(): boolean {
    return this.config.metrics.enabled && this.config.metrics.port === this.config.port;
  }

  createApp(): Express {
    const app = express();
    app.disable('x-powered-by');
    app.use(express.json({ limit: MAX_BODY_SIZE }));

    const sseMetrics = this.withMetrics('sse');
    const streamableMetrics = this.withMetrics('streamable');

    app.get(SSE_PATH, sseMetrics, (req, res) => this.openSseStream(req, res));
    app.post(SSE_PATH, sseMetrics, (req, res) => this.handleSseMessage(req, res));
    app.options(SSE_PATH, sseMetrics);

    app.post(STREAMABLE_PATHS, streamableMetrics, (req, res) => this.handleStreamableRequest(req, res));
    app.options(STREAMABLE_PATHS, streamableMetrics);
    // Stateless mode keeps no server-initiated stream or session to delete
    app.get(STREAMABLE_PATHS, streamableMetrics, (_req, res) => {
      jsonRpcError(res, 405, -32000, 'Method not allowed.');
    });
    app.delete(STREAMABLE_PATHS, streamableMetrics, (_req, res) => {
      jsonRpcError(res, 405, -32000, 'Method not allowed.');
    });

    app.get('/health', (_req, res) => {
      res.status(200).json({
        status: 'healthy',
        service: this.config.serverName,
        version: this.config.serverVersion,
        timestamp: new Date().toISOString().replace(/\.\d{3}Z$/, 'Z')
      });
    });

    if (this.metricsOnMainPort) {
      app.get(this.config.metrics.path, this.metricsHandler());
    }

    return app;
  }

  /**
   * Separate app for the metrics listener, or undefined when metrics are
   * disabled or share the main port.
   */
  createMetricsApp(): Express | undefined {
    if (!this.config.metrics.enabled || this.metricsOnMainPort) {
      return undefined;
    }

    const app = express();
    app.disable('x-powered-by');
    app.get(this.config.metrics.path, this.metricsHandler());
    return app;
  }

  async connect(): Promise<void> {
    const metricsApp = this.createMetricsApp();
    if (metricsApp) {
      try {
        this.metricsServer = await this.listen(metricsApp, this.config.metrics.port);
        this.logger.info({ addr: this.describe(this.metricsServer), path: this.config.metrics.path }, 'Metrics server listening');
      } catch (error) {
        // The metrics listener is optional; MCP traffic still gets served
        this.logger.error({ err: error }, 'Metrics server failed');
      }
    }

    this.mainServer = await this.listen(this.createApp(), this.config.port);
    this.logger.info({
      addr: this.describe(this.mainServer),
      endpoints: [SSE_PATH, ...STREAMABLE_PATHS, '/health']
    }, 'MCP server listening');
  }

  /** Address of the main listener once connected */
  address(): AddressInfo | undefined {
    const address = this.mainServer?.address();
    return address && typeof address === 'object' ? address : undefined;
  }

  /** Address of the dedicated metrics listener, if one is running */
  metricsAddress(): AddressInfo | undefined {
    const address = this.metricsServer?.address();
    return address && typeof address === 'object' ? address : undefined;
  }

  /**
   * Stops both listeners. Open SSE streams are closed first; any connection
   * still open after `timeoutMs` is destroyed and ShutdownTimeoutError thrown.
   */
  async shutdown(timeoutMs: number): Promise<void> {
    this.logger.info('Shutting down servers...');

    const sseClosures = [...this.sseTransports.values()].map(transport => transport.close());
    await Promise.allSettled(sseClosures);
    this.sseTransports.clear();

    const servers = [this.mainServer, this.metricsServer].filter(
      (server): server is http.Server => server !== undefined && server.listening
    );

    let timer: NodeJS.Timeout | undefined;
    const closing = Promise.all(servers.map(closeServer)).then(
      (): ShutdownOutcome => ({ kind: 'closed' }),
      (error: unknown): ShutdownOutcome => ({ kind: 'failed', error })
    );
    const timeout = new Promise<ShutdownOutcome>(resolve => {
      timer = setTimeout(() => resolve({ kind: 'timeout' }), timeoutMs);
    });

    const outcome = await Promise.race([closing, timeout]);
    clearTimeout(timer);

    if (outcome.kind === 'timeout') {
      for (const server of servers) {
        server.closeAllConnections();
      }
      this.logger.error({ timeoutMs }, 'Forced shutdown after timeout');
      throw new ShutdownTimeoutError(timeoutMs);
    }

    if (outcome.kind === 'failed') {
      this.logger.error({ err: outcome.error }, 'Server shutdown failed');
      throw outcome.error;
    }

    this.logger.info('Server shutdown complete');
  }

  private listen(app: Express, port: number): Promise<http.Server> {
    return new Promise((resolve, reject) => {
      const server = http.createServer(app);
      server.once('error', reject);
      server.listen(port, this.config.host, () => {
        server.off('error', reject);
        server.on('error', error => this.logger.error({ err: error }, 'HTTP server error'));
        resolve(server);
      });
    });
  }

  private describe(server: http.Server): string {
    const address = server.address();
    if (address && typeof address === 'object') {
      return `${address.address}:${address.port}`;
    }
    return String(address);
  }

  private async openSseStream(_req: Request, res: Response): Promise<void> {
    const transport = new SSEServerTransport(SSE_PATH, res);
    const server = this.createServer();
    const sessionId = transport.sessionId;
    this.sseTransports.set(sessionId, transport);

    res.on('close', () => {
      this.sseTransports.delete(sessionId);
      server.close().catch((error: unknown) => {
        this.logger.warn({ err: error, sessionId }, 'Failed to close SSE session');
      });
    });

    await server.connect(transport);
    this.logger.debug({ sessionId }, 'SSE session opened');
  }

  private async handleSseMessage(req: Request, res: Response): Promise<void> {
    const sessionId = typeof req.query.sessionId === 'string' ? req.query.sessionId : undefined;
    const transport = sessionId ? this.sseTransports.get(sessionId) : undefined;

    if (!transport) {
      jsonRpcError(res, 404, -32001, 'Session not found');
      return;
    }

    await transport.handlePostMessage(req, res, req.body);
  }

  private async handleStreamableRequest(req: Request, res: Response): Promise<void> {
    // A fresh server and transport per request keeps request ids from colliding
    const server = this.createServer();
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

    res.on('close', () => {
      Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
        this.logger.warn({ err: error }, 'Failed to release streamable transport');
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      this.logger.error({ err: error }, 'Error handling MCP request');
      if (!res.headersSent) {
        jsonRpcError(res, 500, -32603, 'Internal server error');
      }
    }
  }

  private metricsHandler(): RequestHandler {
    return async (_req, res) => {
      res.set('Content-Type', this.metrics.contentType);
      res.send(await this.metrics.render());
    };
  }

  /**
   * CORS, preflight handling, transport request counting and debug logging
   * for one transport's routes.
   */
  private withMetrics(transport: string): RequestHandler {
    return (req, res, next) => {
      const startedAt = performance.now();

      this.logger.debug({
        transport,
        method: req.method,
        path: req.path,
        remoteAddr: req.socket.remoteAddress
      }, 'MCP transport request');

      res.setHeader('Access-Control-Allow-Origin', '*');
      res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type, mcp-session-id, mcp-protocol-version');

      if (req.method === 'OPTIONS') {
        res.status(200).end();
        this.metrics.recordTransportRequest(transport, req.method, 'success');
        return;
      }

      res.once('close', () => {
        const status = res.statusCode >= 400 ? 'error' : 'success';
        this.metrics.recordTransportRequest(transport, req.method, status);
        this.logger.debug({
          transport,
          method: req.method,
          status: res.statusCode,
          durationMs: Math.round(performance.now() - startedAt)
        }, 'MCP transport request completed');
      });

      next();
    };
  }
}
