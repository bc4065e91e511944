import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerConfig } from "./config/ServerConfig.js";
import { MetricsCollector } from "./services/metrics/MetricsCollector.js";
import { TimeService } from "./services/time/TimeService.js";
import { ToolRegistry } from "./tools/registry.js";
import { HttpTransportHandler } from "./transports/http.js";
import { StdioTransportHandler } from "./transports/stdio.js";
import { createLogger, type Logger } from "./utils/logger.js";

export interface TimeMcpServerDependencies {
  logger?: Logger;
  metrics?: MetricsCollector;
  /** Clock for the time service */
  now?: () => Date;
}

/**
 * Owns the process-wide pieces (logger, metrics registry, time service and
 * transports) and drives startup and graceful shutdown.
 */
export class TimeMcpServer {
  private readonly config: ServerConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly timeService: TimeService;
  private httpHandler?: HttpTransportHandler;
  private stdioHandler?: StdioTransportHandler;
  private shutdownPromise?: Promise<void>;

  constructor(config: ServerConfig, dependencies: TimeMcpServerDependencies = {}) {
    this.config = config;
    this.logger = dependencies.logger ?? createLogger(config.logging);
    this.metrics = dependencies.metrics ?? new MetricsCollector({ collectDefaults: true });
    this.timeService = new TimeService({
      defaultTimezone: config.time.defaultTimezone,
      defaultFormat: config.time.defaultFormat,
      supportedFormats: config.time.supportedFormats,
      now: dependencies.now
    });
  }

  async initialize(): Promise<void> {
    if (this.config.enabledTools) {
      ToolRegistry.validateToolNames(this.config.enabledTools);
    }
    if (this.config.disabledTools) {
      ToolRegistry.validateToolNames(this.config.disabledTools);
    }

    this.setupShutdownHandlers();

    this.logger.info({
      serverName: this.config.server.name,
      version: this.config.server.version,
      transport: this.config.transport.type,
      host: this.config.transport.host,
      port: this.config.transport.port,
      metricsEnabled: this.config.metrics.enabled,
      tools: ToolRegistry.getEnabledToolNames(this.config)
    }, 'Starting MCP Time Server');
  }

  /**
   * Builds an McpServer with the enabled tools registered. HTTP transports
   * call this once per session or request.
   */
  createServer(): McpServer {
    const server = new McpServer(
      {
        name: this.config.server.name,
        version: this.config.server.version
      },
      {
        instructions: this.generateInstructions()
      }
    );

    ToolRegistry.registerAll(server, {
      timeService: this.timeService,
      metrics: this.metrics,
      logger: this.logger
    }, this.config);

    return server;
  }

  async start(): Promise<void> {
    switch (this.config.transport.type) {
      case 'stdio':
        this.stdioHandler = new StdioTransportHandler(this.createServer(), this.logger);
        await this.stdioHandler.connect();
        break;

      case 'http':
        this.httpHandler = new HttpTransportHandler(
          () => this.createServer(),
          {
            host: this.config.transport.host,
            port: this.config.transport.port,
            serverName: this.config.server.name,
            serverVersion: this.config.server.version,
            metrics: this.config.metrics
          },
          this.metrics,
          this.logger
        );
        try {
          await this.httpHandler.connect();
        } catch (error) {
          this.logger.error({ err: error }, 'Server failed to start');
          throw error;
        }
        break;

      default:
        throw new Error(`Unsupported transport type: ${String(this.config.transport.type)}`);
    }
  }

  getHttpHandler(): HttpTransportHandler | undefined {
    return this.httpHandler;
  }

  /**
   * Stops the running transport within server.shutdownTimeout. Repeated
   * calls share the first shutdown.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runShutdown();
    }
    return this.shutdownPromise;
  }

  private async runShutdown(): Promise<void> {
    if (this.httpHandler) {
      await this.httpHandler.shutdown(this.config.server.shutdownTimeout);
    }
    if (this.stdioHandler) {
      await this.stdioHandler.shutdown();
    }
    this.logger.flush();
  }

  private generateInstructions(): string | undefined {
    const allTools = ToolRegistry.getAvailableToolNames();
    const enabled = ToolRegistry.getEnabledToolNames(this.config);
    const disabled = allTools.filter(name => !enabled.includes(name));

    if (disabled.length === 0) {
      return undefined;
    }

    return `Tool filtering is active. The following tools are disabled on this server: ${disabled.join(', ')}.`;
  }

  private setupShutdownHandlers(): void {
    const onSignal = (signal: NodeJS.Signals) => {
      this.logger.info({ signal }, 'Received shutdown signal');
      this.shutdown().then(
        () => process.exit(0),
        (error: unknown) => {
          this.logger.error({ err: error }, 'Shutdown failed');
          this.logger.flush();
          process.exit(1);
        }
      );
    };

    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  }
}
