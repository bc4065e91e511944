import { collectDefaultMetrics, Counter, Histogram, Registry } from 'prom-client';

export type OutcomeStatus = 'success' | 'error';

const DURATION_BUCKETS = [0.0005, 0.001, 0.0025, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1];

export interface MetricsCollectorOptions {
  /** Also register Node.js process metrics (CPU, memory, event loop) */
  collectDefaults?: boolean;
}

/**
 * Prometheus counters and histograms for tool calls and transport traffic.
 * Every collector owns its registry, so separate instances never share state.
 */
export class MetricsCollector {
  readonly registry: Registry;
  private readonly toolRequests: Counter<'tool' | 'status'>;
  private readonly toolDuration: Histogram<'tool' | 'status'>;
  private readonly operationDuration: Histogram<'operation' | 'status'>;
  private readonly transportRequests: Counter<'transport' | 'method' | 'status'>;

  constructor(options: MetricsCollectorOptions = {}) {
    this.registry = new Registry();

    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.toolRequests = new Counter({
      name: 'mcp_tool_requests_total',
      help: 'Total number of MCP tool calls',
      labelNames: ['tool', 'status'],
      registers: [this.registry]
    });

    this.toolDuration = new Histogram({
      name: 'mcp_tool_request_duration_seconds',
      help: 'Duration of MCP tool calls in seconds',
      labelNames: ['tool', 'status'],
      buckets: DURATION_BUCKETS,
      registers: [this.registry]
    });

    this.operationDuration = new Histogram({
      name: 'time_operation_duration_seconds',
      help: 'Duration of time service operations in seconds',
      labelNames: ['operation', 'status'],
      buckets: DURATION_BUCKETS,
      registers: [this.registry]
    });

    this.transportRequests = new Counter({
      name: 'mcp_transport_requests_total',
      help: 'Total number of HTTP requests per MCP transport',
      labelNames: ['transport', 'method', 'status'],
      registers: [this.registry]
    });
  }

  recordToolRequest(tool: string, status: OutcomeStatus, durationSeconds: number): void {
    this.toolRequests.inc({ tool, status });
    this.toolDuration.observe({ tool, status }, durationSeconds);
  }

  recordTimeOperation(operation: string, status: OutcomeStatus, durationSeconds: number): void {
    this.operationDuration.observe({ operation, status }, durationSeconds);
  }

  recordTransportRequest(transport: string, method: string, status: OutcomeStatus): void {
    this.transportRequests.inc({ transport, method, status });
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  /** Prometheus text exposition of everything in the registry */
  async render(): Promise<string> {
    return this.registry.metrics();
  }
}
