import { describe, it, expect } from 'vitest';
import { MetricsCollector } from '../../../../services/metrics/MetricsCollector.js';

describe('MetricsCollector', () => {
  it('should count tool requests by tool and status', async () => {
    const metrics = new MetricsCollector();
    metrics.recordToolRequest('get_time', 'success', 0.002);
    metrics.recordToolRequest('get_time', 'success', 0.003);
    metrics.recordToolRequest('parse_time', 'error', 0.001);

    const text = await metrics.render();
    expect(text).toContain('mcp_tool_requests_total{tool="get_time",status="success"} 2');
    expect(text).toContain('mcp_tool_requests_total{tool="parse_time",status="error"} 1');
    expect(text).toContain('mcp_tool_request_duration_seconds_count{tool="get_time",status="success"} 2');
  });

  it('should observe time operation durations', async () => {
    const metrics = new MetricsCollector();
    metrics.recordTimeOperation('get_timezone_info', 'success', 0.0004);

    const text = await metrics.render();
    expect(text).toContain('time_operation_duration_seconds_count{operation="get_timezone_info",status="success"} 1');
  });

  it('should count transport requests', async () => {
    const metrics = new MetricsCollector();
    metrics.recordTransportRequest('sse', 'GET', 'success');

    expect(await metrics.render()).toContain(
      'mcp_transport_requests_total{transport="sse",method="GET",status="success"} 1'
    );
  });

  it('should keep collectors independent', async () => {
    const first = new MetricsCollector();
    const second = new MetricsCollector();
    first.recordToolRequest('get_time', 'success', 0.001);

    expect(await second.render()).not.toContain('mcp_tool_requests_total{');
  });

  it('should include process metrics only when asked', async () => {
    expect(await new MetricsCollector().render()).not.toContain('process_cpu_user_seconds_total');
    expect(await new MetricsCollector({ collectDefaults: true }).render()).toContain('process_cpu_user_seconds_total');
  });

  it('should expose the Prometheus text content type', () => {
    expect(new MetricsCollector().contentType).toMatch(/^text\/plain/);
  });
});
