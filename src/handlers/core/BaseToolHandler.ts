import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { McpError, ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import type { MetricsCollector, OutcomeStatus } from "../../services/metrics/MetricsCollector.js";
import { TimeServiceError } from "../../services/time/errors.js";
import type { TimeService } from "../../services/time/TimeService.js";
import { createStructuredResponse, createToolErrorResponse } from "../../utils/response-builder.js";
import type { Logger } from "../../utils/logger.js";

/**
 * Capabilities every tool handler is constructed with.
 */
export interface ToolContext {
    timeService: TimeService;
    metrics: MetricsCollector;
    logger: Logger;
}

export abstract class BaseToolHandler<TArgs, TResult extends Record<string, unknown>> {
    /** MCP tool name, used as the metrics label */
    abstract readonly toolName: string;
    /** Time service operation behind the tool */
    abstract readonly operationName: string;

    constructor(protected readonly context: ToolContext) {}

    protected abstract execute(args: TArgs): TResult;

    async runTool(args: TArgs): Promise<CallToolResult> {
        const startedAt = performance.now();

        try {
            const result = this.execute(args);
            this.recordOutcome('success', startedAt);
            return createStructuredResponse(result);
        } catch (error) {
            this.recordOutcome('error', startedAt);

            // Caller input errors go back as tool results, message untouched
            if (error instanceof TimeServiceError) {
                this.context.logger.warn({ tool: this.toolName, kind: error.kind, err: error }, `${this.toolName} rejected input`);
                return createToolErrorResponse(error.message);
            }

            this.context.logger.error({ tool: this.toolName, err: error }, `${this.toolName} failed`);
            throw this.handleUnexpectedError(error);
        }
    }

    protected handleUnexpectedError(error: unknown): McpError {
        if (error instanceof McpError) {
            return error;
        }

        if (error instanceof Error) {
            return new McpError(ErrorCode.InternalError, `Internal error: ${error.message}`);
        }

        return new McpError(ErrorCode.InternalError, 'An unknown error occurred');
    }

    private recordOutcome(status: OutcomeStatus, startedAt: number): void {
        const seconds = (performance.now() - startedAt) / 1000;
        this.context.metrics.recordToolRequest(this.toolName, status, seconds);
        this.context.metrics.recordTimeOperation(this.operationName, status, seconds);
    }
}
