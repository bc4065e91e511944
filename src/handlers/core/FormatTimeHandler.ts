import { BaseToolHandler } from "./BaseToolHandler.js";
import type { FormatTimeInput, FormatTimeResult } from "../../types/time-responses.js";

export class FormatTimeHandler extends BaseToolHandler<FormatTimeInput, FormatTimeResult> {
    readonly toolName = 'format_time';
    readonly operationName = 'format_time';

    protected execute(args: FormatTimeInput): FormatTimeResult {
        return this.context.timeService.formatTime(args);
    }
}
