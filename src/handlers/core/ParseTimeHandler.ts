import { BaseToolHandler } from "./BaseToolHandler.js";
import type { ParseTimeInput, ParseTimeResult } from "../../types/time-responses.js";

export class ParseTimeHandler extends BaseToolHandler<ParseTimeInput, ParseTimeResult> {
    readonly toolName = 'parse_time';
    readonly operationName = 'parse_time';

    protected execute(args: ParseTimeInput): ParseTimeResult {
        return this.context.timeService.parseTime(args);
    }
}
