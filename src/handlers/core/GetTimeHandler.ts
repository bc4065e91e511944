import { BaseToolHandler } from "./BaseToolHandler.js";
import type { GetTimeInput, GetTimeResult } from "../../types/time-responses.js";

export class GetTimeHandler extends BaseToolHandler<GetTimeInput, GetTimeResult> {
    readonly toolName = 'get_time';
    readonly operationName = 'get_current_time';

    protected execute(args: GetTimeInput): GetTimeResult {
        return this.context.timeService.getCurrentTime(args);
    }
}
