import { BaseToolHandler } from "./BaseToolHandler.js";
import type { TimezoneInfo, TimezoneInfoInput } from "../../types/time-responses.js";

export class TimezoneInfoHandler extends BaseToolHandler<TimezoneInfoInput, TimezoneInfo> {
    readonly toolName = 'timezone_info';
    readonly operationName = 'get_timezone_info';

    protected execute(args: TimezoneInfoInput): TimezoneInfo {
        return this.context.timeService.getTimezoneInfo(args);
    }
}
