export enum LogType {
    Error,
    Warn,
    Info,
    Debug
}

export interface ILogMessage {
    type: LogType;
    source: string;
    msg: string;
    exception?: Error;
    index?: number;
}

export type LogMessageCallback = ((msg: ILogMessage) => void);

/** Minimum interval between identical log messages (in ms) */
const LOG_THROTTLE_MS = 1000;

/** Number of messages kept for late listeners */
const LOG_HISTORY_SIZE = 100;

/**
 * Drop repeated consecutive frames from a stack trace. Recursive column
 * walkers otherwise print the same frame dozens of times.
 */
function cleanStackTrace(stack: string): string {
    const result: string[] = [];
    let previous = '';
    let repeated = 0;

    for (const line of stack.split('\n')) {
        if (line === previous) {
            repeated++;
            continue;
        }

        if (repeated > 0) {
            result.push(`    ... (${repeated} repeated frames)`);
            repeated = 0;
        }

        result.push(line);
        previous = line;
    }

    if (repeated > 0) {
        result.push(`    ... (${repeated} repeated frames)`);
    }

    return result.join('\n');
}

export class LogManager {
    public log: ILogMessage[] = [];
    private logMsgCount = 0;
    private listener: LogMessageCallback | null = null;
    private consoleLevel = LogType.Info;

    /** Throttle state: source+type+msg -> { lastTime, suppressedCount } */
    private throttleState = new Map<string, { lastTime: number; suppressedCount: number }>();

    public onLogMessage(callback: LogMessageCallback | null): void {
        this.listener = callback;

        if (!callback) {
            return;
        }

        // send old messages
        for (const msg of this.log) {
            callback(msg);
        }
    }

    /** Messages less severe than [level] are kept and published, but not printed */
    public setConsoleLevel(level: LogType): void {
        this.consoleLevel = level;
    }

    public getConsoleLevel(): LogType {
        return this.consoleLevel;
    }

    /** Forget the history and the throttle state */
    public clear(): void {
        this.log = [];
        this.throttleState.clear();
    }

    public push(msg: ILogMessage): void {
        msg.index = this.logMsgCount++;

        // save message to log
        this.log.push(msg);
        if (this.log.length > LOG_HISTORY_SIZE) {
            this.log.shift();
        }

        // publish to listener
        if (this.listener) {
            this.listener(msg);
        }

        if (msg.type > this.consoleLevel) {
            return;
        }

        const throttleKey = `${msg.source}:${msg.type}:${msg.msg}`;
        const now = performance.now();
        const state = this.throttleState.get(throttleKey);

        if (state && now - state.lastTime < LOG_THROTTLE_MS) {
            state.suppressedCount++;
            return;
        }

        const suppressedNote = state && state.suppressedCount > 0
            ? ` (${state.suppressedCount} similar suppressed)`
            : '';

        this.throttleState.set(throttleKey, { lastTime: now, suppressedCount: 0 });

        let formatted = msg.source + '\t' + msg.msg + suppressedNote;

        if (msg.exception) {
            formatted += '\n' + msg.exception.message;
            if (msg.exception.stack && msg.type === LogType.Debug) {
                formatted += '\n' + cleanStackTrace(msg.exception.stack);
            }
        }

        switch (msg.type) {
        case LogType.Error:
            console.error(formatted);
            break;
        case LogType.Warn:
            console.warn(formatted);
            break;
        case LogType.Info:
            console.info(formatted);
            break;
        case LogType.Debug:
            console.log(formatted);
            break;
        }
    }
}
