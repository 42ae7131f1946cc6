export enum LogType {
    Debug,
    Info,
    Warn,
    Error
}

export interface ILogMessage {
    type: LogType;
    source: string;
    msg: string | object;
    exception?: Error;
    index?: number;
}

export type LogMessageCallback = ((msg: ILogMessage) => void);

export interface LogSettings {
    /** Lowest level written to the console. Every message still reaches history and the listener. */
    minLevel: LogType;
    /** Minimum interval between identical console messages (in ms) */
    throttleMs: number;
    /** Number of messages kept for late subscribers */
    historySize: number;
}

export const DEFAULT_LOG_SETTINGS: Readonly<LogSettings> = {
    minLevel: LogType.Info,
    throttleMs: 1000,
    historySize: 100,
};

/**
 * Frames that mark Node's async scheduling internals.
 * Everything from the first of them on is noise for a caller.
 */
const ASYNC_BOUNDARY_PATTERNS = [
    /processTicksAndRejections/,
    /process\.processImmediate/,
    /listOnTimeout/,
    /node:internal\//,
];

/**
 * Cut a stack trace at the first async boundary, keeping that frame for context.
 * @param stack The stack trace string
 * @returns Cleaned stack trace
 */
export function cleanStackTrace(stack: string): string {
    const lines = stack.split('\n');
    const result: string[] = [];

    for (const line of lines) {
        if (ASYNC_BOUNDARY_PATTERNS.some(p => p.test(line.trim()))) {
            result.push(line);
            result.push('    ... (async stack truncated)');
            break;
        }

        result.push(line);
    }

    return result.join('\n');
}

export class LogManager {
    public log: ILogMessage[] = [];
    private logMsgCount = 0;
    private listener: LogMessageCallback | null = null;
    private settings: LogSettings = { ...DEFAULT_LOG_SETTINGS };

    /** Throttle state: source+type+msg -> { lastTime, suppressedCount } */
    private throttleState = new Map<string, { lastTime: number; suppressedCount: number }>();

    public configure(settings: Partial<LogSettings>): void {
        this.settings = { ...this.settings, ...settings };
        this.trimHistory();
    }

    public getSettings(): Readonly<LogSettings> {
        return this.settings;
    }

    /** Number of messages currently tracked for throttling */
    public getThrottleStateSize(): number {
        return this.throttleState.size;
    }

    /** Drop history, throttle state and listener, and restore the default settings */
    public reset(): void {
        this.log = [];
        this.logMsgCount = 0;
        this.listener = null;
        this.settings = { ...DEFAULT_LOG_SETTINGS };
        this.throttleState.clear();
    }

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

    public push(msg: ILogMessage): void {
        msg.index = this.logMsgCount++;

        this.log.push(msg);
        this.trimHistory();

        if (this.listener) {
            this.listener(msg);
        }

        if (msg.type < this.settings.minLevel) {
            return;
        }

        const msgStr = typeof msg.msg === 'string' ? msg.msg : JSON.stringify(msg.msg);
        const throttleKey = `${msg.source}:${msg.type}:${msgStr}`;
        const now = performance.now();
        const state = this.throttleState.get(throttleKey);
        this.pruneThrottleState(now, throttleKey);

        if (state && now - state.lastTime < this.settings.throttleMs) {
            state.suppressedCount++;
            return;
        }

        const suppressedNote = state && state.suppressedCount > 0
            ? ` (${state.suppressedCount} similar suppressed)`
            : '';

        this.throttleState.set(throttleKey, { lastTime: now, suppressedCount: 0 });

        if (typeof msg.msg !== 'string') {
            console.dir(msg.msg);
            return;
        }

        this.write(msg.type, LogManager.format(msg, suppressedNote));
    }

    /** Build one complete console line, including exception details */
    public static format(msg: ILogMessage, suppressedNote = ''): string {
        const text = typeof msg.msg === 'string' ? msg.msg : JSON.stringify(msg.msg);
        let formatted = msg.source + '\t' + text + suppressedNote;

        if (msg.exception) {
            formatted += '\n' + msg.exception.message;
            if (msg.exception.stack) {
                formatted += '\n' + cleanStackTrace(msg.exception.stack);
            }
        }

        return formatted;
    }

    private write(type: LogType, formatted: string): void {
        switch (type) {
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

    /** Forget messages whose throttle window has passed, except the one being pushed */
    private pruneThrottleState(now: number, currentKey: string): void {
        for (const [key, state] of this.throttleState) {
            if (key !== currentKey && now - state.lastTime >= this.settings.throttleMs) {
                this.throttleState.delete(key);
            }
        }
    }

    private trimHistory(): void {
        const overflow = this.log.length - this.settings.historySize;
        if (overflow > 0) {
            this.log.splice(0, overflow);
        }
    }
}
