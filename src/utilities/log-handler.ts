import { ILogMessage, LogManager, LogType } from './log-manager';

/**
 * Per-module logger. Every instance writes to one shared LogManager,
 * tagging its messages with the module name.
 *
 * ```typescript
 * private static log = new LogHandler('GridIndexer');
 * GridIndexer.log.warn('width must be a positive integer, got 0');
 * ```
 */
export class LogHandler {
    private static manager = new LogManager();

    constructor(public readonly moduleName: string) {}

    /** log an error, with the exception's message and stack when given */
    public error(msg: string, exception?: Error): void {
        this.push(LogType.Error, msg, exception);
    }

    public warn(msg: string): void {
        this.push(LogType.Warn, msg);
    }

    public info(msg: string): void {
        this.push(LogType.Info, msg);
    }

    /** Non-string messages are written to the console as {prop:value} */
    public debug(msg: string | object): void {
        this.push(LogType.Debug, msg);
    }

    public static getLogManager(): LogManager {
        return this.manager;
    }

    private push(type: LogType, msg: ILogMessage['msg'], exception?: Error): void {
        LogHandler.manager.push({ type, source: this.moduleName, msg, exception });
    }
}
