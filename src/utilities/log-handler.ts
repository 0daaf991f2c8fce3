import { LogManager, LogType, type ILogMessage } from './log-manager';

/**
 * Named logger for one module. All handlers feed the same LogManager, so a
 * single listener sees the output of every grid module.
 */
export class LogHandler {
    private static readonly manager = new LogManager();

    constructor(public readonly source: string) {}

    /** Handler for a part of this module, tagged `Source/scope`. */
    public child(scope: string): LogHandler {
        return new LogHandler(`${this.source}/${scope}`);
    }

    /** Anything thrown is accepted as the cause; non-Error values are wrapped. */
    public error(msg: string, cause?: unknown): void {
        if (cause === undefined) {
            this.write(LogType.Error, msg);
            return;
        }
        this.write(LogType.Error, msg, cause instanceof Error ? cause : new Error(String(cause)));
    }

    public warn(msg: string): void {
        this.write(LogType.Warn, msg);
    }

    public info(msg: string): void {
        this.write(LogType.Info, msg);
    }

    /** Non-string values are printed with console.dir. */
    public debug(msg: unknown): void {
        this.write(LogType.Debug, msg);
    }

    private write(type: LogType, msg: unknown, exception?: Error): void {
        const entry: ILogMessage = { type, source: this.source, msg };
        if (exception) {
            entry.exception = exception;
        }
        LogHandler.manager.push(entry);
    }

    public static getLogManager(): LogManager {
        return LogHandler.manager;
    }
}
