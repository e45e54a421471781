import { LogManager, LogType } from './log-manager';

/** handle error logging */
export class LogHandler {
    private readonly _moduleName: string;
    private static manager = new LogManager();

    constructor(moduleName: string) {
        this._moduleName = moduleName;
    }

    /** log an error */
    public error(msg: string, exception?: Error): void {
        LogHandler.manager.push({
            type: LogType.Error,
            source: this._moduleName,
            msg,
            exception
        });
    }

    /** log a warning */
    public warn(msg: string): void {
        LogHandler.manager.push({
            type: LogType.Warn,
            source: this._moduleName,
            msg
        });
    }

    /** log an info message */
    public info(msg: string): void {
        LogHandler.manager.push({
            type: LogType.Info,
            source: this._moduleName,
            msg
        });
    }

    /** write a debug message */
    public debug(msg: string, exception?: Error): void {
        LogHandler.manager.push({
            type: LogType.Debug,
            source: this._moduleName,
            msg,
            exception
        });
    }

    public static getLogManager(): LogManager {
        return this.manager;
    }
}
