export enum LogLevel {
    disabled = "disabled",
    fatal = "fatal",
    error = "error",
    warn = "warn",
    info = "info",
    log = "log",
    debug = "debug"
}
export const LogLevelValues = Object.freeze([
    LogLevel.disabled,
    LogLevel.fatal,
    LogLevel.error,
    LogLevel.warn,
    LogLevel.info,
    LogLevel.log,
    LogLevel.debug
] as const);

export type Logger = (level: LogLevel, message: string) => void;

/**
 * Check if a log level is higher than another log level
 * @example
 * ```ts
 * LogLevelGreaterThan(LogLevel.error, LogLevel.info); // true
 * ```
 */
export function LogLevelGreaterThan(a: LogLevel, b: LogLevel): boolean {
    return LogLevelValues.indexOf(a) < LogLevelValues.indexOf(b);
}

/**
 * Check if a log level is higher than or equal to another log level
 * @example
 * ```ts
 * LogLevelGreaterThanOrEqual(LogLevel.error, LogLevel.info); // true
 * LogLevelGreaterThanOrEqual(LogLevel.error, LogLevel.error); // true
 * ```
 */
export function LogLevelGreaterThanOrEqual(a: LogLevel, b: LogLevel): boolean {
    return LogLevelValues.indexOf(a) <= LogLevelValues.indexOf(b);
}
