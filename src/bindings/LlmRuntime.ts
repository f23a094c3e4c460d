import path from "path";
import process from "process";
import chalk from "chalk";
import fs from "fs-extra";
import {EventRelay} from "lifecycle-utils";
import {getConsoleLogPrefix} from "../utils/getConsoleLogPrefix.js";
import {defaultDebugMode, defaultLogLevel} from "../config.js";
import {failure, failureFromUnknownError, Result, success} from "../result/Result.js";
import {SessionErrorCode} from "../result/SessionErrorCode.js";
import {LlmSession} from "../evaluator/LlmSession/LlmSession.js";
import {getModelInfo} from "../evaluator/LlmSession/utils/getModelInfo.js";
import type {ModelInfo} from "../types.js";
import type {EngineBindings} from "./EngineTypes.js";
import {Logger, LogLevel, LogLevelGreaterThanOrEqual} from "./types.js";

export const LogLevelToEngineLogLevel: ReadonlyMap<LogLevel, number> = new Map([
    [LogLevel.disabled, 0],
    [LogLevel.fatal, 1],
    [LogLevel.error, 2],
    [LogLevel.warn, 3],
    [LogLevel.info, 4],
    [LogLevel.log, 5],
    [LogLevel.debug, 6]
]);
const engineLogLevelToLogLevel: ReadonlyMap<number, LogLevel> = new Map(
    [...LogLevelToEngineLogLevel.entries()].map(([key, value]) => [value, key])
);
const defaultEngineLogLevel = 5;
const logLevelColors: Readonly<Record<LogLevel, (text: string) => string>> = {
    [LogLevel.disabled]: chalk.whiteBright,
    [LogLevel.fatal]: chalk.redBright,
    [LogLevel.error]: chalk.red,
    [LogLevel.warn]: chalk.yellow,
    [LogLevel.info]: chalk.whiteBright,
    [LogLevel.log]: chalk.white,
    [LogLevel.debug]: chalk.gray
};

export type LlmRuntimeOptions = {
    logLevel?: LogLevel,
    logger?: Logger,
    debug?: boolean
};

/**
 * A loaded engine binding.
 * Owns the logging of the engine and of the sessions created from it, and the engine backend,
 * which is initialized when the first user acquires it and freed when the last one releases it.
 */
export class LlmRuntime {
    /** @internal */ public readonly _bindings: EngineBindings;
    /** @internal */ public readonly _debug: boolean;
    /** @internal */ private _backendReferences: number = 0;
    /** @internal */ private _logger: Logger;
    /** @internal */ private _logLevel: LogLevel;
    /** @internal */ private _pendingLog: {level: LogLevel, message: string} | null = null;
    /** @internal */ private _logDispatchQueuedMicrotasks: number = 0;

    public readonly onBackendRelease = new EventRelay<void>();

    private constructor({bindings, logLevel, logger, debug}: {
        bindings: EngineBindings,
        logLevel: LogLevel,
        logger: Logger,
        debug: boolean
    }) {
        this._dispatchPendingLogMicrotask = this._dispatchPendingLogMicrotask.bind(this);
        this._onEngineLog = this._onEngineLog.bind(this);

        this._bindings = bindings;
        this._debug = debug;
        this._logger = logger;
        this._logLevel = this._debug
            ? LogLevel.debug
            : logLevel;

        this._bindings.setLogger?.(this._onEngineLog);
        this._bindings.setLoggerLogLevel?.(LogLevelToEngineLogLevel.get(this._logLevel) ?? defaultEngineLogLevel);
    }

    public get logLevel() {
        return this._logLevel;
    }

    public set logLevel(value: LogLevel) {
        if (value === this._logLevel || this._debug)
            return;

        this._bindings.setLoggerLogLevel?.(LogLevelToEngineLogLevel.get(value) ?? defaultEngineLogLevel);
        this._logLevel = value;
    }

    public get logger() {
        return this._logger;
    }

    public set logger(value: Logger) {
        this._logger = value;
    }

    /**
     * The number of live holders of the engine backend
     */
    public get backendReferences() {
        return this._backendReferences;
    }

    public createSession() {
        return new LlmSession({
            _runtime: this
        });
    }

    /**
     * Check that a model file can be loaded, without creating a session.
     * Loads the model on its own backend reference and releases everything before returning.
     */
    public async validateModel(modelPath: string): Promise<Result<ModelInfo>> {
        const resolvedPath = modelPath === ""
            ? ""
            : path.resolve(process.cwd(), modelPath);

        if (resolvedPath === "" || !(await fs.pathExists(resolvedPath)))
            return failure(SessionErrorCode.ModelNotFound, `Model file not found: ${modelPath}`);

        let backend: BackendReference | null = null;
        try {
            backend = this._acquireBackend();

            const model = await this._bindings.loadModel(resolvedPath, {gpuLayers: 0});
            if (model == null)
                return failure(SessionErrorCode.ModelInvalid, "Invalid model format");

            try {
                return success(getModelInfo(model, false));
            } finally {
                model.dispose();
            }
        } catch (err) {
            this._log(LogLevel.warn, `Failed to validate the model "${resolvedPath}": ${String(err)}`);
            return failureFromUnknownError(err);
        } finally {
            backend?.dispose();
        }
    }

    /** @internal */
    public _acquireBackend(): BackendReference {
        if (this._backendReferences === 0)
            this._bindings.initBackend();

        this._backendReferences++;

        let released = false;
        return {
            dispose: () => {
                if (released)
                    return;

                released = true;
                this._backendReferences--;

                if (this._backendReferences === 0) {
                    this._bindings.freeBackend();
                    this.onBackendRelease.dispatchEvent();
                }
            }
        };
    }

    /**
     * Log messages related to the runtime and its sessions
     * @internal
     */
    public _log(level: LogLevel, message: string) {
        this._flushPendingLog();
        this._callLogger(level, message);
    }

    /** @internal */
    private _onEngineLog(level: number, message: string) {
        const logLevel = engineLogLevelToLogLevel.get(level) ?? LogLevel.fatal;

        if (this._pendingLog != null && this._pendingLog.level !== logLevel)
            this._flushPendingLog();

        const text = (this._pendingLog?.message ?? "") + message;
        const lastNewLineIndex = text.lastIndexOf("\n");
        const completeLines = lastNewLineIndex < 0
            ? ""
            : text.slice(0, lastNewLineIndex);
        const partialLine = text.slice(lastNewLineIndex + 1);

        this._pendingLog = null;

        if (completeLines !== "")
            this._callLogger(logLevel, completeLines);

        if (partialLine !== "") {
            // the engine sends partial lines, so wait for the rest of the line before logging it
            this._pendingLog = {level: logLevel, message: partialLine};

            queueMicrotask(this._dispatchPendingLogMicrotask);
            this._logDispatchQueuedMicrotasks++;
        }
    }

    /** @internal */
    private _dispatchPendingLogMicrotask() {
        this._logDispatchQueuedMicrotasks--;
        if (this._logDispatchQueuedMicrotasks === 0)
            this._flushPendingLog();
    }

    /** @internal */
    private _flushPendingLog() {
        const pendingLog = this._pendingLog;
        this._pendingLog = null;

        if (pendingLog != null)
            this._callLogger(pendingLog.level, pendingLog.message);
    }

    /** @internal */
    private _callLogger(level: LogLevel, message: string) {
        if (level === LogLevel.disabled || !LogLevelGreaterThanOrEqual(level, this._logLevel))
            return;

        try {
            this._logger(level, message);
        } catch (err) {
            // the engine calls this function from native code, so throwing here would crash the process
            process.emitWarning(`Logger threw an error: ${String(err)}`);
        }
    }

    public static fromBindings(bindings: EngineBindings, {
        logLevel = defaultLogLevel,
        logger = LlmRuntime.defaultConsoleLogger,
        debug = defaultDebugMode
    }: LlmRuntimeOptions = {}) {
        return new LlmRuntime({
            bindings,
            logLevel,
            logger,
            debug
        });
    }

    public static defaultConsoleLogger(level: LogLevel, message: string) {
        if (level === LogLevel.disabled)
            return;

        const prefix = getConsoleLogPrefix();
        const color = logLevelColors[level];
        const text = prefix + message
            .split("\n")
            .map((line) => color(line))
            .join("\n" + prefix);

        // console.error is not used for errors, since it prints the stack trace
        if (level === LogLevel.debug)
            console.debug(text);
        else if (LogLevelGreaterThanOrEqual(level, LogLevel.warn))
            console.warn(text);
        else
            console.info(text);
    }
}

export type BackendReference = {
    /** Release this reference. Calling it more than once has no effect */
    dispose(): void
};
