import path from "path";
import process from "process";
import {createRequire} from "module";
import {defaultBindingPath, defaultDebugMode, defaultLogLevel} from "../config.js";
import {LlmRuntime} from "./LlmRuntime.js";
import {LogLevel, Logger} from "./types.js";
import {NoBindingFoundError} from "./utils/NoBindingFoundError.js";
import {isEngineBindings} from "./utils/isEngineBindings.js";

const require = createRequire(import.meta.url);

export type RuntimeOptions = {
    /**
     * Path to the native engine module to load.
     *
     * Defaults to the `LLM_SESSION_BINDING_PATH` environment variable.
     */
    bindingPath?: string,

    /**
     * Set the log level of the engine and the session layer.
     *
     * Defaults to the `LLM_SESSION_LOG_LEVEL` environment variable, or `"warn"`.
     */
    logLevel?: LogLevel,

    /**
     * Set a custom logger for the engine and the session layer.
     */
    logger?: Logger,

    /**
     * Log everything at the `debug` level, regardless of `logLevel`.
     *
     * Defaults to the `LLM_SESSION_DEBUG` environment variable, or `false`.
     */
    debug?: boolean
};

/**
 * Load a native engine module and wrap it in a runtime.
 * @example
 * ```typescript
 * import {getRuntime} from "llm-session";
 *
 * const runtime = getRuntime({bindingPath: "./engine.node"});
 * const session = runtime.createSession();
 * ```
 * @throws {NoBindingFoundError} when no binding path is configured, the module fails to load,
 * or the loaded module is not an engine binding
 */
export function getRuntime({
    bindingPath = defaultBindingPath,
    logLevel = defaultLogLevel,
    logger = LlmRuntime.defaultConsoleLogger,
    debug = defaultDebugMode
}: RuntimeOptions = {}): LlmRuntime {
    if (bindingPath == null || bindingPath === "")
        throw new NoBindingFoundError(
            "No engine binding path was provided. Pass the `bindingPath` option or set the LLM_SESSION_BINDING_PATH environment variable"
        );

    const resolvedBindingPath = path.resolve(process.cwd(), bindingPath);

    let bindings: unknown;
    try {
        bindings = require(resolvedBindingPath);
    } catch (err) {
        throw new NoBindingFoundError(`Failed to load the engine binding from "${resolvedBindingPath}"`, {cause: err});
    }

    if (!isEngineBindings(bindings))
        throw new NoBindingFoundError(`The module at "${resolvedBindingPath}" is not an engine binding`);

    return LlmRuntime.fromBindings(bindings, {logLevel, logger, debug});
}
