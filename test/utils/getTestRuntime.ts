import {LlmRuntime} from "../../src/bindings/LlmRuntime.js";
import {LogLevel} from "../../src/bindings/types.js";
import {unwrapResult} from "../../src/result/Result.js";
import type {SessionParams} from "../../src/evaluator/SessionParams.js";
import {FakeEngine} from "./FakeEngine.js";
import {writeFakeModelFile} from "./helpers/getTempTestDir.js";

export type LogEntry = {
    level: LogLevel,
    message: string
};

/**
 * Create a runtime over a fresh fake engine, collecting every log of the runtime into `logs`
 */
export function createTestRuntime({logLevel = LogLevel.debug}: {logLevel?: LogLevel} = {}) {
    const engine = new FakeEngine();
    const logs: LogEntry[] = [];
    const runtime = LlmRuntime.fromBindings(engine, {
        logLevel,
        logger(level, message) {
            logs.push({level, message});
        },
        debug: false
    });

    return {engine, runtime, logs};
}

/**
 * Create a session over a fresh fake engine and initialize it with a fake model file
 */
export async function createInitializedTestSession(params: Omit<SessionParams, "modelPath"> = {}) {
    const {engine, runtime, logs} = createTestRuntime();
    const modelPath = await writeFakeModelFile();
    const session = runtime.createSession();

    unwrapResult(await session.initialize({modelPath, ...params}));

    return {engine, runtime, logs, session, modelPath};
}
