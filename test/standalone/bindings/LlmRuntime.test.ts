import path from "path";
import {describe, expect, test, vi} from "vitest";
import stripAnsi from "strip-ansi";
import {LlmRuntime, LogLevel, SessionErrorCode} from "../../../src/index.js";
import {FakeEngine} from "../../utils/FakeEngine.js";
import {createTestRuntime} from "../../utils/getTestRuntime.js";
import {getTempTestDir, writeFakeModelFile} from "../../utils/helpers/getTempTestDir.js";

function waitForLogDispatch() {
    return new Promise((accept) => setTimeout(accept, 0));
}


describe("bindings", () => {
    describe("LlmRuntime", () => {
        describe("logging", () => {
            test("sets the engine log level", () => {
                const {engine, runtime} = createTestRuntime({logLevel: LogLevel.warn});

                expect(engine.logger).not.to.eql(null);
                expect(engine.loggerLogLevel).to.eql(3);

                runtime.logLevel = LogLevel.error;
                expect(engine.loggerLogLevel).to.eql(2);
                expect(runtime.logLevel).to.eql(LogLevel.error);
            });

            test("debug mode logs everything", () => {
                const engine = new FakeEngine();
                const runtime = LlmRuntime.fromBindings(engine, {logLevel: LogLevel.error, logger() {}, debug: true});

                expect(runtime.logLevel).to.eql(LogLevel.debug);
                expect(engine.loggerLogLevel).to.eql(6);

                runtime.logLevel = LogLevel.warn;
                expect(runtime.logLevel).to.eql(LogLevel.debug);
            });

            test("forwards engine logs", () => {
                const {engine, logs} = createTestRuntime({logLevel: LogLevel.info});

                engine.logger?.(4, "loaded 291 tensors\n");
                engine.logger?.(2, "failed to allocate buffer\n");
                engine.logger?.(6, "graph splits = 1\n");

                expect(logs).to.eql([
                    {level: LogLevel.info, message: "loaded 291 tensors"},
                    {level: LogLevel.error, message: "failed to allocate buffer"}
                ]);
            });

            test("joins partial lines", async () => {
                const {engine, logs} = createTestRuntime();

                engine.logger?.(4, "loading model ");
                engine.logger?.(4, "tensors: ");
                engine.logger?.(4, "done\n");

                expect(logs).to.eql([{level: LogLevel.info, message: "loading model tensors: done"}]);

                await waitForLogDispatch();
                expect(logs.length).to.eql(1);
            });

            test("flushes a partial line", async () => {
                const {engine, logs} = createTestRuntime();

                engine.logger?.(4, "progress: ...");
                expect(logs).to.eql([]);

                await waitForLogDispatch();
                expect(logs).to.eql([{level: LogLevel.info, message: "progress: ..."}]);
            });

            test("a log of another level flushes the partial line", () => {
                const {engine, logs} = createTestRuntime();

                engine.logger?.(4, "progress: ...");
                engine.logger?.(3, "slow disk\n");

                expect(logs).to.eql([
                    {level: LogLevel.info, message: "progress: ..."},
                    {level: LogLevel.warn, message: "slow disk"}
                ]);
            });

            test("multiple lines in a single log", () => {
                const {engine, logs} = createTestRuntime();

                engine.logger?.(5, "first\nsecond\n");

                expect(logs).to.eql([{level: LogLevel.log, message: "first\nsecond"}]);
            });

            test("unknown engine log levels are fatal", () => {
                const {engine, logs} = createTestRuntime();

                engine.logger?.(42, "something broke\n");

                expect(logs).to.eql([{level: LogLevel.fatal, message: "something broke"}]);
            });

            test("runtime logs flush the pending engine line", () => {
                const {engine, runtime, logs} = createTestRuntime();

                engine.logger?.(4, "progress: ...");
                runtime._log(LogLevel.info, "Model loaded");

                expect(logs).to.eql([
                    {level: LogLevel.info, message: "progress: ..."},
                    {level: LogLevel.info, message: "Model loaded"}
                ]);
            });

            test("default console logger", () => {
                const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
                const info = vi.spyOn(console, "info").mockImplementation(() => {});
                const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
                const printed = (spy: typeof warn) => spy.mock.calls.map(([text]) => stripAnsi(String(text)));

                try {
                    LlmRuntime.defaultConsoleLogger(LogLevel.error, "disk full");
                    LlmRuntime.defaultConsoleLogger(LogLevel.log, "first\nsecond");
                    LlmRuntime.defaultConsoleLogger(LogLevel.debug, "graph splits = 1");
                    LlmRuntime.defaultConsoleLogger(LogLevel.disabled, "nothing");

                    expect(printed(warn)).to.eql(["[llm-session] disk full"]);
                    expect(printed(info)).to.eql(["[llm-session] first\n[llm-session] second"]);
                    expect(printed(debug)).to.eql(["[llm-session] graph splits = 1"]);
                } finally {
                    vi.restoreAllMocks();
                }
            });

            test("disabled", () => {
                const {engine, logs} = createTestRuntime({logLevel: LogLevel.disabled});

                engine.logger?.(1, "fatal error\n");
                engine.logger?.(0, "nothing\n");

                expect(logs).to.eql([]);
            });
        });

        describe("backend", () => {
            test("shared between sessions", async () => {
                const {engine, runtime} = createTestRuntime();
                const modelPath = await writeFakeModelFile();
                let releaseCount = 0;
                runtime.onBackendRelease.createListener(() => void releaseCount++);

                const session1 = runtime.createSession();
                const session2 = runtime.createSession();

                await session1.initialize({modelPath});
                await session2.initialize({modelPath});
                expect(runtime.backendReferences).to.eql(2);
                expect(engine.calls.filter((call) => call === "initBackend")).to.eql(["initBackend"]);

                await session1.teardown();
                expect(runtime.backendReferences).to.eql(1);
                expect(engine.backendInitialized).to.eql(true);
                expect(releaseCount).to.eql(0);

                await session2.teardown();
                expect(runtime.backendReferences).to.eql(0);
                expect(engine.backendInitialized).to.eql(false);
                expect(releaseCount).to.eql(1);
            });
        });

        describe("validateModel", () => {
            test("valid model", async () => {
                const {engine, runtime} = createTestRuntime();
                const modelPath = await writeFakeModelFile();

                expect(await runtime.validateModel(modelPath)).to.eql({
                    ok: true,
                    value: {
                        name: "llama 7B Q4_0",
                        architecture: "llama",
                        parameterCount: 6_738_415_616,
                        contextSize: 4096,
                        supportsVision: false,
                        capabilities: ["text_generation"]
                    }
                });
                expect(engine.calls).to.eql(["initBackend", "loadModel", "model.dispose", "freeBackend"]);
                expect(engine.lastGpuLayers).to.eql(0);
                expect(runtime.backendReferences).to.eql(0);
            });

            test("missing model", async () => {
                const {engine, runtime} = createTestRuntime();
                const modelPath = path.join(await getTempTestDir(), "missing-model.gguf");

                expect(await runtime.validateModel(modelPath)).to.eql({
                    ok: false,
                    error: SessionErrorCode.ModelNotFound,
                    message: `Model file not found: ${modelPath}`
                });
                expect(await runtime.validateModel("")).to.eql({
                    ok: false,
                    error: SessionErrorCode.ModelNotFound,
                    message: "Model file not found: "
                });
                expect(engine.calls).to.eql([]);
            });

            test("model that fails to load", async () => {
                const {engine, runtime} = createTestRuntime();
                engine.failLoadModel = true;

                expect(await runtime.validateModel(await writeFakeModelFile())).to.eql({
                    ok: false,
                    error: SessionErrorCode.ModelInvalid,
                    message: "Invalid model format"
                });
                expect(engine.calls).to.eql(["initBackend", "loadModel", "freeBackend"]);
            });

            test("engine exception", async () => {
                const {engine, runtime} = createTestRuntime();
                engine.throwOnLoadModel = new Error("unsupported tensor type");

                expect(await runtime.validateModel(await writeFakeModelFile())).to.eql({
                    ok: false,
                    error: SessionErrorCode.UnknownError,
                    message: "unsupported tensor type"
                });
                expect(engine.calls).to.eql(["initBackend", "loadModel", "freeBackend"]);
            });
        });
    });
});
