import type {
    EngineBatch, EngineBindings, EngineBitmap, EngineChatMessage, EngineChunks, EngineContext, EngineModel, EngineSampler,
    EngineVision, EngineVisionVerbosity, SamplerStage
} from "../../src/bindings/EngineTypes.js";
import type {Token} from "../../src/types.js";

export const fakeEogToken = 0;
export const fakeImageMarker = "<__media__>";
export const fakeImageTokens = 16;
export const bytesInMegabyte = 1024 * 1024;

export type DecodedBatch = {
    tokens: Token[],
    positions: number[],
    logits: number[]
};

/**
 * An in-process stand-in for a native engine binding.
 * Records every engine call in `calls`, and generates the scripted `responseTokens` followed by an end-of-generation token.
 */
export class FakeEngine implements EngineBindings {
    public readonly calls: string[] = [];

    public responseTokens: Token[] = [1, 2, 3, 4];
    public vocabulary: ReadonlyMap<Token, string> = new Map([
        [1, "Hello"],
        [2, ","],
        [3, " world"],
        [4, "!"]
    ]);

    public modelDescription = "llama 7B Q4_0";
    public parameterCount = 6_738_415_616;
    public trainContextSize = 4096;
    public modelSize = 3900 * bytesInMegabyte;
    public contextStateSize = 256 * bytesInMegabyte + 1234;
    public loadProgressSteps: number[] = [0.5, 1];

    public failLoadModel = false;
    public failInitContext = false;
    public failInitVision = false;
    public failCreateSampler = false;
    public failApplyChatTemplate = false;
    public failTokenize = false;
    public failBitmap = false;
    public failTokenizeMixed = false;
    public failEvaluateChunks = false;
    public failSample = false;
    public throwOnLoadModel: Error | null = null;

    /** Index of the `decode` call (counting from `0` since the last `initContext`) that should fail */
    public failDecodeAt: number | null = null;

    /** Called before each `decode`, can be used to cancel a generation at a specific point */
    public beforeDecode: ((batch: DecodedBatch, decodeIndex: number) => void | Promise<void>) | null = null;

    public readonly decodedBatches: DecodedBatch[] = [];
    public samplerStages: readonly SamplerStage[] | null = null;
    public lastTemplateMessages: readonly EngineChatMessage[] | null = null;
    public lastTokenizeArgs: {text: string, addSpecial: boolean, parseSpecial: boolean} | null = null;
    public lastMixedTokenizeArgs: {text: string, bitmaps: number, addSpecial: boolean, parseSpecial: boolean} | null = null;
    public lastEvaluateChunksArgs: {startPosition: number, batchSize: number} | null = null;
    public lastVisionOptions: {useGpu: boolean, threads: number, verbosity: EngineVisionVerbosity} | null = null;
    public lastContextOptions: {contextSize: number, batchSize: number, threads: number} | null = null;
    public lastGpuLayers: number | null = null;

    public backendInitialized = false;
    public logger: ((level: number, message: string) => void) | null = null;
    public loggerLogLevel: number | null = null;

    public initBackend() {
        this.calls.push("initBackend");
        this.backendInitialized = true;
    }

    public freeBackend() {
        this.calls.push("freeBackend");
        this.backendInitialized = false;
    }

    public async loadModel(modelPath: string, {gpuLayers, onLoadProgress}: {
        gpuLayers: number,
        onLoadProgress?(loadProgress: number): void
    }): Promise<EngineModel | null> {
        this.calls.push("loadModel");
        this.lastGpuLayers = gpuLayers;

        if (this.throwOnLoadModel != null)
            throw this.throwOnLoadModel;

        if (this.failLoadModel)
            return null;

        for (const step of this.loadProgressSteps)
            onLoadProgress?.(step);

        return new FakeModel(this);
    }

    /** Set to `undefined` to simulate a binding built without multimodal support */
    public initVision: EngineBindings["initVision"] = async (mmprojPath, model, options) => {
        this.calls.push("initVision");
        this.lastVisionOptions = options;

        if (this.failInitVision)
            return null;

        return new FakeVision(this);
    };

    public setLogger(logger: (level: number, message: string) => void) {
        this.logger = logger;
    }

    public setLoggerLogLevel(level: number) {
        this.loggerLogLevel = level;
    }

    public tokenToText(token: Token) {
        return this.vocabulary.get(token) ?? `<${token}>`;
    }
}

class FakeModel implements EngineModel {
    private readonly _engine: FakeEngine;

    public constructor(engine: FakeEngine) {
        this._engine = engine;
    }

    public async initContext(options: {contextSize: number, batchSize: number, threads: number}): Promise<EngineContext | null> {
        this._engine.calls.push("initContext");
        this._engine.lastContextOptions = options;

        if (this._engine.failInitContext)
            return null;

        return new FakeContext(this._engine);
    }

    public createSampler(stages: readonly SamplerStage[]): EngineSampler | null {
        this._engine.calls.push("createSampler");
        this._engine.samplerStages = stages;

        if (this._engine.failCreateSampler)
            return null;

        return new FakeSampler(this._engine);
    }

    public tokenize(text: string, addSpecial: boolean, parseSpecial: boolean): Uint32Array | null {
        this._engine.lastTokenizeArgs = {text, addSpecial, parseSpecial};

        if (this._engine.failTokenize)
            return null;

        // one token per character
        return Uint32Array.from(text, (char) => char.charCodeAt(0));
    }

    public applyChatTemplate(messages: readonly EngineChatMessage[], addAssistantPrompt: boolean): string | null {
        this._engine.lastTemplateMessages = messages;

        if (this._engine.failApplyChatTemplate)
            return null;

        return messages.map((message) => `<|${message.role}|>${message.content}\n`).join("") +
            (addAssistantPrompt ? "<|assistant|>" : "");
    }

    public tokenToText(token: Token) {
        return this._engine.tokenToText(token);
    }

    public isEogToken(token: Token) {
        return token === fakeEogToken;
    }

    public getDescription() {
        return this._engine.modelDescription;
    }

    public getParameterCount() {
        return this._engine.parameterCount;
    }

    public getTrainContextSize() {
        return this._engine.trainContextSize;
    }

    public getModelSize() {
        return this._engine.modelSize;
    }

    public dispose() {
        this._engine.calls.push("model.dispose");
    }
}

class FakeContext implements EngineContext {
    private readonly _engine: FakeEngine;
    private _decodeIndex: number = 0;

    public constructor(engine: FakeEngine) {
        this._engine = engine;
    }

    public async decode(batch: EngineBatch): Promise<boolean> {
        const decodeIndex = this._decodeIndex++;
        const decodedBatch: DecodedBatch = {
            tokens: Array.from(batch.tokens.subarray(0, batch.length)),
            positions: Array.from(batch.positions.subarray(0, batch.length)),
            logits: Array.from(batch.logits.subarray(0, batch.length))
        };

        await this._engine.beforeDecode?.(decodedBatch, decodeIndex);
        this._engine.decodedBatches.push(decodedBatch);

        return this._engine.failDecodeAt !== decodeIndex;
    }

    public clearMemory() {
        this._engine.calls.push("clearMemory");
    }

    public getStateSize() {
        return this._engine.contextStateSize;
    }

    public dispose() {
        this._engine.calls.push("context.dispose");
    }
}

class FakeSampler implements EngineSampler {
    private readonly _engine: FakeEngine;
    private _nextIndex: number = 0;

    public constructor(engine: FakeEngine) {
        this._engine = engine;
    }

    public sample(): Token | null {
        if (this._engine.failSample)
            return null;

        const token = this._engine.responseTokens[this._nextIndex];
        this._nextIndex++;

        return token ?? fakeEogToken;
    }

    public accept(token: Token) {
        this._engine.calls.push(`accept:${token}`);
    }

    public dispose() {
        this._engine.calls.push("sampler.dispose");
    }
}

class FakeVision implements EngineVision {
    private readonly _engine: FakeEngine;

    public constructor(engine: FakeEngine) {
        this._engine = engine;
    }

    public bitmapFromBytes(): EngineBitmap | null {
        this._engine.calls.push("bitmapFromBytes");

        if (this._engine.failBitmap)
            return null;

        return {
            dispose: () => {
                this._engine.calls.push("bitmap.dispose");
            }
        };
    }

    public tokenizeMixed(text: string, bitmaps: readonly EngineBitmap[], options: {
        addSpecial: boolean,
        parseSpecial: boolean
    }): EngineChunks | null {
        this._engine.lastMixedTokenizeArgs = {text, bitmaps: bitmaps.length, ...options};

        if (this._engine.failTokenizeMixed)
            return null;

        const tokenCount = text.replaceAll(fakeImageMarker, "").length + bitmaps.length * fakeImageTokens;
        return new FakeChunks(this._engine, tokenCount);
    }

    public async evaluateChunks(
        context: EngineContext, chunks: EngineChunks, startPosition: number, batchSize: number
    ): Promise<number | null> {
        this._engine.lastEvaluateChunksArgs = {startPosition, batchSize};

        if (this._engine.failEvaluateChunks || !(chunks instanceof FakeChunks))
            return null;

        return startPosition + chunks.tokenCount;
    }

    public defaultImageMarker() {
        return fakeImageMarker;
    }

    public dispose() {
        this._engine.calls.push("vision.dispose");
    }
}

class FakeChunks implements EngineChunks {
    public readonly tokenCount: number;
    private readonly _engine: FakeEngine;

    public constructor(engine: FakeEngine, tokenCount: number) {
        this._engine = engine;
        this.tokenCount = tokenCount;
    }

    public dispose() {
        this._engine.calls.push("chunks.dispose");
    }
}
