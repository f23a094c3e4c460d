import type {Token} from "../types.js";


/**
 * The shape of a native engine module.
 * Everything below is implemented by the native binding; the session layer only consumes it.
 */
export type EngineBindings = {
    initBackend(): void,
    freeBackend(): void,
    loadModel(modelPath: string, params: {
        gpuLayers: number,
        onLoadProgress?(loadProgress: number): void
    }): Promise<EngineModel | null>,

    /** Absent when the binding was built without multimodal support */
    initVision?(mmprojPath: string, model: EngineModel, params: {
        useGpu: boolean,
        threads: number,
        verbosity: EngineVisionVerbosity
    }): Promise<EngineVision | null>,

    setLogger?(logger: (level: number, message: string) => void): void,
    setLoggerLogLevel?(level: number): void
};

export type EngineModel = {
    initContext(params: {
        contextSize: number,
        batchSize: number,
        threads: number
    }): Promise<EngineContext | null>,
    createSampler(stages: readonly SamplerStage[]): EngineSampler | null,
    tokenize(text: string, addSpecial: boolean, parseSpecial: boolean): Uint32Array | null,

    /** Render a conversation with the chat template embedded in the model file */
    applyChatTemplate(messages: readonly EngineChatMessage[], addAssistantPrompt: boolean): string | null,
    tokenToText(token: Token): string,
    isEogToken(token: Token): boolean,
    getDescription(): string,
    getParameterCount(): number,
    getTrainContextSize(): number,

    /** Size of the model weights in memory, in bytes */
    getModelSize(): number,
    dispose(): void
};

export type EngineContext = {
    /** Resolves to `false` when the engine failed to evaluate the batch */
    decode(batch: EngineBatch): Promise<boolean>,

    /** Remove every cell of the sequence from the context memory */
    clearMemory(): void,

    /** Size of the context state, in bytes */
    getStateSize(): number,
    dispose(): void
};

export type EngineBatch = {
    readonly tokens: Uint32Array,
    readonly positions: Int32Array,

    /** `1` for positions whose logits should be computed */
    readonly logits: Uint8Array,
    readonly length: number
};

export type EngineSampler = {
    /** Sample from the logits of the last evaluated position. Returns `null` when sampling failed */
    sample(context: EngineContext): Token | null,
    accept(token: Token): void,
    dispose(): void
};

export type EngineVision = {
    bitmapFromBytes(data: Uint8Array): EngineBitmap | null,
    tokenizeMixed(text: string, bitmaps: readonly EngineBitmap[], options: {
        addSpecial: boolean,
        parseSpecial: boolean
    }): EngineChunks | null,

    /** Resolves to the position after the last evaluated chunk, or `null` on failure */
    evaluateChunks(
        context: EngineContext,
        chunks: EngineChunks,
        startPosition: number,
        batchSize: number
    ): Promise<number | null>,
    defaultImageMarker(): string,
    dispose(): void
};

export type EngineBitmap = {
    dispose(): void
};

export type EngineChunks = {
    dispose(): void
};

export type EngineChatMessage = {
    role: string,
    content: string
};

export type EngineVisionVerbosity = "info" | "debug";

/**
 * A single stage of a sampler chain, in the order the engine should apply it
 */
export type SamplerStage = {
    type: "penalties",
    lastN: number,
    repeatPenalty: number,
    frequencyPenalty: number,
    presencePenalty: number
} | {
    type: "greedy"
} | {
    type: "topK",
    k: number
} | {
    type: "typical",
    p: number,
    minKeep: number
} | {
    type: "topP",
    p: number,
    minKeep: number
} | {
    type: "minP",
    p: number,
    minKeep: number
} | {
    type: "temperature",
    temperature: number
} | {
    type: "dist",

    /** `undefined` lets the engine pick a random seed */
    seed?: number
};
export type SamplerStageType = SamplerStage["type"];
