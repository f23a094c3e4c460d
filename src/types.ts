import type {SamplingParams} from "./evaluator/SamplingParams.js";

export type Token = number;

export type ChatMessageRole = "user" | "assistant" | "system";

export type ImageData = {
    /** Raw encoded image bytes (PNG, JPEG or BMP). The format is sniffed from the content */
    data: Uint8Array
};

export type ChatMessage = {
    role: ChatMessageRole,
    content: string,
    images?: readonly ImageData[]
};

/**
 * Called with a number between `0` and `1` and a short description of the current stage
 */
export type ProgressCallback = (progress: number, stage: string) => void;

/**
 * Called with the text of every generated token, as soon as it's generated
 */
export type TokenCallback = (text: string) => void;

export enum SessionState {
    uninitialized = "uninitialized",
    initializing = "initializing",
    ready = "ready",
    error = "error",
    cancelled = "cancelled"
}

export enum GenerationState {
    idle = "idle",
    initializing = "initializing",
    tokenizingPrompt = "tokenizingPrompt",
    processingImages = "processingImages",
    generating = "generating",
    finished = "finished",
    cancelled = "cancelled",
    error = "error"
}

export type ModelInfo = {
    name: string,
    architecture: string,
    parameterCount: number,

    /** The context size the model was trained on */
    contextSize: number,
    supportsVision: boolean,
    capabilities: ModelCapability[]
};

export type ModelCapability = "text_generation" | "vision" | "multimodal";

export type MemoryInfo = {
    modelMemoryMB: number,
    contextMemoryMB: number,
    totalMemoryMB: number,

    /** Free system memory at the time of the query */
    availableMemoryMB: number
};

export type GenerationStats = {
    tokensGenerated: number,
    tokensPerSecond: number,

    /** In seconds */
    timeElapsed: number,
    state: GenerationState,
    sampling: SamplingParams
};
