import path from "path";
import process from "process";
import fs from "fs-extra";
import {Template} from "@huggingface/jinja";
import {failure, Result, success} from "../result/Result.js";
import {SessionErrorCode} from "../result/SessionErrorCode.js";
import {defaultMaxTokensCeiling} from "../config.js";
import {resolveSamplingParams, SamplingParams, validateSamplingParams} from "./SamplingParams.js";

export type SessionParams = {
    /** Path to the model file. Relative paths are resolved against the current working directory */
    modelPath: string,

    /**
     * Path to a multimodal projector file.
     * Required for passing images to `generate`.
     */
    mmprojPath?: string,

    /** Defaults to `16000` */
    contextSize?: number,

    /** Defaults to `4096` */
    batchSize?: number,

    /**
     * Number of model layers to offload to the GPU.
     * Defaults to `0`.
     */
    gpuLayers?: number,

    /** Defaults to `false` */
    mmprojUseGpu?: boolean,

    /** Defaults to `6` */
    threads?: number,

    /**
     * Values above `1` make the vision engine log at the debug level.
     * Defaults to `1`.
     */
    verbosity?: number,

    /** Default sampling parameters for every generation of the session */
    sampling?: Partial<SamplingParams>,

    /**
     * A Jinja chat template to render conversations with, instead of the template embedded in the model file.
     * The template receives `messages` and `add_generation_prompt`.
     */
    chatTemplate?: string,

    /**
     * The maximum number of tokens to generate when `nPredict` is unlimited.
     * Defaults to the `LLM_SESSION_MAX_TOKENS_CEILING` environment variable, or `4096`.
     */
    maxTokensCeiling?: number
};

export type ResolvedSessionParams = Readonly<{
    modelPath: string,
    mmprojPath?: string,
    contextSize: number,
    batchSize: number,
    gpuLayers: number,
    mmprojUseGpu: boolean,
    threads: number,
    verbosity: number,
    sampling: Readonly<SamplingParams>,
    chatTemplate?: string,
    maxTokensCeiling: number
}>;

export const defaultSessionParams = Object.freeze({
    contextSize: 16000,
    batchSize: 4096,
    gpuLayers: 0,
    mmprojUseGpu: false,
    threads: 6,
    verbosity: 1
} as const);

/**
 * Fill in defaults and resolve file paths. The returned object is frozen.
 * An empty `mmprojPath` is treated as no projector.
 */
export function resolveSessionParams(params: SessionParams): ResolvedSessionParams {
    const mmprojPath = (params.mmprojPath == null || params.mmprojPath === "")
        ? undefined
        : path.resolve(process.cwd(), params.mmprojPath);

    return Object.freeze({
        modelPath: params.modelPath === ""
            ? ""
            : path.resolve(process.cwd(), params.modelPath),
        mmprojPath,
        contextSize: params.contextSize ?? defaultSessionParams.contextSize,
        batchSize: params.batchSize ?? defaultSessionParams.batchSize,
        gpuLayers: params.gpuLayers ?? defaultSessionParams.gpuLayers,
        mmprojUseGpu: params.mmprojUseGpu ?? defaultSessionParams.mmprojUseGpu,
        threads: params.threads ?? defaultSessionParams.threads,
        verbosity: params.verbosity ?? defaultSessionParams.verbosity,
        sampling: Object.freeze(resolveSamplingParams(params.sampling)),
        chatTemplate: params.chatTemplate,
        maxTokensCeiling: params.maxTokensCeiling ?? defaultMaxTokensCeiling
    });
}

/**
 * Validate session parameters without touching any engine resource.
 * Returns the first problem found.
 */
export async function validateSessionParams(params: ResolvedSessionParams): Promise<Result<void>> {
    if (params.modelPath === "")
        return failure(SessionErrorCode.InvalidParameters, "Model path cannot be empty");

    if (!(await fs.pathExists(params.modelPath)))
        return failure(SessionErrorCode.ModelNotFound, `Model file not found: ${params.modelPath}`);

    if (params.mmprojPath != null && !(await fs.pathExists(params.mmprojPath)))
        return failure(SessionErrorCode.MmprojNotFound, `Multimodal projector file not found: ${params.mmprojPath}`);

    if (!isPositiveInteger(params.contextSize))
        return failure(SessionErrorCode.InvalidParameters, "Context size must be positive");

    if (!isPositiveInteger(params.batchSize))
        return failure(SessionErrorCode.InvalidParameters, "Batch size must be positive");

    if (!isPositiveInteger(params.threads))
        return failure(SessionErrorCode.InvalidParameters, "Thread count must be positive");

    if (!isPositiveInteger(params.maxTokensCeiling))
        return failure(SessionErrorCode.InvalidParameters, "Max tokens ceiling must be a positive integer");

    if (params.chatTemplate != null) {
        const templateRes = compileChatTemplate(params.chatTemplate);
        if (!templateRes.ok)
            return templateRes;
    }

    return validateSamplingParams(params.sampling);
}

export function compileChatTemplate(chatTemplate: string): Result<Template> {
    try {
        return success(new Template(chatTemplate));
    } catch (err) {
        return failure(
            SessionErrorCode.InvalidParameters,
            `Invalid chat template: ${err instanceof Error ? err.message : String(err)}`
        );
    }
}

function isPositiveInteger(value: number) {
    return Number.isInteger(value) && value > 0;
}
