import {failure, Result, success} from "../result/Result.js";
import {SessionErrorCode} from "../result/SessionErrorCode.js";
import {removeUndefinedFields} from "../utils/removeUndefinedFields.js";

export type SamplingParams = {
    /**
     * Values at or below `0.01` switch to greedy decoding.
     * Must be between `0` and `2`.
     */
    temperature: number,

    /** Must be between `0` and `1`. `1` disables top-p truncation */
    topP: number,

    /** Must be non-negative. `0` disables top-k truncation */
    topK: number,

    /** Must be between `0` and `1`. `0` disables min-p truncation */
    minP: number,

    /** Typical sampling is only applied for values strictly between `0` and `1` */
    typicalP: number,

    /** Must be non-negative. `1` disables the repetition penalty */
    repeatPenalty: number,

    /** Number of recent tokens the repetition penalty looks at. Must be non-negative */
    repeatLastN: number,
    frequencyPenalty: number,
    presencePenalty: number,

    /**
     * Maximum number of tokens to generate.
     * Must be an integer. Any value less than or equal to `0` means unlimited, bounded by the session's `maxTokensCeiling`.
     */
    nPredict: number,

    /** Seed for the final random draw. When omitted, the engine picks a random seed */
    seed?: number
};

export const unlimitedTokens = -1;

export const defaultSamplingParams: Readonly<SamplingParams> = Object.freeze({
    temperature: 0.7,
    topP: 0.9,
    topK: 40,
    minP: 0.05,
    typicalP: 1,
    repeatPenalty: 1.1,
    repeatLastN: 64,
    frequencyPenalty: 0,
    presencePenalty: 0,
    nPredict: unlimitedTokens
});

/**
 * Merge partial sampling parameters over the defaults, later arguments taking precedence.
 * Explicitly `undefined` fields are ignored.
 */
export function resolveSamplingParams(...params: Array<Partial<SamplingParams> | undefined>): SamplingParams {
    let res: SamplingParams = {...defaultSamplingParams};

    for (const item of params) {
        if (item != null)
            res = {...res, ...removeUndefinedFields(item)};
    }

    return res;
}

/**
 * Validate sampling parameters, stopping at the first field out of range.
 * Fields are checked in this order: `temperature`, `topP`, `topK`, `minP`, `repeatPenalty`, `repeatLastN`, `nPredict`.
 */
export function validateSamplingParams(params: SamplingParams): Result<void> {
    if (!isInRange(params.temperature, 0, 2))
        return failure(SessionErrorCode.InvalidParameters, "Temperature must be between 0.0 and 2.0");

    if (!isInRange(params.topP, 0, 1))
        return failure(SessionErrorCode.InvalidParameters, "topP must be between 0.0 and 1.0");

    if (!(params.topK >= 0))
        return failure(SessionErrorCode.InvalidParameters, "topK must be non-negative");

    if (!isInRange(params.minP, 0, 1))
        return failure(SessionErrorCode.InvalidParameters, "minP must be between 0.0 and 1.0");

    if (!(params.repeatPenalty >= 0))
        return failure(SessionErrorCode.InvalidParameters, "repeatPenalty must be non-negative");

    if (!(params.repeatLastN >= 0))
        return failure(SessionErrorCode.InvalidParameters, "repeatLastN must be non-negative");

    if (!Number.isInteger(params.nPredict))
        return failure(SessionErrorCode.InvalidParameters, "nPredict must be an integer");

    return success();
}

function isInRange(value: number, min: number, max: number) {
    // written this way so that `NaN` fails the check
    return value >= min && value <= max;
}
