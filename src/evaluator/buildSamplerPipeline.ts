import {greedySamplingTemperatureThreshold} from "../consts.js";
import type {SamplerStage} from "../bindings/EngineTypes.js";
import type {SamplingParams} from "./SamplingParams.js";

const truncationMinKeep = 1;

/**
 * Build the ordered list of sampler stages for the given (already validated) sampling parameters.
 *
 * The order matters:
 * - the repetition penalty comes first, so truncation sees penalized logits
 * - a temperature at or below `0.01` is treated as deterministic decoding: a single greedy stage ends the chain
 * - truncation stages come before temperature scaling, which comes right before the final random draw
 */
export function buildSamplerPipeline(params: SamplingParams): SamplerStage[] {
    const stages: SamplerStage[] = [];

    if (params.repeatPenalty !== 1)
        stages.push({
            type: "penalties",
            lastN: params.repeatLastN,
            repeatPenalty: params.repeatPenalty,
            frequencyPenalty: params.frequencyPenalty,
            presencePenalty: params.presencePenalty
        });

    if (params.temperature <= greedySamplingTemperatureThreshold) {
        stages.push({type: "greedy"});
        return stages;
    }

    if (params.topK > 0)
        stages.push({type: "topK", k: params.topK});

    if (params.typicalP > 0 && params.typicalP < 1)
        stages.push({type: "typical", p: params.typicalP, minKeep: truncationMinKeep});

    if (params.topP > 0 && params.topP < 1)
        stages.push({type: "topP", p: params.topP, minKeep: truncationMinKeep});

    if (params.minP > 0)
        stages.push({type: "minP", p: params.minP, minKeep: truncationMinKeep});

    stages.push({type: "temperature", temperature: params.temperature});
    stages.push(
        params.seed == null
            ? {type: "dist"}
            : {type: "dist", seed: params.seed}
    );

    return stages;
}
