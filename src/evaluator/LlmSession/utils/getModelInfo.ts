import {bytesInMegabyte} from "../../../consts.js";
import type {EngineContext, EngineModel} from "../../../bindings/EngineTypes.js";
import type {MemoryInfo, ModelCapability, ModelInfo} from "../../../types.js";

const unknownModelName = "Unknown Model";

export function getModelInfo(model: EngineModel, supportsVision: boolean): ModelInfo {
    const description = model.getDescription().trim();
    const name = description === ""
        ? unknownModelName
        : description;

    const capabilities: ModelCapability[] = ["text_generation"];
    if (supportsVision)
        capabilities.push("vision", "multimodal");

    return {
        name,
        architecture: name.split(/\s+/)[0] ?? name,
        parameterCount: model.getParameterCount(),
        contextSize: model.getTrainContextSize(),
        supportsVision,
        capabilities
    };
}

export function getMemoryInfo(model: EngineModel, context: EngineContext, freeMemoryBytes: number): MemoryInfo {
    const modelMemoryMB = Math.floor(model.getModelSize() / bytesInMegabyte);
    const contextMemoryMB = Math.floor(context.getStateSize() / bytesInMegabyte);

    return {
        modelMemoryMB,
        contextMemoryMB,
        totalMemoryMB: modelMemoryMB + contextMemoryMB,
        availableMemoryMB: Math.floor(freeMemoryBytes / bytesInMegabyte)
    };
}
