import {LlmRuntime, type LlmRuntimeOptions, type BackendReference} from "./bindings/LlmRuntime.js";
import {getRuntime, type RuntimeOptions} from "./bindings/getRuntime.js";
import {NoBindingFoundError} from "./bindings/utils/NoBindingFoundError.js";
import {LogLevel, LogLevelValues, LogLevelGreaterThan, LogLevelGreaterThanOrEqual, type Logger} from "./bindings/types.js";
import type {
    EngineBindings, EngineModel, EngineContext, EngineBatch, EngineSampler, EngineVision, EngineBitmap, EngineChunks,
    EngineChatMessage, EngineVisionVerbosity, SamplerStage, SamplerStageType
} from "./bindings/EngineTypes.js";
import {LlmSession, type LlmSessionGenerateOptions, type LlmSessionStateChange} from "./evaluator/LlmSession/LlmSession.js";
import {CancellationToken, type CancellationCheck} from "./evaluator/CancellationToken.js";
import {
    defaultSamplingParams, resolveSamplingParams, validateSamplingParams, unlimitedTokens, type SamplingParams
} from "./evaluator/SamplingParams.js";
import {
    defaultSessionParams, resolveSessionParams, validateSessionParams, type SessionParams, type ResolvedSessionParams
} from "./evaluator/SessionParams.js";
import {buildSamplerPipeline} from "./evaluator/buildSamplerPipeline.js";
import {
    success, failure, failureFromUnknownError, unwrapResult, type Result, type SuccessResult, type FailureResult
} from "./result/Result.js";
import {SessionErrorCode, SessionErrorCodeValues, describeSessionError} from "./result/SessionErrorCode.js";
import {SessionError} from "./result/SessionError.js";
import {detectImageFormat, validateImageData, type ImageFormat} from "./utils/validateImageData.js";
import {validateMmprojFile} from "./utils/validateMmprojFile.js";
import {
    SessionState, GenerationState, type Token, type ChatMessage, type ChatMessageRole, type ImageData, type ProgressCallback,
    type TokenCallback, type ModelInfo, type ModelCapability, type MemoryInfo, type GenerationStats
} from "./types.js";


export {
    LlmRuntime,
    type LlmRuntimeOptions,
    type BackendReference,
    getRuntime,
    type RuntimeOptions,
    NoBindingFoundError,
    LogLevel,
    LogLevelValues,
    LogLevelGreaterThan,
    LogLevelGreaterThanOrEqual,
    type Logger,
    type EngineBindings,
    type EngineModel,
    type EngineContext,
    type EngineBatch,
    type EngineSampler,
    type EngineVision,
    type EngineBitmap,
    type EngineChunks,
    type EngineChatMessage,
    type EngineVisionVerbosity,
    type SamplerStage,
    type SamplerStageType,
    LlmSession,
    type LlmSessionGenerateOptions,
    type LlmSessionStateChange,
    CancellationToken,
    type CancellationCheck,
    defaultSamplingParams,
    resolveSamplingParams,
    validateSamplingParams,
    unlimitedTokens,
    type SamplingParams,
    defaultSessionParams,
    resolveSessionParams,
    validateSessionParams,
    type SessionParams,
    type ResolvedSessionParams,
    buildSamplerPipeline,
    success,
    failure,
    failureFromUnknownError,
    unwrapResult,
    type Result,
    type SuccessResult,
    type FailureResult,
    SessionErrorCode,
    SessionErrorCodeValues,
    describeSessionError,
    SessionError,
    detectImageFormat,
    validateImageData,
    type ImageFormat,
    validateMmprojFile,
    SessionState,
    GenerationState,
    type Token,
    type ChatMessage,
    type ChatMessageRole,
    type ImageData,
    type ProgressCallback,
    type TokenCallback,
    type ModelInfo,
    type ModelCapability,
    type MemoryInfo,
    type GenerationStats
};
