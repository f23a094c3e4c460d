export enum SessionErrorCode {
    ModelNotFound = "ModelNotFound",
    ModelLoadFailed = "ModelLoadFailed",
    ModelInvalid = "ModelInvalid",
    MmprojNotFound = "MmprojNotFound",
    MmprojLoadFailed = "MmprojLoadFailed",
    MmprojInvalid = "MmprojInvalid",
    ContextInitFailed = "ContextInitFailed",
    InsufficientMemory = "InsufficientMemory",
    TokenizationFailed = "TokenizationFailed",
    EvaluationFailed = "EvaluationFailed",
    SamplingFailed = "SamplingFailed",
    ImageProcessingFailed = "ImageProcessingFailed",
    InvalidParameters = "InvalidParameters",
    NotInitialized = "NotInitialized",
    AlreadyInitialized = "AlreadyInitialized",
    OperationCancelled = "OperationCancelled",
    UnknownError = "UnknownError"
}
export const SessionErrorCodeValues = Object.freeze([
    SessionErrorCode.ModelNotFound,
    SessionErrorCode.ModelLoadFailed,
    SessionErrorCode.ModelInvalid,
    SessionErrorCode.MmprojNotFound,
    SessionErrorCode.MmprojLoadFailed,
    SessionErrorCode.MmprojInvalid,
    SessionErrorCode.ContextInitFailed,
    SessionErrorCode.InsufficientMemory,
    SessionErrorCode.TokenizationFailed,
    SessionErrorCode.EvaluationFailed,
    SessionErrorCode.SamplingFailed,
    SessionErrorCode.ImageProcessingFailed,
    SessionErrorCode.InvalidParameters,
    SessionErrorCode.NotInitialized,
    SessionErrorCode.AlreadyInitialized,
    SessionErrorCode.OperationCancelled,
    SessionErrorCode.UnknownError
] as const);

/**
 * Get the default human-readable description of an error code.
 * Used as the message of a failed result when the failure site doesn't provide a more specific one.
 */
export function describeSessionError(code: SessionErrorCode): string {
    switch (code) {
        case SessionErrorCode.ModelNotFound: return "Model file not found";
        case SessionErrorCode.ModelLoadFailed: return "Failed to load model";
        case SessionErrorCode.ModelInvalid: return "Invalid model format";
        case SessionErrorCode.MmprojNotFound: return "Multimodal projector file not found";
        case SessionErrorCode.MmprojLoadFailed: return "Failed to load multimodal projector";
        case SessionErrorCode.MmprojInvalid: return "Invalid multimodal projector format";
        case SessionErrorCode.ContextInitFailed: return "Failed to initialize context";
        case SessionErrorCode.InsufficientMemory: return "Insufficient memory";
        case SessionErrorCode.TokenizationFailed: return "Text tokenization failed";
        case SessionErrorCode.EvaluationFailed: return "Model evaluation failed";
        case SessionErrorCode.SamplingFailed: return "Token sampling failed";
        case SessionErrorCode.ImageProcessingFailed: return "Image processing failed";
        case SessionErrorCode.InvalidParameters: return "Invalid parameters";
        case SessionErrorCode.NotInitialized: return "Session not initialized";
        case SessionErrorCode.AlreadyInitialized: return "Session already initialized";
        case SessionErrorCode.OperationCancelled: return "Operation was cancelled";
        case SessionErrorCode.UnknownError: return "Unknown error";
        default:
            void (code satisfies never);
            return "Unknown error code";
    }
}
