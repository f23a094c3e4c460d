import {describeSessionError, SessionErrorCode} from "./SessionErrorCode.js";
import {SessionError} from "./SessionError.js";

export type SuccessResult<T> = {
    readonly ok: true,
    readonly value: T
};

export type FailureResult = {
    readonly ok: false,
    readonly error: SessionErrorCode,
    readonly message: string
};

/**
 * The outcome of every fallible public operation.
 * Either a value, or an error code from a closed set together with a human-readable message.
 *
 * Only the `error` code is part of the programmatic contract; messages are diagnostics.
 */
export type Result<T> = SuccessResult<T> | FailureResult;

export function success(): SuccessResult<void>;
export function success<T>(value: T): SuccessResult<T>;
export function success<T>(value?: T): SuccessResult<T | undefined> {
    return {ok: true, value};
}

export function failure(error: SessionErrorCode, message?: string): FailureResult {
    return {
        ok: false,
        error,
        message: (message == null || message === "")
            ? describeSessionError(error)
            : message
    };
}

/**
 * Convert an unexpected thrown value into an `UnknownError` failure
 */
export function failureFromUnknownError(error: unknown): FailureResult {
    if (error instanceof SessionError)
        return failure(error.code, error.message);

    if (error instanceof Error)
        return failure(SessionErrorCode.UnknownError, error.message);

    return failure(SessionErrorCode.UnknownError, String(error));
}

/**
 * Return the value of a successful result, or throw a `SessionError` for a failed one.
 * For callers that prefer exceptions over inspecting results.
 */
export function unwrapResult<T>(result: Result<T>): T {
    if (!result.ok)
        throw new SessionError(result.error, result.message);

    return result.value;
}
