import {describeSessionError, SessionErrorCode} from "./SessionErrorCode.js";

export class SessionError extends Error {
    public readonly code: SessionErrorCode;

    public constructor(code: SessionErrorCode, message: string = describeSessionError(code)) {
        super(message);
        this.name = "SessionError";
        this.code = code;
    }
}
