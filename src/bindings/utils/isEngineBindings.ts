import type {EngineBindings} from "../EngineTypes.js";

/**
 * Check that a loaded native module exposes the functions the session layer needs.
 * The optional functions are only checked for their type when present.
 */
export function isEngineBindings(value: unknown): value is EngineBindings {
    if (value == null || (typeof value !== "object" && typeof value !== "function"))
        return false;

    return (
        "initBackend" in value && typeof value.initBackend === "function" &&
        "freeBackend" in value && typeof value.freeBackend === "function" &&
        "loadModel" in value && typeof value.loadModel === "function" &&
        isOptionalFunction(value, "initVision") &&
        isOptionalFunction(value, "setLogger") &&
        isOptionalFunction(value, "setLoggerLogLevel")
    );
}

function isOptionalFunction(value: object, key: string) {
    const property: unknown = Reflect.get(value, key);

    return property == null || typeof property === "function";
}
