import process from "process";
import envVar from "env-var";
import {LogLevel, LogLevelValues} from "./bindings/types.js";

const env = envVar.from(process.env);


export const isCI = env.get("CI")
    .default("false")
    .asBool();
export const useCiLogs = isCI;
export const defaultBindingPath = env.get("LLM_SESSION_BINDING_PATH")
    .asString();
export const defaultLogLevel = env.get("LLM_SESSION_LOG_LEVEL")
    .default(LogLevel.warn)
    .asEnum(LogLevelValues);
export const defaultDebugMode = env.get("LLM_SESSION_DEBUG")
    .default("false")
    .asBool();
export const defaultMaxTokensCeiling = env.get("LLM_SESSION_MAX_TOKENS_CEILING")
    .default("4096")
    .asIntPositive();
export const cliBinName = "llm-session";
export const defaultChatSystemPrompt = "You are a helpful assistant.";
