import isUnicodeSupported from "is-unicode-supported";

const unicodeSupported = isUnicodeSupported();

export const clockChar = unicodeSupported
    ? "◷"
    : "+";

export const bytesInMegabyte = 1024 * 1024;
export const greedySamplingTemperatureThreshold = 0.01;
export const mmprojFileMagic = "GGUF";
