import {failure, Result, success} from "../result/Result.js";
import {SessionErrorCode} from "../result/SessionErrorCode.js";

export type ImageFormat = "png" | "jpeg" | "bmp";

const minImageDataSize = 8;
const imageSignatures: ReadonlyArray<readonly [format: ImageFormat, signature: readonly number[]]> = [
    ["png", [0x89, 0x50, 0x4E, 0x47]],
    ["jpeg", [0xFF, 0xD8]],
    ["bmp", [0x42, 0x4D]]
];

/**
 * Detect the format of encoded image bytes from their magic signature.
 * Only sniffs the header, the pixel content is not decoded.
 */
export function detectImageFormat(data: Uint8Array): ImageFormat | null {
    for (const [format, signature] of imageSignatures) {
        if (data.length < signature.length)
            continue;

        if (signature.every((byte, index) => data[index] === byte))
            return format;
    }

    return null;
}

export function validateImageData(data: Uint8Array): Result<Uint8Array> {
    if (data.length === 0)
        return failure(SessionErrorCode.ImageProcessingFailed, "Image data is empty");

    if (data.length < minImageDataSize)
        return failure(SessionErrorCode.ImageProcessingFailed, "Image data too small");

    if (detectImageFormat(data) == null)
        return failure(SessionErrorCode.ImageProcessingFailed, "Unsupported image format");

    return success(data);
}
