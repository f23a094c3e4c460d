import fs from "node:fs/promises";
import path from "node:path";
import fsExtra from "fs-extra";
import {failure, Result, success} from "../result/Result.js";
import {SessionErrorCode} from "../result/SessionErrorCode.js";
import {mmprojFileMagic} from "../consts.js";

/**
 * Check that a multimodal projector file exists and starts with the GGUF magic.
 * A full validation needs a loaded model to pair the projector with, so this only sniffs the header.
 */
export async function validateMmprojFile(mmprojPath: string): Promise<Result<void>> {
    const resolvedPath = path.resolve(process.cwd(), mmprojPath);

    if (mmprojPath === "" || !(await fsExtra.pathExists(resolvedPath)))
        return failure(SessionErrorCode.MmprojNotFound, `Multimodal projector file not found: ${mmprojPath}`);

    let magic: string;
    try {
        magic = await readFileMagic(resolvedPath, mmprojFileMagic.length);
    } catch (err) {
        return failure(
            SessionErrorCode.MmprojInvalid,
            `Cannot open multimodal projector file: ${err instanceof Error ? err.message : String(err)}`
        );
    }

    if (magic !== mmprojFileMagic)
        return failure(SessionErrorCode.MmprojInvalid, "Invalid multimodal projector format - not a GGUF file");

    return success();
}

async function readFileMagic(filePath: string, length: number) {
    const fd = await fs.open(filePath, "r");
    try {
        const buffer = Buffer.alloc(length);
        const {bytesRead} = await fd.read(buffer, 0, length, 0);

        return buffer.toString("latin1", 0, bytesRead);
    } finally {
        await fd.close();
    }
}
