import path from "path";
import process from "process";
import fs from "fs-extra";
import type {ImageData} from "../../types.js";

export async function readImageFiles(imagePaths: readonly string[]): Promise<ImageData[]> {
    return await Promise.all(
        imagePaths.map(async (imagePath) => {
            const resolvedPath = path.resolve(process.cwd(), imagePath);
            if (!(await fs.pathExists(resolvedPath)))
                throw new Error(`Image file not found: ${resolvedPath}`);

            const buffer = await fs.readFile(resolvedPath);
            return {
                data: new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength)
            };
        })
    );
}
