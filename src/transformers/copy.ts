import { chmod, copyFile, stat } from "fs/promises";
import { toTransformError } from "../utils/errors";
import type { Transformer } from "../types";

/**
 * Byte-exact copy that keeps the source file mode
 */
export const copyTransformer: Transformer = async (inputPath, outputPath) => {
  try {
    const { mode } = await stat(inputPath);
    await copyFile(inputPath, outputPath);
    await chmod(outputPath, mode & 0o7777);
    return { ok: true };
  } catch (error) {
    return { ok: false, error: toTransformError(error) };
  }
};
