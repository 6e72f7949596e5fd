/**
 * Shared test helpers: temporary trees and transformers that never leave the process
 */

import glob from "fast-glob";
import path from "node:path";
import os from "node:os";
import { mkdir, mkdtemp, readFile, writeFile } from "fs/promises";
import { copyTransformer } from "../transformers/copy";
import { TransformError } from "../utils/errors";
import type { Transformer, TransformerSet } from "../types";

export async function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

export async function touch(
  root: string,
  relative: string,
  content: string | Buffer = "",
): Promise<string> {
  const target = path.join(root, relative);
  await mkdir(path.dirname(target), { recursive: true });
  await writeFile(target, content);
  return target;
}

/**
 * Every file under `root`, relative and with forward slashes, sorted
 */
export async function listFiles(root: string): Promise<string[]> {
  const files = await glob("**", { cwd: root, dot: true, onlyFiles: true });
  return files.sort();
}

/**
 * Writes "<label>:<source content>" to the output path
 */
export function labelTransformer(label: string): Transformer {
  return async (inputPath, outputPath) => {
    const content = await readFile(inputPath, "utf-8");
    await writeFile(outputPath, `${label}:${content}`);
    return { ok: true };
  };
}

/**
 * Fails every file the way a missing executable would
 */
export function missingToolTransformer(command: string): Transformer {
  return async () => ({
    ok: false,
    error: new TransformError("missing-tool", `${command}: executable not found`),
  });
}

export function fakeTransformers(overrides: Partial<TransformerSet> = {}): TransformerSet {
  return {
    compile: labelTransformer("compile"),
    "minify-markup": labelTransformer("minify-markup"),
    "minify-script": labelTransformer("minify-script"),
    "minify-style": labelTransformer("minify-style"),
    copy: copyTransformer,
    ...overrides,
  };
}
