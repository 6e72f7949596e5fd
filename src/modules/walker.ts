/**
 * Tree Walker Module
 * Enumerates files under a directory without following symbolic links
 */

import glob from "fast-glob";
import path from "node:path";
import { access, lstat } from "fs/promises";
import { constants, type Stats } from "node:fs";
import { toWalkError } from "../utils/errors";
import type { WalkEvent, WalkOptions } from "../types";

async function* walkTree(
  root: string,
  options: WalkOptions,
): AsyncGenerator<WalkEvent> {
  const extensions = options.extensions
    ? new Set(options.extensions.map((extension) => extension.toLowerCase()))
    : null;

  // Unreadable directories are suppressed here and reported below from their own entry
  const stream = glob.stream("**", {
    cwd: root,
    dot: true,
    onlyFiles: false,
    followSymbolicLinks: false,
    suppressErrors: true,
    ignore: [...(options.ignore ?? [])],
  });

  for await (const chunk of stream) {
    const relativePath = path.normalize(
      typeof chunk === "string" ? chunk : chunk.toString(),
    );
    const absolutePath = path.join(root, relativePath);

    let stats: Stats;
    try {
      stats = await lstat(absolutePath);
    } catch (error) {
      yield { kind: "error", error: toWalkError(absolutePath, error) };
      continue;
    }

    if (stats.isSymbolicLink()) {
      yield { kind: "symlink", path: absolutePath };
      continue;
    }

    if (stats.isDirectory()) {
      try {
        await access(absolutePath, constants.R_OK | constants.X_OK);
      } catch (error) {
        yield { kind: "error", error: toWalkError(absolutePath, error) };
      }
      continue;
    }

    // Sockets, FIFOs and devices have no distribution counterpart
    if (!stats.isFile()) continue;

    const extension = path.extname(relativePath).toLowerCase();
    if (extensions && !extensions.has(extension)) continue;

    yield {
      kind: "file",
      entry: { absolutePath, relativePath, extension },
    };
  }
}

/**
 * Walk `root` lazily. Every iteration of the returned sequence starts a fresh
 * traversal, so it can be consumed more than once. Order is not guaranteed.
 */
export function walk(
  root: string,
  options: WalkOptions = {},
): AsyncIterable<WalkEvent> {
  const resolved = path.resolve(root);
  return {
    [Symbol.asyncIterator]: () => walkTree(resolved, options),
  };
}
