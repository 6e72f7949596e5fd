/**
 * Builder - Pipeline orchestrator
 * Runs the stages in a fixed order and folds their results into one report
 */

import glob from "fast-glob";
import path from "node:path";
import { mkdir } from "fs/promises";
import { TransformRegistry } from "./modules/registry";
import { StageRunner } from "./modules/stage";
import { assertSafeTarget, clean } from "./modules/cleanup";
import { directoryProblem, fileExists } from "./utils/fs";
import { isInside } from "./utils/map-path";
import { Logger } from "./utils/logger";
import {
  PathOutsideRootError,
  SourceRootError,
  UnsafeTargetError,
  WalkError,
} from "./utils/errors";
import type {
  BuildOptions,
  BuildReport,
  StagePlan,
  StageResult,
} from "./types";

export const ASSETS_STAGE = "copy-assets";

/**
 * Glob matching everything below `directory` (relative to `root`)
 */
function subtreePattern(root: string, directory: string): string {
  const relative = path.relative(root, directory).split(path.sep).join("/");
  return `${glob.escapePath(relative)}/**`;
}

/**
 * Per-file failures plus unreadable subtrees. A subtree seen by several
 * stages counts once.
 */
export function countFailures(stages: StageResult[]): number {
  const unreadable = new Set<string>();
  let failed = 0;

  for (const stage of stages) {
    failed += stage.failed.length;
    for (const error of stage.walkErrors) {
      unreadable.add(error.path);
    }
  }

  return failed + unreadable.size;
}

export function exitCodeFor(report: BuildReport): number {
  return report.failed === 0 ? 0 : 1;
}

export class Builder {
  private readonly sourceRoot: string;
  private readonly destRoot: string;
  private readonly logger: Logger;

  constructor(
    sourceRoot: string,
    destRoot: string,
    private readonly options: BuildOptions,
  ) {
    this.sourceRoot = path.resolve(sourceRoot);
    this.destRoot = path.resolve(destRoot);
    this.logger = options.logger ?? new Logger("warn");
  }

  /**
   * Run every stage. Only configuration problems throw: a missing or
   * unreadable source root, an unsafe output directory, or an assets
   * directory outside the source root.
   */
  async run(): Promise<BuildReport> {
    const startTime = Date.now();
    const { sourceRoot, destRoot, options, logger } = this;

    const problem = await directoryProblem(sourceRoot);
    if (problem) {
      throw new SourceRootError(sourceRoot, `Cannot read source root: ${problem}`);
    }

    const assetsRoot = path.resolve(sourceRoot, options.assets ?? "assets");
    if (!isInside(sourceRoot, assetsRoot)) {
      throw new PathOutsideRootError(assetsRoot, sourceRoot);
    }

    await assertSafeTarget(destRoot, sourceRoot);
    if (destRoot === assetsRoot || isInside(destRoot, assetsRoot)) {
      throw new UnsafeTargetError(
        destRoot,
        `Output ${destRoot} overlaps the assets directory ${assetsRoot}`,
      );
    }
    if (options.clean) {
      logger.debug(`Removing ${destRoot}`);
      await clean(destRoot, sourceRoot);
    }
    await mkdir(destRoot, { recursive: true });

    // Assets are copied verbatim; an output nested in the source must not be read back
    const ignore = [...(options.ignore ?? []), subtreePattern(sourceRoot, assetsRoot)];
    if (isInside(sourceRoot, destRoot)) {
      ignore.push(subtreePattern(sourceRoot, destRoot));
    }

    const registry = options.registry ?? new TransformRegistry();
    const runner = new StageRunner({
      sourceRoot,
      destRoot,
      registry,
      transformers: options.transformers,
      concurrency: options.concurrency,
      logger,
    });

    const stages: StageResult[] = [];

    for (const plan of registry.plan(sourceRoot, ignore)) {
      stages.push(await this.runStage(runner, plan));
    }

    const assetsPlan: StagePlan = {
      name: ASSETS_STAGE,
      operation: "copy",
      root: assetsRoot,
      ignore: isInside(assetsRoot, destRoot) ? [subtreePattern(assetsRoot, destRoot)] : [],
    };
    const assetsProblem = await directoryProblem(assetsRoot);

    if (assetsProblem === null) {
      stages.push(await this.runStage(runner, assetsPlan));
    } else if (await fileExists(assetsRoot)) {
      stages.push({
        name: ASSETS_STAGE,
        operation: "copy",
        processed: 0,
        skipped: 0,
        failed: [],
        walkErrors: [new WalkError(assetsRoot, "read-error", assetsProblem)],
        symlinks: [],
        durationMs: 0,
      });
    } else {
      logger.debug(`No assets directory at ${assetsRoot}, skipping ${ASSETS_STAGE}`);
    }

    return {
      sourceRoot,
      destRoot,
      stages,
      processed: stages.reduce((sum, stage) => sum + stage.processed, 0),
      failed: countFailures(stages),
      durationMs: Date.now() - startTime,
    };
  }

  private async runStage(runner: StageRunner, plan: StagePlan): Promise<StageResult> {
    this.options.onStage?.(plan);
    this.logger.debug(`Stage ${plan.name} in ${plan.root}`);

    const result = await runner.run(plan);

    this.logger.debug(
      `Stage ${plan.name}: ${result.processed} processed, ${result.failed.length} failed`,
    );
    return result;
  }
}

/**
 * Build `sourceRoot` into `destRoot`
 */
export function build(
  sourceRoot: string,
  destRoot: string,
  options: BuildOptions,
): Promise<BuildReport> {
  return new Builder(sourceRoot, destRoot, options).run();
}
