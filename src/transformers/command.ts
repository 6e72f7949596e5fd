/**
 * Command Transformer
 *
 * Runs an external executable (resolved on PATH, no shell) to turn one input
 * file into one output file. Every failure comes back as a TransformError
 * outcome: a missing binary, a non-zero exit or a timeout only fails that file.
 */

import { spawn, type ChildProcess } from "node:child_process";
import { TransformError } from "../utils/errors";
import type { ToolConfig, Transformer, TransformOutcome } from "../types";

const KILL_GRACE_MS = 1000;
const STDERR_TAIL = 500;

export interface CommandResult {
  exitCode: number | null;
  stderr: string;
  timedOut: boolean;
  spawnError?: NodeJS.ErrnoException;
}

/**
 * Substitute {input} and {output} in every argument
 *
 * @example
 * interpolateArgs(["{input}", "-o", "{output}"], { input: "a.js", output: "b.js" });
 * // ["a.js", "-o", "b.js"]
 */
export function interpolateArgs(
  args: readonly string[],
  values: { input: string; output: string },
): string[] {
  return args.map((arg) =>
    arg.replaceAll("{input}", values.input).replaceAll("{output}", values.output),
  );
}

/**
 * Spawn a command and wait for it to finish
 *
 * @param timeoutMs - 0 disables the timeout
 */
export function runCommand(
  command: string,
  args: readonly string[],
  timeoutMs: number,
): Promise<CommandResult> {
  return new Promise<CommandResult>((resolve) => {
    let stderr = "";
    let settled = false;
    let timeoutId: NodeJS.Timeout | null = null;
    let child: ChildProcess | null = null;

    const finish = (result: Omit<CommandResult, "stderr">) => {
      if (settled) return;
      settled = true;
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
      resolve({ ...result, stderr });
    };

    const handleTimeout = () => {
      if (child) {
        const running = child;
        running.kill("SIGTERM");
        // Force kill if the tool ignores SIGTERM
        setTimeout(() => {
          if (running.exitCode === null && running.signalCode === null) {
            running.kill("SIGKILL");
          }
        }, KILL_GRACE_MS).unref();
      }
      finish({ exitCode: null, timedOut: true });
    };

    if (timeoutMs > 0) {
      timeoutId = setTimeout(handleTimeout, timeoutMs);
    }

    try {
      child = spawn(command, [...args], {
        shell: false,
        stdio: ["ignore", "ignore", "pipe"],
      });

      child.stderr?.on("data", (data: Buffer) => {
        stderr += data.toString();
      });

      child.on("close", (code: number | null) => {
        finish({ exitCode: code, timedOut: false });
      });

      child.on("error", (error: NodeJS.ErrnoException) => {
        finish({ exitCode: null, timedOut: false, spawnError: error });
      });
    } catch (error) {
      const spawnError: NodeJS.ErrnoException =
        error instanceof Error ? error : new Error(String(error));
      finish({ exitCode: null, timedOut: false, spawnError });
    }
  });
}

function tail(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > STDERR_TAIL
    ? `...${trimmed.slice(trimmed.length - STDERR_TAIL)}`
    : trimmed;
}

/**
 * Turn a finished command into a transform outcome
 */
export function toOutcome(
  command: string,
  result: CommandResult,
  timeoutMs: number,
): TransformOutcome {
  if (result.spawnError) {
    if (result.spawnError.code === "ENOENT") {
      return {
        ok: false,
        error: new TransformError("missing-tool", `${command}: executable not found`),
      };
    }
    return {
      ok: false,
      error: new TransformError("io-error", `${command}: ${result.spawnError.message}`),
    };
  }

  if (result.timedOut) {
    return {
      ok: false,
      error: new TransformError("timeout", `${command}: timed out after ${timeoutMs}ms`),
    };
  }

  if (result.exitCode !== 0) {
    const stderr = tail(result.stderr);
    const status = result.exitCode === null ? "was killed" : `exited with code ${result.exitCode}`;
    return {
      ok: false,
      error: new TransformError(
        "exit-code",
        stderr ? `${command} ${status}: ${stderr}` : `${command} ${status}`,
      ),
    };
  }

  return { ok: true };
}

export function createCommandTransformer(
  tool: ToolConfig,
  options: { timeout: number },
): Transformer {
  return async (inputPath, outputPath) => {
    const args = interpolateArgs(tool.args, { input: inputPath, output: outputPath });
    const result = await runCommand(tool.command, args, options.timeout);
    return toOutcome(tool.command, result, options.timeout);
  };
}
