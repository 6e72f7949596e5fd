import path from "node:path";
import os from "node:os";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createCommandTransformer, interpolateArgs, toOutcome } from "./command";

const node = process.execPath;

describe("interpolateArgs", () => {
  it("substitutes input and output placeholders", () => {
    expect(
      interpolateArgs(["-o", "{output}", "{input}"], { input: "in.css", output: "out.css" }),
    ).toEqual(["-o", "out.css", "in.css"]);
  });

  it("substitutes placeholders embedded in a larger argument", () => {
    expect(
      interpolateArgs(["--in={input}", "--out={output}"], { input: "a", output: "b" }),
    ).toEqual(["--in=a", "--out=b"]);
  });

  it("leaves other arguments untouched", () => {
    expect(
      interpolateArgs(["--collapse-whitespace", "{input}"], { input: "x.html", output: "y" }),
    ).toEqual(["--collapse-whitespace", "x.html"]);
  });
});

describe("toOutcome", () => {
  it("maps a zero exit to success", () => {
    expect(toOutcome("tool", { exitCode: 0, stderr: "warning", timedOut: false }, 100)).toEqual({
      ok: true,
    });
  });

  it("keeps only the tail of long stderr output", () => {
    const outcome = toOutcome(
      "tool",
      { exitCode: 2, stderr: `${"x".repeat(600)}END`, timedOut: false },
      100,
    );
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.reason).toBe("exit-code");
      expect(outcome.error.message).toBe(`tool exited with code 2: ...${"x".repeat(497)}END`);
    }
  });

  it("reports a process killed by a signal", () => {
    const outcome = toOutcome("tool", { exitCode: null, stderr: "", timedOut: false }, 100);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.message).toBe("tool was killed");
    }
  });

  it("maps other spawn errors to io-error", () => {
    const spawnError: NodeJS.ErrnoException = new Error("spawn tool EACCES");
    spawnError.code = "EACCES";
    const outcome = toOutcome("tool", { exitCode: null, stderr: "", timedOut: false, spawnError }, 100);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.reason).toBe("io-error");
      expect(outcome.error.message).toBe("tool: spawn tool EACCES");
    }
  });
});

describe("createCommandTransformer", () => {
  let dir: string;
  let input: string;
  let output: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "command-"));
    input = path.join(dir, "input.txt");
    output = path.join(dir, "output.txt");
    await writeFile(input, "payload");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("runs the tool with the interpolated paths", async () => {
    const transform = createCommandTransformer(
      {
        command: node,
        args: [
          "-e",
          "require('fs').writeFileSync(process.argv[2], require('fs').readFileSync(process.argv[1], 'utf8').toUpperCase())",
          "{input}",
          "{output}",
        ],
      },
      { timeout: 10000 },
    );

    expect(await transform(input, output)).toEqual({ ok: true });
    expect(await readFile(output, "utf-8")).toBe("PAYLOAD");
  });

  it("fails the file on a non-zero exit with stderr in the details", async () => {
    const transform = createCommandTransformer(
      {
        command: node,
        args: ["-e", "process.stderr.write('bad input\\n'); process.exit(3)", "{input}", "{output}"],
      },
      { timeout: 10000 },
    );

    const outcome = await transform(input, output);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.reason).toBe("exit-code");
      expect(outcome.error.message).toBe(`${node} exited with code 3: bad input`);
    }
  });

  it("reports a missing executable", async () => {
    const transform = createCommandTransformer(
      { command: "release-packer-missing-tool", args: ["{input}", "{output}"] },
      { timeout: 10000 },
    );

    const outcome = await transform(input, output);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.reason).toBe("missing-tool");
      expect(outcome.error.message).toBe("release-packer-missing-tool: executable not found");
    }
  });

  it("stops a tool that runs past the timeout", async () => {
    const transform = createCommandTransformer(
      { command: node, args: ["-e", "setTimeout(() => {}, 10000)", "{input}", "{output}"] },
      { timeout: 200 },
    );

    const outcome = await transform(input, output);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.reason).toBe("timeout");
      expect(outcome.error.message).toBe(`${node}: timed out after 200ms`);
    }
  });
});
