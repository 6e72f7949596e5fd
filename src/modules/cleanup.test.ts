import path from "node:path";
import { rm, symlink } from "fs/promises";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { clean, assertSafeTarget } from "./cleanup";
import { UnsafeTargetError } from "../utils/errors";
import { fileExists } from "../utils/fs";
import { makeTempDir, touch, listFiles } from "../testing/helpers";

describe("clean", () => {
  let base: string;
  let sourceRoot: string;
  let destRoot: string;

  beforeEach(async () => {
    base = await makeTempDir("cleanup");
    sourceRoot = path.join(base, "project", "src");
    destRoot = path.join(base, "project", "dist");
    await touch(sourceRoot, "app/main.py", "print(1)");
    await touch(destRoot, "app/main.pyc", "old");
  });

  afterEach(async () => {
    await rm(base, { recursive: true, force: true });
  });

  it("removes the destination tree", async () => {
    await clean(destRoot, sourceRoot);
    expect(await fileExists(destRoot)).toBe(false);
    expect(await listFiles(sourceRoot)).toEqual(["app/main.py"]);
  });

  it("accepts a destination that does not exist", async () => {
    await expect(clean(path.join(base, "nowhere", "dist"), sourceRoot)).resolves.toBeUndefined();
  });

  it("refuses the source root itself", async () => {
    await expect(clean(sourceRoot, sourceRoot)).rejects.toThrow(UnsafeTargetError);
    expect(await listFiles(sourceRoot)).toEqual(["app/main.py"]);
  });

  it("refuses an ancestor of the source root", async () => {
    const project = path.join(base, "project");
    await expect(clean(project, sourceRoot)).rejects.toThrow(UnsafeTargetError);
    await expect(clean(project, sourceRoot)).rejects.toThrow("contains the source root");
    expect(await listFiles(sourceRoot)).toEqual(["app/main.py"]);
    expect(await fileExists(path.join(destRoot, "app/main.pyc"))).toBe(true);
  });

  it("refuses the filesystem root", async () => {
    await expect(clean(path.parse(base).root, sourceRoot)).rejects.toThrow(UnsafeTargetError);
  });

  it("refuses a symlink that resolves to the source root", async () => {
    const alias = path.join(base, "alias");
    await symlink(sourceRoot, alias);
    await expect(clean(alias, sourceRoot)).rejects.toThrow(UnsafeTargetError);
    expect(await listFiles(sourceRoot)).toEqual(["app/main.py"]);
  });

  it("refuses relative spellings of the source root", async () => {
    const relative = path.relative(process.cwd(), path.join(sourceRoot, "app", ".."));
    await expect(clean(relative, sourceRoot)).rejects.toThrow(UnsafeTargetError);
  });
});

describe("assertSafeTarget", () => {
  it("returns the resolved destination for a sibling of the source", async () => {
    const base = await makeTempDir("safe");
    try {
      const target = await assertSafeTarget(path.join(base, "dist"), path.join(base, "src"));
      expect(path.basename(target)).toBe("dist");
      expect(path.isAbsolute(target)).toBe(true);
    } finally {
      await rm(base, { recursive: true, force: true });
    }
  });

  it("allows a destination nested inside the source root", async () => {
    const base = await makeTempDir("safe");
    try {
      const target = await assertSafeTarget(path.join(base, "src", "build"), path.join(base, "src"));
      expect(path.basename(target)).toBe("build");
    } finally {
      await rm(base, { recursive: true, force: true });
    }
  });
});
