import os from "os";
import path from "path";
import fs from "fs-extra";
import { glob } from "glob";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createAppBundle, listBundleFiles } from "./app-bundler";

vi.mock("glob", async (importOriginal) => {
  const actual = await importOriginal<typeof import("glob")>();
  return { ...actual, glob: vi.fn(actual.glob) };
});

async function writeProjectFile(root: string, relativePath: string, content = "x"): Promise<void> {
  const filePath = path.join(root, relativePath);
  await fs.ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, content);
}

describe("app bundler", () => {
  let projectRoot: string;
  let outputDir: string;

  beforeEach(async () => {
    projectRoot = await fs.mkdtemp(path.join(os.tmpdir(), "ebshield-project-"));
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), "ebshield-bundles-"));
    await writeProjectFile(projectRoot, "build/out.js");
    await writeProjectFile(projectRoot, "app.log");
    await writeProjectFile(projectRoot, "keep.log");
    await writeProjectFile(projectRoot, "src/main.py", "print('hello')\n");
  });

  afterEach(async () => {
    await fs.remove(projectRoot);
    await fs.remove(outputDir);
  });

  describe("listBundleFiles", () => {
    it("applies exclusions and negations from .ebignore", async () => {
      await writeProjectFile(projectRoot, ".ebignore", "build/\n*.log\n!keep.log\n");

      expect(await listBundleFiles(projectRoot)).toEqual(["keep.log", "src/main.py"]);
    });

    it("includes every file when there is no ignore file", async () => {
      expect(await listBundleFiles(projectRoot)).toEqual([
        "app.log",
        "build/out.js",
        "keep.log",
        "src/main.py",
      ]);
    });

    it("honors a custom ignore file name", async () => {
      await writeProjectFile(projectRoot, ".bundleignore", "build/\n");

      expect(await listBundleFiles(projectRoot, ".bundleignore")).toEqual([
        "app.log",
        "keep.log",
        "src/main.py",
      ]);
    });
  });

  describe("createAppBundle", () => {
    it("writes a zip of the included files", async () => {
      await writeProjectFile(projectRoot, ".ebignore", "build/\n*.log\n!keep.log\n");
      const lines: string[] = [];

      const bundle = await createAppBundle(projectRoot, { outputDir, log: (line) => lines.push(line) });

      expect(bundle.fileCount).toBe(2);
      expect(path.dirname(bundle.path)).toBe(outputDir);
      expect(path.basename(bundle.path)).toMatch(/^app_bundle_\d{8}_\d{6}\.zip$/);
      const header = (await fs.readFile(bundle.path)).subarray(0, 2).toString("latin1");
      expect(header).toBe("PK");
      expect(lines).toEqual(["Created application bundle with 2 files"]);
    });

    it("fails and removes the partial zip when a listed file has disappeared", async () => {
      vi.mocked(glob).mockResolvedValueOnce(["keep.log", "deleted.txt"]);
      const lines: string[] = [];

      await expect(
        createAppBundle(projectRoot, { outputDir, log: (line) => lines.push(line) })
      ).rejects.toMatchObject({ code: "ENOENT" });

      expect(await fs.readdir(outputDir)).toEqual([]);
      expect(lines).toEqual([]);
    });
  });
});
