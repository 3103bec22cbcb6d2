import os from "os";
import path from "path";
import fs from "fs-extra";
import archiver from "archiver";
import { glob } from "glob";
import { DEFAULT_IGNORE_FILE, createVersionLabel } from "@ebshield/core";
import { isExcluded, parseIgnoreRules, type IgnoreRules } from "./ignore-rules";
import type { LogCallback } from "../types";

export interface BundleOptions {
  ignoreFileName?: string;
  /** Directory the zip is written to (default: the OS temp dir) */
  outputDir?: string;
  log?: LogCallback;
}

export interface BundleResult {
  path: string;
  fileCount: number;
}

export async function readIgnoreRules(
  projectRoot: string,
  ignoreFileName: string = DEFAULT_IGNORE_FILE
): Promise<IgnoreRules> {
  const ignorePath = path.join(projectRoot, ignoreFileName);
  if (!(await fs.pathExists(ignorePath))) {
    return { exclusions: [], negations: [] };
  }
  return parseIgnoreRules(await fs.readFile(ignorePath, "utf-8"));
}

/**
 * Project files that go into the bundle, as sorted `/`-separated relative paths.
 */
export async function listBundleFiles(
  projectRoot: string,
  ignoreFileName: string = DEFAULT_IGNORE_FILE
): Promise<string[]> {
  const rules = await readIgnoreRules(projectRoot, ignoreFileName);
  const files = await glob("**/*", { cwd: projectRoot, nodir: true, dot: true, posix: true });
  return files.filter((file) => !isExcluded(file, rules, ignoreFileName)).sort();
}

/**
 * Zip the project into a temporary archive.
 */
export async function createAppBundle(
  projectRoot: string,
  options: BundleOptions = {}
): Promise<BundleResult> {
  const files = await listBundleFiles(projectRoot, options.ignoreFileName);

  const outputDir = options.outputDir ?? os.tmpdir();
  await fs.ensureDir(outputDir);
  const bundlePath = path.join(outputDir, `app_bundle_${createVersionLabel().slice(1)}.zip`);

  const output = fs.createWriteStream(bundlePath);
  const archive = archiver("zip", { zlib: { level: 6 } });

  const written = new Promise<void>((resolve, reject) => {
    output.on("close", resolve);
    output.on("error", reject);
    archive.on("error", reject);
    // archiver only warns about a listed file that can no longer be read
    archive.on("warning", reject);
  });

  archive.pipe(output);
  for (const file of files) {
    archive.file(path.join(projectRoot, file), { name: file });
  }

  try {
    await Promise.all([archive.finalize(), written]);
  } catch (error) {
    archive.abort();
    output.destroy();
    await fs.remove(bundlePath);
    throw error;
  }

  options.log?.(`Created application bundle with ${files.length} files`);
  return { path: bundlePath, fileCount: files.length };
}
