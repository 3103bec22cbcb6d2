import os from "os";
import path from "path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ensureGitignoreEntry } from "./gitignore";

describe("ensureGitignoreEntry", () => {
  let projectRoot: string;
  const gitignore = () => fs.readFile(path.join(projectRoot, ".gitignore"), "utf-8");

  beforeEach(async () => {
    projectRoot = await fs.mkdtemp(path.join(os.tmpdir(), "ebshield-gitignore-"));
  });

  afterEach(async () => {
    await fs.remove(projectRoot);
  });

  it("creates .gitignore when it does not exist", async () => {
    expect(await ensureGitignoreEntry(projectRoot)).toBe(true);
    expect(await gitignore()).toBe(".env\n");
  });

  it("appends on a new line", async () => {
    await fs.writeFile(path.join(projectRoot, ".gitignore"), "node_modules");

    expect(await ensureGitignoreEntry(projectRoot)).toBe(true);
    expect(await gitignore()).toBe("node_modules\n.env\n");
  });

  it("leaves a file that already lists the entry", async () => {
    await fs.writeFile(path.join(projectRoot, ".gitignore"), "node_modules\n/.env\n");

    expect(await ensureGitignoreEntry(projectRoot)).toBe(false);
    expect(await gitignore()).toBe("node_modules\n/.env\n");
  });

  it("does not treat a longer name as the entry", async () => {
    await fs.writeFile(path.join(projectRoot, ".gitignore"), ".env.local\n");

    expect(await ensureGitignoreEntry(projectRoot)).toBe(true);
    expect(await gitignore()).toBe(".env.local\n.env\n");
  });
});
