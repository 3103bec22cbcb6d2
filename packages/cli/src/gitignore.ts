import path from "path";
import fs from "fs-extra";

/**
 * Make sure `entry` is listed in the project's .gitignore, creating the
 * file if needed.
 *
 * @returns true if the entry was added
 */
export async function ensureGitignoreEntry(projectRoot: string, entry = ".env"): Promise<boolean> {
  const gitignorePath = path.join(projectRoot, ".gitignore");
  const content = (await fs.pathExists(gitignorePath)) ? await fs.readFile(gitignorePath, "utf-8") : "";

  const listed = content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .some((line) => line === entry || line === `/${entry}`);
  if (listed) {
    return false;
  }

  const separator = content.length > 0 && !content.endsWith("\n") ? "\n" : "";
  await fs.appendFile(gitignorePath, `${separator}${entry}\n`);
  return true;
}
