import { appendFile, readFile, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { UserInputError, describeError } from "./errors.js";
import { manifestPathFor } from "./manifest.js";

const GITIGNORE_FILE_NAME = ".gitignore";
const PACKAGES_DIRECTORY = "wapm_packages";

export async function assertTargetDirectory(targetDir: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(targetDir)).isDirectory();
  } catch (error) {
    throw new UserInputError(`Target directory does not exist: ${targetDir}`, {
      cause: error,
      details: { reason: describeError(error) }
    });
  }
  if (!isDirectory) {
    throw new UserInputError(`Target path is not a directory: ${targetDir}`);
  }
}

export async function writeManifest(targetDir: string, content: string): Promise<string> {
  const manifestPath = manifestPathFor(targetDir);
  await writeFile(manifestPath, content, { encoding: "utf8" });
  return manifestPath;
}

/**
 * Appends `entry` to `<targetDir>/.gitignore` unless some line already
 * contains it. Returns whether the file changed. The file is never created.
 *
 * This is a plain substring check, not gitignore pattern matching: a line
 * such as `old_wapm_packages_backup` counts as covering `wapm_packages`.
 */
export async function ensureIgnored(targetDir: string, entry: string = PACKAGES_DIRECTORY): Promise<boolean> {
  const gitignorePath = join(targetDir, GITIGNORE_FILE_NAME);
  const content = await readFile(gitignorePath, "utf8");

  for (const line of content.split(/\r?\n/)) {
    if (line.includes(entry)) return false;
  }

  await appendFile(gitignorePath, `\n${entry}`, { encoding: "utf8" });
  return true;
}

export { GITIGNORE_FILE_NAME, PACKAGES_DIRECTORY };
