import { relative, resolve } from "node:path";

import { intro, log, outro } from "@clack/prompts";

import { loadOrSeed } from "../core/manifest.js";
import { type AnswerSource, ClackAnswerSource, INTRO_TEXT, collectManifest } from "../core/prompts.js";
import type { InitCommandOptions, ManifestDraft } from "../core/types.js";
import { assertTargetDirectory, GITIGNORE_FILE_NAME, PACKAGES_DIRECTORY } from "../core/write.js";
import { confirmAndPersist, type PersistManifestResult } from "./init/persist.js";

export interface RunInitDependencies {
  source?: AnswerSource;
}

export interface RunInitResult extends PersistManifestResult {
  draft: ManifestDraft;
}

function toDisplayPath(path: string): string {
  const rel = relative(process.cwd(), path);
  if (!rel || rel === "") return ".";
  return rel.startsWith("..") ? path : rel;
}

export async function runInit(
  pathArg: string | undefined,
  options: InitCommandOptions,
  dependencies: RunInitDependencies = {}
): Promise<RunInitResult> {
  const targetDir = resolve(process.cwd(), pathArg ?? ".");
  const force = options.yes ?? false;
  const source = dependencies.source ?? new ClackAnswerSource();

  await assertTargetDirectory(targetDir);
  const loaded = await loadOrSeed(targetDir, { failIfExists: options.fresh ?? false });

  let draft = loaded;
  if (!force) {
    intro("wapm init");
    log.message(INTRO_TEXT);
    draft = await collectManifest(loaded, source);
  }

  const result = await confirmAndPersist(draft, { force, source });
  if (!result.written) {
    return { ...result, draft };
  }

  log.success(`Manifest written to \`${toDisplayPath(result.manifestPath ?? targetDir)}\`.`);
  if (result.gitignoreUpdated === true) {
    log.info(`Added \`${PACKAGES_DIRECTORY}\` to ${GITIGNORE_FILE_NAME}.`);
  }
  if (!force) {
    outro("Manifest ready.");
  }
  return { ...result, draft };
}
