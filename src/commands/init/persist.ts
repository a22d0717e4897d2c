import { log, note } from "@clack/prompts";

import { describeError } from "../../core/errors.js";
import { renderManifest } from "../../core/manifest.js";
import type { AnswerSource } from "../../core/prompts.js";
import type { ManifestDraft } from "../../core/types.js";
import { GITIGNORE_FILE_NAME, ensureIgnored, writeManifest } from "../../core/write.js";

export interface PersistManifestOptions {
  /** Write without asking. */
  force: boolean;
  source: AnswerSource;
}

export interface PersistManifestResult {
  written: boolean;
  manifestPath?: string;
  /** `undefined` when `.gitignore` could not be read or written. */
  gitignoreUpdated?: boolean;
}

export async function confirmAndPersist(
  draft: ManifestDraft,
  options: PersistManifestOptions
): Promise<PersistManifestResult> {
  const rendered = renderManifest(draft);
  const leadIn = options.force ? "Wrote to" : "About to write to";
  note(rendered, `${leadIn} ${draft.baseDirectory}:`);

  if (!options.force) {
    const accepted = await options.source.confirm({ message: "Is this OK?", initialValue: true });
    if (!accepted) {
      log.info("Aborted.");
      return { written: false };
    }
  }

  const manifestPath = await writeManifest(draft.baseDirectory, rendered);

  // The manifest is already on disk; .gitignore upkeep is best effort.
  try {
    const gitignoreUpdated = await ensureIgnored(draft.baseDirectory);
    return { written: true, manifestPath, gitignoreUpdated };
  } catch (error) {
    log.warn(`Skipped ${GITIGNORE_FILE_NAME} update: ${describeError(error)}`);
    return { written: true, manifestPath };
  }
}
