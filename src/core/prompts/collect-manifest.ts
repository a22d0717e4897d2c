import { parse } from "node:path";

import type { ManifestCommand, ManifestDraft, ManifestModule, PackageMetadata } from "../types.js";
import type { AnswerSource } from "./answer-source.js";
import { ask, askUntilValid } from "./ask.js";
import { ABI_CHOICES, ABI_INTERFACES, EMPTY_MODULE, ENTRY_MODULE } from "./constants.js";
import {
  isNoSource,
  validateCommands,
  validateLicense,
  validateName,
  validatePackageName,
  validateVersion,
  validateWasmSource
} from "./validators.js";

interface CollectedModule {
  module: ManifestModule;
  command?: ManifestCommand;
}

function moduleNameFromSource(source: string): string {
  return parse(source).name;
}

async function collectPackage(current: PackageMetadata, source: AnswerSource): Promise<PackageMetadata> {
  const name = await askUntilValid(source, "Package name", current.name, validatePackageName);
  const version = await askUntilValid(source, "Version", current.version, validateVersion);
  const description = (await ask(source, "Description", current.description)) ?? "";
  const repository = await ask(source, "Repository", current.repository);
  const license = await askUntilValid(source, "License", current.license, validateLicense);

  const { repository: _previousRepository, ...rest } = current;
  return {
    ...rest,
    name,
    version,
    description,
    ...(repository !== undefined ? { repository } : {}),
    license
  };
}

/** Returns `null` once the user answers `none` for the source. */
async function collectModule(index: number, source: AnswerSource): Promise<CollectedModule | null> {
  const skeleton = index === 0 ? ENTRY_MODULE : EMPTY_MODULE;

  const modulePath = await askUntilValid(
    source,
    `Module ${index + 1} source (path, or "none" to finish)`,
    skeleton.source,
    validateWasmSource
  );
  if (isNoSource(modulePath)) return null;

  const derivedName = moduleNameFromSource(modulePath);
  const name = await askUntilValid(source, `Module ${index + 1} name`, derivedName, validateName);

  const choiceIndex = await source.select({
    message: `Module ${index + 1} ABI`,
    options: ABI_CHOICES.map((choice) => choice.label),
    initialIndex: 0
  });
  const abi = ABI_CHOICES[choiceIndex]?.abi ?? "none";
  const interfaces = ABI_INTERFACES[abi];

  const module: ManifestModule = {
    name,
    source: modulePath,
    abi,
    ...(interfaces ? { interfaces: { ...interfaces } } : {})
  };

  if (abi === "none") return { module };

  const commandNames = await askUntilValid(
    source,
    `Module ${index + 1} commands (space separated)`,
    derivedName,
    validateCommands
  );
  if (commandNames.length === 0) return { module };

  return { module, command: { name: commandNames, module: name } };
}

/**
 * Walks the user through the package fields and the module list, returning a
 * new draft. Modules and commands from `draft` are replaced by the ones
 * collected here; every other field is carried over.
 */
async function collectManifest(draft: ManifestDraft, source: AnswerSource): Promise<ManifestDraft> {
  const pkg = await collectPackage(draft.package, source);

  const modules: ManifestModule[] = [];
  const commands: ManifestCommand[] = [];
  for (;;) {
    const collected = await collectModule(modules.length, source);
    if (!collected) break;
    modules.push(collected.module);
    if (collected.command) commands.push(collected.command);
  }

  const { modules: _previousModules, commands: _previousCommands, ...rest } = draft;
  return {
    ...rest,
    package: pkg,
    ...(modules.length > 0 ? { modules } : {}),
    ...(commands.length > 0 ? { commands } : {})
  };
}

export { collectManifest, moduleNameFromSource };
