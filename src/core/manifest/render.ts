import * as TOML from "@iarna/toml";

import type { ManifestCommand, ManifestDraft, ManifestModule, PackageMetadata } from "../types.js";

// TOML has no null: optional fields are only written when set.
function packageTable(pkg: PackageMetadata): TOML.JsonMap {
  const table: TOML.JsonMap = {
    name: pkg.name,
    version: pkg.version,
    description: pkg.description
  };
  if (pkg.repository !== undefined) table.repository = pkg.repository;
  if (pkg.license !== undefined) table.license = pkg.license;
  if (pkg.licenseFile !== undefined) table["license-file"] = pkg.licenseFile;
  if (pkg.homepage !== undefined) table.homepage = pkg.homepage;
  if (pkg.readme !== undefined) table.readme = pkg.readme;
  if (pkg.wasmerExtraFlags !== undefined) table["wasmer-extra-flags"] = pkg.wasmerExtraFlags;
  if (pkg.disableCommandRename !== undefined) table["disable-command-rename"] = pkg.disableCommandRename;
  return table;
}

function moduleTable(module: ManifestModule): TOML.JsonMap {
  const table: TOML.JsonMap = {
    name: module.name,
    source: module.source,
    abi: module.abi
  };
  if (module.interfaces) table.interfaces = { ...module.interfaces };
  return table;
}

function commandTable(command: ManifestCommand): TOML.JsonMap {
  const table: TOML.JsonMap = {
    name: command.name,
    module: command.module
  };
  if (command.mainArgs !== undefined) table["main-args"] = command.mainArgs;
  if (command.package !== undefined) table.package = command.package;
  return table;
}

function toManifestDocument(draft: ManifestDraft): TOML.JsonMap {
  const document: TOML.JsonMap = { package: packageTable(draft.package), ...draft.extra };
  if (draft.modules) document.module = draft.modules.map(moduleTable);
  if (draft.commands) document.command = draft.commands.map(commandTable);
  return document;
}

export function renderManifest(draft: ManifestDraft): string {
  return TOML.stringify(toManifestDocument(draft));
}
