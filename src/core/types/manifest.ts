import type { JsonMap } from "@iarna/toml";

import type { Abi } from "./common.js";

export interface PackageMetadata {
  name: string;
  version: string;
  description: string;
  repository?: string;
  license?: string;
  licenseFile?: string;
  homepage?: string;
  readme?: string;
  wasmerExtraFlags?: string;
  disableCommandRename?: boolean;
}

export interface ManifestModule {
  name: string;
  source: string;
  abi: Abi;
  /** Interface name to version requirement, e.g. `{ wasi: "0.0.0-unstable" }`. */
  interfaces?: Record<string, string>;
}

export interface ManifestCommand {
  name: string;
  /** Name of the module that backs this command. */
  module: string;
  mainArgs?: string;
  package?: string;
}

/**
 * In-memory manifest being edited by the wizard.
 *
 * `modules` and `commands` are left undefined instead of empty so the
 * rendered file has no `[[module]]` / `[[command]]` sections at all.
 */
export interface ManifestDraft {
  baseDirectory: string;
  package: PackageMetadata;
  modules?: ManifestModule[];
  commands?: ManifestCommand[];
  /** Top-level tables the wizard does not edit (`[dependencies]`, `[fs]`, ...), kept as read. */
  extra: JsonMap;
}
