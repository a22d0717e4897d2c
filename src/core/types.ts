export type { Abi, CliOutputFormat } from "./types/common.js";
export type { InitCommandOptions } from "./types/init.js";
export type { ManifestCommand, ManifestDraft, ManifestModule, PackageMetadata } from "./types/manifest.js";
