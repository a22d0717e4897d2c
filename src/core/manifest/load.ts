import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { basename, join, resolve } from "node:path";

import * as TOML from "@iarna/toml";
import type { ZodError } from "zod";

import { ManifestExistsError, ManifestParseError, describeError } from "../errors.js";
import { ENTRY_MODULE } from "../prompts/constants.js";
import { validateVersion } from "../prompts/validators.js";
import type { ManifestDraft } from "../types.js";
import { MANAGED_TABLES, type ManifestFile, manifestFileSchema } from "./schema.js";

const MANIFEST_FILE_NAME = "wapm.toml";
const DEFAULT_VERSION = "1.0.0";
const DEFAULT_LICENSE = "ISC";

interface LoadOrSeedOptions {
  /** Refuse to edit an existing manifest. */
  failIfExists?: boolean;
}

function manifestPathFor(directory: string): string {
  return join(directory, MANIFEST_FILE_NAME);
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function toDraft(directory: string, file: ManifestFile, extra: TOML.JsonMap): ManifestDraft {
  const pkg = file.package;
  return {
    baseDirectory: directory,
    package: {
      name: pkg.name,
      version: pkg.version,
      description: pkg.description,
      ...(pkg.repository !== undefined ? { repository: pkg.repository } : {}),
      ...(pkg.license !== undefined ? { license: pkg.license } : {}),
      ...(pkg["license-file"] !== undefined ? { licenseFile: pkg["license-file"] } : {}),
      ...(pkg.homepage !== undefined ? { homepage: pkg.homepage } : {}),
      ...(pkg.readme !== undefined ? { readme: pkg.readme } : {}),
      ...(pkg["wasmer-extra-flags"] !== undefined ? { wasmerExtraFlags: pkg["wasmer-extra-flags"] } : {}),
      ...(pkg["disable-command-rename"] !== undefined ? { disableCommandRename: pkg["disable-command-rename"] } : {})
    },
    ...(file.module && file.module.length > 0
      ? {
          modules: file.module.map((entry) => ({
            name: entry.name,
            source: entry.source,
            abi: entry.abi,
            ...(entry.interfaces ? { interfaces: entry.interfaces } : {})
          }))
        }
      : {}),
    ...(file.command && file.command.length > 0
      ? {
          commands: file.command.map((entry) => ({
            name: entry.name,
            module: entry.module,
            ...(entry["main-args"] !== undefined ? { mainArgs: entry["main-args"] } : {}),
            ...(entry.package !== undefined ? { package: entry.package } : {})
          }))
        }
      : {}),
    extra
  };
}

export function parseManifest(directory: string, content: string): ManifestDraft {
  let raw: TOML.JsonMap;
  try {
    raw = TOML.parse(content);
  } catch (error) {
    throw new ManifestParseError(`Invalid TOML in ${manifestPathFor(directory)}: ${describeError(error)}`, {
      cause: error
    });
  }

  const parsed = manifestFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ManifestParseError(`Invalid manifest ${manifestPathFor(directory)}: ${formatIssues(parsed.error)}`, {
      cause: parsed.error
    });
  }

  const version = validateVersion(parsed.data.package.version);
  if (!version.ok) {
    throw new ManifestParseError(`Invalid manifest ${manifestPathFor(directory)}: package.version: ${version.message}`);
  }

  const extra: TOML.JsonMap = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!MANAGED_TABLES.has(key)) extra[key] = value;
  }

  const file: ManifestFile = { ...parsed.data, package: { ...parsed.data.package, version: version.value } };
  return toDraft(directory, file, extra);
}

export async function readManifest(directory: string): Promise<ManifestDraft> {
  const manifestPath = manifestPathFor(directory);
  let content: string;
  try {
    content = await readFile(manifestPath, "utf8");
  } catch (error) {
    throw new ManifestParseError(`Could not read ${manifestPath}: ${describeError(error)}`, { cause: error });
  }
  return parseManifest(directory, content);
}

export function seedManifest(directory: string): ManifestDraft {
  const absolute = resolve(directory);
  return {
    baseDirectory: absolute,
    package: {
      name: basename(absolute),
      version: DEFAULT_VERSION,
      description: "",
      license: DEFAULT_LICENSE
    },
    modules: [{ name: ENTRY_MODULE.name, source: ENTRY_MODULE.source, abi: "none" }],
    extra: {}
  };
}

export async function loadOrSeed(directory: string, options: LoadOrSeedOptions = {}): Promise<ManifestDraft> {
  const manifestPath = manifestPathFor(directory);
  if (!existsSync(manifestPath)) {
    return seedManifest(directory);
  }
  if (options.failIfExists) {
    throw new ManifestExistsError(manifestPath);
  }
  return readManifest(resolve(directory));
}

export { MANIFEST_FILE_NAME, manifestPathFor };
export type { LoadOrSeedOptions };
