import semver, { type SemVer } from "semver";

type ValidationResult<T> = { ok: true; value: T } | { ok: false; message: string };
type Validator<T> = (raw: string) => ValidationResult<T>;

const NAME_PATTERN = /^[-a-zA-Z0-9_]+$/;
const LICENSE_PATTERN = /^[-a-zA-Z0-9_.+]+$/;
const WASM_EXTENSION = ".wasm";
const NO_SOURCE = "none";

function accept<T>(value: T): ValidationResult<T> {
  return { ok: true, value };
}

function reject<T>(message: string): ValidationResult<T> {
  return { ok: false, message };
}

function validateName(raw: string): ValidationResult<string> {
  if (raw.length === 0) return reject("Name cannot be empty.");
  if (!NAME_PATTERN.test(raw)) {
    return reject(`The name "${raw}" contains invalid characters. Valid characters are [-a-zA-Z0-9_].`);
  }
  return accept(raw);
}

/** Package names may carry one `namespace/` prefix, e.g. `acme/tool`. */
function validatePackageName(raw: string): ValidationResult<string> {
  const parts = raw.split("/");
  if (parts.length > 2) {
    return reject(`The package name "${raw}" may contain at most one "/" namespace separator.`);
  }
  if (parts.length === 2 && parts.some((part) => part.length === 0)) {
    return reject(`The package name "${raw}" has an empty segment.`);
  }
  for (const part of parts) {
    const result = validateName(part);
    if (!result.ok) return result;
  }
  return accept(raw);
}

function formatVersion(version: SemVer): string {
  return version.build.length > 0 ? `${version.version}+${version.build.join(".")}` : version.version;
}

function validateVersion(raw: string): ValidationResult<string> {
  try {
    return accept(formatVersion(new semver.SemVer(raw)));
  } catch (error) {
    return reject(error instanceof Error ? error.message : String(error));
  }
}

function isNoSource(source: string): boolean {
  return source === NO_SOURCE;
}

function validateWasmSource(raw: string): ValidationResult<string> {
  if (isNoSource(raw) || raw.endsWith(WASM_EXTENSION)) {
    return accept(raw);
  }
  return reject(`The module source path must have a ${WASM_EXTENSION} extension`);
}

function validateLicense(raw: string): ValidationResult<string> {
  if (raw.length === 0) return reject("License cannot be empty.");
  if (!LICENSE_PATTERN.test(raw)) {
    return reject(`The license "${raw}" contains invalid characters. Valid characters are [-a-zA-Z0-9_.+].`);
  }
  return accept(raw);
}

// One string, one command entry; " run   serve " is stored as "run serve".
function validateCommands(raw: string): ValidationResult<string> {
  if (raw.length === 0) return accept(raw);
  const tokens = raw.split(/\s+/).filter(Boolean);
  if (tokens.length === 0) return reject("Command names cannot be blank.");
  for (const token of tokens) {
    const result = validateName(token);
    if (!result.ok) return result;
  }
  return accept(tokens.join(" "));
}

export {
  formatVersion,
  isNoSource,
  validateCommands,
  validateLicense,
  validateName,
  validatePackageName,
  validateVersion,
  validateWasmSource
};
export type { ValidationResult, Validator };
