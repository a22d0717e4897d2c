import type { CliOutputFormat } from "./types.js";

const EXIT_CODE_OPERATIONAL_FAILURE = 1;
const EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE = 2;

interface InitErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class InitError extends Error {
  readonly code: string;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, exitCode: number, options: InitErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
    if (options.details !== undefined) {
      this.details = options.details;
    }
  }
}

export class UserInputError extends InitError {
  constructor(message: string, options: InitErrorOptions = {}) {
    super(message, "USER_INPUT", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class ManifestExistsError extends InitError {
  readonly manifestPath: string;

  constructor(manifestPath: string, options: InitErrorOptions = {}) {
    super(`Manifest file already exists at ${manifestPath}`, "MANIFEST_EXISTS", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, {
      ...options,
      details: { manifestPath, ...options.details }
    });
    this.manifestPath = manifestPath;
  }
}

export class ManifestParseError extends InitError {
  constructor(message: string, options: InitErrorOptions = {}) {
    super(message, "MANIFEST_PARSE", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class ExecutionError extends InitError {
  constructor(message: string, options: InitErrorOptions = {}) {
    super(message, "EXECUTION", EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

function isCommanderErrorLike(error: unknown): error is { code?: unknown; message?: unknown } {
  if (!error || typeof error !== "object") return false;
  if (!("code" in error)) return false;
  return typeof (error as { code?: unknown }).code === "string";
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function normalizeError(error: unknown): InitError {
  if (error instanceof InitError) return error;
  if (isCommanderErrorLike(error) && String(error.code).startsWith("commander.")) {
    const message = error instanceof Error ? error.message : String(error.message ?? error.code);
    return new UserInputError(message, {
      cause: error,
      details: {
        commanderCode: String(error.code)
      }
    });
  }
  if (error instanceof Error) {
    return new ExecutionError(error.message, { cause: error });
  }
  return new ExecutionError(String(error));
}

export function normalizeOutputFormat(value: string | undefined): CliOutputFormat {
  const normalized = value?.trim().toLowerCase() ?? "text";
  if (normalized === "text" || normalized === "json") {
    return normalized;
  }
  throw new UserInputError(`Invalid --format value "${String(value)}". Expected "text" or "json".`);
}

export function resolveOutputFormatFromArgv(argv: string[]): CliOutputFormat {
  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (!token) continue;
    if (token === "--format") {
      const next = argv[index + 1];
      return next?.trim().toLowerCase() === "json" ? "json" : "text";
    }
    if (!token.startsWith("--format=")) continue;
    const value = token.slice("--format=".length).trim().toLowerCase();
    return value === "json" ? "json" : "text";
  }
  return "text";
}

export function toJsonErrorPayload(error: InitError): Record<string, unknown> {
  return {
    error: {
      code: error.code,
      type: error.name,
      message: error.message,
      exitCode: error.exitCode,
      ...(error.details ? { details: error.details } : {})
    }
  };
}
