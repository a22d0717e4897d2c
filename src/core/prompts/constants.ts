import type { Abi } from "../types.js";

const WASI_LAST_VERSION = "0.0.0-unstable";

const ABI_CHOICES = [
  { abi: "none", label: "None" },
  { abi: "wasi", label: "WASI" },
  { abi: "emscripten", label: "Emscripten" }
] as const satisfies ReadonlyArray<{ abi: Abi; label: string }>;

/** Interfaces a freshly declared module of each ABI requires. */
const ABI_INTERFACES: Readonly<Record<Abi, Readonly<Record<string, string>> | undefined>> = {
  none: undefined,
  wasi: { wasi: WASI_LAST_VERSION },
  emscripten: undefined
};

const ENTRY_MODULE = { name: "entry", source: "entry.wasm" } as const;
const EMPTY_MODULE = { name: "", source: "none" } as const;

const INTRO_TEXT = `This utility will walk you through creating a wapm.toml file.
It only covers the most common items, and tries to guess sensible defaults.

Use \`wapm add <pkg>\` afterwards to add a package and
save it as a dependency in the wapm.toml file.

Press ^C at any time to quit.`;

export { ABI_CHOICES, ABI_INTERFACES, EMPTY_MODULE, ENTRY_MODULE, INTRO_TEXT, WASI_LAST_VERSION };
