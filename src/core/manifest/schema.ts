import { z } from "zod";

const abiSchema = z.enum(["none", "wasi", "emscripten"]);

const packageSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  description: z.string().default(""),
  repository: z.string().optional(),
  license: z.string().optional(),
  "license-file": z.string().optional(),
  homepage: z.string().optional(),
  readme: z.string().optional(),
  "wasmer-extra-flags": z.string().optional(),
  "disable-command-rename": z.boolean().optional()
});

const moduleSchema = z.object({
  name: z.string().min(1),
  source: z.string().min(1),
  abi: abiSchema.default("none"),
  interfaces: z.record(z.string(), z.string()).optional()
});

const commandSchema = z.object({
  name: z.string().min(1),
  module: z.string().min(1),
  "main-args": z.string().optional(),
  package: z.string().optional()
});

const manifestFileSchema = z.object({
  package: packageSchema,
  module: z.array(moduleSchema).optional(),
  command: z.array(commandSchema).optional()
});

/** Top-level keys owned by the wizard; everything else is passed through untouched. */
const MANAGED_TABLES = new Set(["package", "module", "command"]);

type ManifestFile = z.infer<typeof manifestFileSchema>;

export { MANAGED_TABLES, manifestFileSchema };
export type { ManifestFile };
