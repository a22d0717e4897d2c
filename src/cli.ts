import { homedir } from "node:os";
import { resolve } from "node:path";

import { log } from "@clack/prompts";
import { Command } from "commander";

import { runInit } from "./commands/init.js";
import {
  normalizeError,
  normalizeOutputFormat,
  resolveOutputFormatFromArgv,
  toJsonErrorPayload
} from "./core/errors.js";
import type { InitCommandOptions } from "./core/types.js";
import packageJson from "../package.json" with { type: "json" };

const program = new Command();
const CLI_VERSION = packageJson.version;

const ANSI = {
  reset: "\u001B[0m",
  bold: "\u001B[1m",
  mutedGray: "\u001B[38;5;250m",
  violet: "\u001B[38;5;99m"
} as const;

const COLOR_ENABLED = Boolean(process.stdout.isTTY) && process.env.NO_COLOR === undefined && process.env.TERM !== "dumb";

function paint(text: string, ...codes: string[]): string {
  if (!COLOR_ENABLED || text.length === 0) return text;
  return `${codes.join("")}${text}${ANSI.reset}`;
}

function compactPath(path: string): string {
  const home = homedir();
  return path.startsWith(home) ? `~${path.slice(home.length)}` : path;
}

function renderHeader(pathArg: string | undefined): void {
  const target = compactPath(resolve(process.cwd(), pathArg ?? "."));
  console.log(`${paint("wapm-init", ANSI.bold, ANSI.violet)} ${paint(`v${CLI_VERSION}`, ANSI.mutedGray)}`);
  console.log(`${paint("target:", ANSI.mutedGray)} ${target}`);
  console.log("");
}

program
  .name("wapm-init")
  .description("Create or update a wapm.toml package manifest interactively.")
  .version(CLI_VERSION)
  .argument("[path]", "Package directory (defaults to current working directory)")
  .option("-y, --yes", "Keep the existing or default manifest and write it without prompting")
  .option("--fresh", "Fail when a wapm.toml already exists instead of editing it")
  .option("--format <format>", "Error output format: text | json", "text")
  .action(async (pathArg: string | undefined, rawOptions: InitCommandOptions) => {
    normalizeOutputFormat(rawOptions.format);
    renderHeader(pathArg);
    await runInit(pathArg, rawOptions);
  });

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const normalized = normalizeError(error);
    if (resolveOutputFormatFromArgv(process.argv) === "json") {
      console.error(JSON.stringify(toJsonErrorPayload(normalized), null, 2));
    } else {
      log.error(normalized.message);
    }
    process.exitCode = normalized.exitCode;
  }
}

void main();
