// src/runner/cli.ts
//
// glint command line
// ------------------
//   glint check <file...>                 report diagnostics, exit 1 on errors
//   glint run <file> [--frames N] [--delta D]
//                                         run the lifecycle in a headless scene
//   glint codes [--family F]              list the diagnostic code registry
//
// Common options: --log-level <level>, --no-lint, -h/--help.
//
// `main` takes its arguments and IO explicitly so tests can drive it.

import * as fs from "fs";
import { parseArgs } from "node:util";

import { ERROR_FAMILIES, familyLabel, isErrorFamily, listErrorCodes } from "../diagnostics/codes";
import { hasErrors, renderDiagnostic, type Diagnostic } from "../diagnostics/errors";
import { analyzeText } from "../language/compile";
import { loadGlintConfig, type ResolvedGlintConfig } from "../language/configuration";
import { createLogger, isLogLevel, type Logger } from "../utils/logger";
import { runScriptSource } from "./run";

export type CliIO = {
  out: (text: string) => void;
  err: (text: string) => void;
  readFile: (path: string) => Promise<string>;
};

export const NODE_IO: CliIO = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
  readFile: (path) => fs.promises.readFile(path, "utf8"),
};

export const EXIT_USAGE = 2;

const USAGE = `Usage:
  glint check <file...>
  glint run <file> [--frames N] [--delta SECONDS]
  glint codes [--family ${ERROR_FAMILIES.join("|")}]

Options:
  --log-level <level>   silent, error, warn, info, debug or trace
  --no-lint             skip lint warnings
  -h, --help            show this help
`;

type CliFlags = {
  frames?: string;
  delta?: string;
  family?: string;
  "log-level"?: string;
  "no-lint"?: boolean;
  help?: boolean;
};

export async function main(argv: readonly string[], io: CliIO = NODE_IO): Promise<number> {
  let flags: CliFlags;
  let positionals: string[];
  try {
    const parsed = parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        frames: { type: "string" },
        delta: { type: "string" },
        family: { type: "string" },
        "log-level": { type: "string" },
        "no-lint": { type: "boolean" },
        help: { type: "boolean", short: "h" },
      },
    });
    flags = parsed.values;
    positionals = parsed.positionals;
  } catch (e) {
    io.err(`${e instanceof Error ? e.message : String(e)}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  const [command, ...files] = positionals;
  if (flags.help || !command) {
    io.out(USAGE);
    return flags.help ? 0 : EXIT_USAGE;
  }

  const level = flags["log-level"];
  if (level !== undefined && !isLogLevel(level)) {
    io.err(`Unknown log level '${level}'\n`);
    return EXIT_USAGE;
  }
  const toErr = (msg: string) => io.err(`${msg}\n`);
  const logger = createLogger({
    name: "glint",
    level: level ?? "warn",
    timestamp: false,
    sink: { error: toErr, warn: toErr, info: toErr, debug: toErr },
  });

  switch (command) {
    case "check":
      return checkFiles(files, flags, io, logger);
    case "run":
      return runFile(files, flags, io, logger);
    case "codes":
      return listCodes(flags, io);
    default:
      io.err(`Unknown command '${command}'\n\n${USAGE}`);
      return EXIT_USAGE;
  }
}

/* =========================================================
   Commands
   ========================================================= */

async function checkFiles(files: string[], flags: CliFlags, io: CliIO, logger: Logger): Promise<number> {
  if (files.length === 0) {
    io.err(`glint check: no input files\n`);
    return EXIT_USAGE;
  }

  let errors = 0;
  let warnings = 0;

  for (const file of files) {
    const source = await readSource(file, io);
    if (source === null) {
      errors++;
      continue;
    }

    const config = await loadGlintConfig(file, undefined, logger);
    if (!config.diagnostics.enabled) continue;

    const analysis = analyzeText(source, {
      filename: file,
      lint: lintSetting(flags, config),
      maxDiagnostics: config.diagnostics.maxProblems,
      logger,
    });

    printDiagnostics(source, analysis.diagnostics, file, io);
    errors += analysis.diagnostics.filter((d) => d.severity === "error").length;
    warnings += analysis.diagnostics.filter((d) => d.severity === "warning").length;
  }

  io.out(`${plural(errors, "error")}, ${plural(warnings, "warning")}\n`);
  return errors > 0 ? 1 : 0;
}

async function runFile(files: string[], flags: CliFlags, io: CliIO, logger: Logger): Promise<number> {
  const [file] = files;
  if (!file || files.length > 1) {
    io.err(`glint run: expected exactly one file\n`);
    return EXIT_USAGE;
  }

  const source = await readSource(file, io);
  if (source === null) return 1;

  const config = await loadGlintConfig(file, undefined, logger);

  const frames = flags.frames === undefined ? config.runtime.frames : Number(flags.frames);
  const delta = flags.delta === undefined ? config.runtime.delta : Number(flags.delta);
  if (!Number.isInteger(frames) || frames < 0) {
    io.err(`--frames expects a non-negative integer, got '${flags.frames}'\n`);
    return EXIT_USAGE;
  }
  if (!Number.isFinite(delta) || delta <= 0) {
    io.err(`--delta expects a positive number, got '${flags.delta}'\n`);
    return EXIT_USAGE;
  }

  const result = runScriptSource(source, {
    filename: file,
    frames,
    delta,
    maxCallDepth: config.runtime.maxCallDepth,
    compile: { lint: lintSetting(flags, config), maxDiagnostics: config.diagnostics.maxProblems },
    logger,
  });

  io.out(result.stdout);
  printDiagnostics(source, result.diagnostics, file, io);
  return result.exitCode;
}

function listCodes(flags: CliFlags, io: CliIO): number {
  const family = flags.family;
  if (family !== undefined && !isErrorFamily(family)) {
    io.err(`Unknown family '${family}'. Expected one of: ${ERROR_FAMILIES.join(", ")}\n`);
    return EXIT_USAGE;
  }

  for (const c of listErrorCodes(family)) {
    io.out(`${c.code}  ${familyLabel(c.family).padEnd(20)}  ${c.title}\n`);
  }
  return 0;
}

/* =========================================================
   Helpers
   ========================================================= */

async function readSource(file: string, io: CliIO): Promise<string | null> {
  try {
    return await io.readFile(file);
  } catch (e) {
    io.err(`${file}: ${e instanceof Error ? e.message : String(e)}\n`);
    return null;
  }
}

function printDiagnostics(source: string, list: readonly Diagnostic[], file: string, io: CliIO): void {
  for (const d of list) {
    const text = `${renderDiagnostic(source, d, file)}\n\n`;
    if (hasErrors([d])) io.err(text);
    else io.out(text);
  }
}

function lintSetting(flags: CliFlags, config: ResolvedGlintConfig): boolean | ResolvedGlintConfig["lint"] {
  if (flags["no-lint"] || !config.lint.enabled) return false;
  return config.lint;
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}
