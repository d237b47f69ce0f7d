// src/language/configuration.ts
//
// Glint Project Configuration Resolver
// ------------------------------------
// Reads `glint.config.json` from the project and returns one normalized
// config object for the CLI, the runner and the language server.
//
// - project root detection (nearest glint.config.json, else the git root)
// - defaults deep-merged with the user's file
// - every value validated; a wrong type falls back to the default
//
// Exports:
//   - GlintConfig (type), DEFAULT_CONFIG
//   - loadGlintConfig(filePath, workspaceRoot?, logger?): Promise<ResolvedGlintConfig>
//   - findGlintProjectRoot(startDir): Promise<string | null>
//   - resolveConfig(raw): GlintConfig

import * as fs from "fs";
import * as path from "path";

import { SILENT_LOGGER, isLogLevel, type LogLevel, type Logger } from "../utils/logger";

export const CONFIG_FILE_NAME = "glint.config.json";

export type GlintConfig = {
  /** Name shown in logs. */
  name: string;
  logLevel: LogLevel;

  diagnostics: {
    enabled: boolean;
    maxProblems: number;
  };

  lint: {
    enabled: boolean;
    unusedVariables: boolean;
    unreachableCode: boolean;
    needlessMut: boolean;
  };

  runtime: {
    maxCallDepth: number;
    /** Frames simulated by `glint run`. */
    frames: number;
    /** Seconds per simulated frame. */
    delta: number;
  };

  files: {
    extensions: string[];
    exclude: string[];
  };
};

export type ResolvedGlintConfig = GlintConfig & {
  projectRoot: string | null;
  configPath: string | null;
  /** Problems found while reading the file; defaults were used instead. */
  warnings: string[];
};

export const DEFAULT_CONFIG: GlintConfig = {
  name: "Glint Project",
  logLevel: "info",
  diagnostics: {
    enabled: true,
    maxProblems: 200,
  },
  lint: {
    enabled: true,
    unusedVariables: true,
    unreachableCode: true,
    needlessMut: true,
  },
  runtime: {
    maxCallDepth: 256,
    frames: 1,
    delta: 1 / 60,
  },
  files: {
    extensions: [".glint"],
    exclude: ["**/node_modules/**", "**/dist/**", "**/.git/**"],
  },
};

/* =========================================================
   Public API
   ========================================================= */

export async function loadGlintConfig(
  filePath: string,
  workspaceRoot?: string,
  logger: Logger = SILENT_LOGGER
): Promise<ResolvedGlintConfig> {
  const startDir = (await isDirectory(filePath)) ? filePath : path.dirname(filePath);

  const projectRoot = (await findGlintProjectRoot(startDir)) ?? workspaceRoot ?? null;
  const configPath = projectRoot ? await findConfigFile(projectRoot) : null;
  const warnings: string[] = [];

  let user: Record<string, unknown> = {};
  if (configPath) {
    const parsed = await readJson(configPath);
    if (!parsed.ok) {
      warnings.push(`${configPath}: ${parsed.error}`);
    } else if (!isObject(parsed.value)) {
      warnings.push(`${configPath}: expected a JSON object`);
    } else {
      user = parsed.value;
    }
  }

  for (const w of warnings) logger.warn(`Using default configuration. ${w}`);

  return {
    ...resolveConfig(deepMerge({ ...DEFAULT_CONFIG }, user)),
    projectRoot,
    configPath,
    warnings,
  };
}

export async function findGlintProjectRoot(startDir: string): Promise<string | null> {
  let dir = path.resolve(startDir);
  let gitRoot: string | null = null;

  for (;;) {
    if (await exists(path.join(dir, CONFIG_FILE_NAME))) return dir;
    if (!gitRoot && (await exists(path.join(dir, ".git")))) gitRoot = dir;

    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  return gitRoot;
}

/** Validates a merged raw object into a config; wrong types take the default. */
export function resolveConfig(raw: Record<string, unknown>): GlintConfig {
  const d = DEFAULT_CONFIG;
  const diagnostics = section(raw, "diagnostics");
  const lint = section(raw, "lint");
  const runtime = section(raw, "runtime");
  const files = section(raw, "files");

  return {
    name: stringOr(raw.name, d.name),
    logLevel: typeof raw.logLevel === "string" && isLogLevel(raw.logLevel) ? raw.logLevel : d.logLevel,
    diagnostics: {
      enabled: boolOr(diagnostics.enabled, d.diagnostics.enabled),
      maxProblems: positiveIntOr(diagnostics.maxProblems, d.diagnostics.maxProblems),
    },
    lint: {
      enabled: boolOr(lint.enabled, d.lint.enabled),
      unusedVariables: boolOr(lint.unusedVariables, d.lint.unusedVariables),
      unreachableCode: boolOr(lint.unreachableCode, d.lint.unreachableCode),
      needlessMut: boolOr(lint.needlessMut, d.lint.needlessMut),
    },
    runtime: {
      maxCallDepth: positiveIntOr(runtime.maxCallDepth, d.runtime.maxCallDepth),
      frames: positiveIntOr(runtime.frames, d.runtime.frames),
      delta: positiveNumberOr(runtime.delta, d.runtime.delta),
    },
    files: {
      extensions: uniqueStrings(stringListOr(files.extensions, d.files.extensions).map(normalizeExt)),
      exclude: uniqueStrings(stringListOr(files.exclude, d.files.exclude)),
    },
  };
}

/* =========================================================
   Config file discovery
   ========================================================= */

async function findConfigFile(projectRoot: string): Promise<string | null> {
  const p = path.join(projectRoot, CONFIG_FILE_NAME);
  return (await exists(p)) ? p : null;
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.promises.access(p, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

/* =========================================================
   JSON utilities
   ========================================================= */

type JsonRead = { ok: true; value: unknown } | { ok: false; error: string };

async function readJson(p: string): Promise<JsonRead> {
  try {
    const raw = await fs.promises.readFile(p, "utf8");
    const value: unknown = JSON.parse(raw);
    return { ok: true, value };
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e.message : String(e) };
  }
}

/* =========================================================
   Deep merge
   ========================================================= */

function isObject(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

export function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };

  for (const [k, v] of Object.entries(override)) {
    if (v === undefined) continue;

    if (Array.isArray(v)) {
      out[k] = v.slice();
      continue;
    }

    const current = out[k];
    if (isObject(v) && isObject(current)) {
      out[k] = deepMerge(current, v);
      continue;
    }

    out[k] = v;
  }

  return out;
}

/* =========================================================
   Normalization helpers
   ========================================================= */

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const v = raw[key];
  return isObject(v) ? v : {};
}

function stringOr(v: unknown, fallback: string): string {
  return typeof v === "string" && v.trim() ? v.trim() : fallback;
}

function boolOr(v: unknown, fallback: boolean): boolean {
  return typeof v === "boolean" ? v : fallback;
}

function positiveIntOr(v: unknown, fallback: number): number {
  return typeof v === "number" && Number.isInteger(v) && v > 0 ? v : fallback;
}

function positiveNumberOr(v: unknown, fallback: number): number {
  return typeof v === "number" && Number.isFinite(v) && v > 0 ? v : fallback;
}

function stringListOr(v: unknown, fallback: string[]): string[] {
  if (!Array.isArray(v)) return fallback;
  return v.filter((s): s is string => typeof s === "string");
}

function uniqueStrings(list: string[]): string[] {
  const set = new Set<string>();
  for (const s of list) {
    const t = s.trim();
    if (t) set.add(t);
  }
  return [...set.values()];
}

function normalizeExt(ext: string): string {
  const e = ext.trim();
  if (!e) return ".glint";
  return e.startsWith(".") ? e : `.${e}`;
}
