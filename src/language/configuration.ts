// src/language/configuration.ts
//
// Kaleidoscope Project / File Configuration Resolver
// --------------------------------------------------
// Reads "kaleidoscope.config.json" from the filesystem and produces a single
// normalized config object for the language service and the codegen driver.
//
// Gives you:
// - project root detection
// - kaleidoscope.config.json discovery
// - lexer/parser options (extra operators, anonymous function prefix)
// - diagnostics options (recovery, error cap)
// - which file extensions count as Kaleidoscope source
//
// Node-side only: uses fs/path.
//
// Exports:
//   - KaleidoscopeConfig (type)
//   - loadConfig(filePath, workspaceRoot?, options?): Promise<ResolvedConfig>
//   - findProjectRoot(startDir): Promise<string | null>
//   - toAnalyzeOptions(config, logger?)
//   - isSourceFile(filePath, config)

import * as fs from "fs";
import * as path from "path";

import { canBeOperator } from "../core/lexer";
import { DEFAULT_ANONYMOUS_PREFIX } from "../core/parser";
import { createLogger, isLogLevel, silentLogger, type LogLevel, type Logger } from "../utils/logger";
import { err, ok, type Result } from "../utils/result";
import { DEFAULT_MAX_ERRORS, normalizeMaxErrors, type AnalyzeOptions } from "./kaleidoscope.language";

export const CONFIG_FILE_NAME = "kaleidoscope.config.json";

export type KaleidoscopeConfig = {
  // Name shown in logs
  name?: string;

  logLevel?: LogLevel;

  lexer?: {
    // Extra single-character binary operators, e.g. "%&"
    operators?: string;
  };

  parser?: {
    // Names of wrapped top-level expressions: <prefix>_1, <prefix>_2, ...
    anonymousPrefix?: string;
  };

  diagnostics?: {
    // Resynchronize at the next ';' after an error instead of stopping
    recover?: boolean;
    // Stop reporting after this many errors
    maxErrors?: number;
  };

  files?: {
    // default: [".ks"]
    extensions?: string[];
  };
};

export type ConfigSettings = {
  name: string;
  logLevel: LogLevel;
  lexer: { operators: string };
  parser: { anonymousPrefix: string };
  diagnostics: { recover: boolean; maxErrors: number };
  files: { extensions: string[] };
};

export type ResolvedConfig = ConfigSettings & {
  projectRoot: string | null;
  configPath: string | null;
};

export const DEFAULT_CONFIG: ConfigSettings = {
  name: "Kaleidoscope Project",
  logLevel: "info",
  lexer: { operators: "" },
  parser: { anonymousPrefix: DEFAULT_ANONYMOUS_PREFIX },
  diagnostics: { recover: true, maxErrors: DEFAULT_MAX_ERRORS },
  files: { extensions: [".ks"] },
};

export type LoadConfigOptions = {
  // Receives warnings about unreadable files and rejected values
  logger?: Logger;
};

/* =========================================================
   Public API
   ========================================================= */

export async function loadConfig(
  filePath: string,
  workspaceRoot?: string,
  options: LoadConfigOptions = {}
): Promise<ResolvedConfig> {
  const log = options.logger ?? silentLogger;

  const startDir = (await isDirectory(filePath)) ? filePath : path.dirname(filePath);
  const projectRoot = (await findProjectRoot(startDir)) ?? workspaceRoot ?? null;
  const configPath = projectRoot ? await findConfigFile(projectRoot) : null;

  let userConfig: Record<string, unknown> = {};
  if (configPath) {
    const read = await readJsonObject(configPath);
    if (read.ok) userConfig = read.value;
    else log.warn(`ignoring ${configPath}: ${read.error}`);
  }

  const merged = deepMerge(DEFAULT_CONFIG, userConfig);

  return {
    ...normalize(merged, log),
    projectRoot,
    configPath,
  };
}

export async function findProjectRoot(startDir: string): Promise<string | null> {
  let dir = path.resolve(startDir);

  // Stop at filesystem root
  for (let i = 0; i < 60; i++) {
    if (await exists(path.join(dir, CONFIG_FILE_NAME))) return dir;
    if (await exists(path.join(dir, ".git"))) return dir; // Git root fallback

    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  return null;
}

export function toAnalyzeOptions(config: ConfigSettings, logger?: Logger): AnalyzeOptions {
  return {
    operators: config.lexer.operators,
    anonymousPrefix: config.parser.anonymousPrefix,
    recover: config.diagnostics.recover,
    maxErrors: config.diagnostics.maxErrors,
    logger: logger ?? createLogger({ level: config.logLevel }),
  };
}

export function isSourceFile(filePath: string, config: ConfigSettings): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return ext !== "" && config.files.extensions.some((e) => e.toLowerCase() === ext);
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

async function readJsonObject(p: string): Promise<Result<Record<string, unknown>, string>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.promises.readFile(p, "utf8"));
  } catch (e) {
    return err(e instanceof Error ? e.message : String(e));
  }

  if (!isObject(parsed)) return err("top-level value is not an object");
  return ok(parsed);
}

/* =========================================================
   Deep merge
   ========================================================= */

function isObject(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
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
   Normalization
   ========================================================= */

function normalize(merged: Record<string, unknown>, log: Logger): ConfigSettings {
  const lexer = section(merged, "lexer");
  const parser = section(merged, "parser");
  const diagnostics = section(merged, "diagnostics");
  const files = section(merged, "files");

  let logLevel = DEFAULT_CONFIG.logLevel;
  if (isLogLevel(merged.logLevel)) logLevel = merged.logLevel;
  else log.warn(`unknown logLevel ${JSON.stringify(merged.logLevel)}; using "${DEFAULT_CONFIG.logLevel}"`);

  return {
    name: nonEmptyString(merged.name) ?? DEFAULT_CONFIG.name,
    logLevel,
    lexer: { operators: normalizeOperators(lexer.operators, log) },
    parser: { anonymousPrefix: nonEmptyString(parser.anonymousPrefix) ?? DEFAULT_CONFIG.parser.anonymousPrefix },
    diagnostics: {
      recover: typeof diagnostics.recover === "boolean" ? diagnostics.recover : DEFAULT_CONFIG.diagnostics.recover,
      maxErrors: normalizeMaxErrors(diagnostics.maxErrors),
    },
    files: { extensions: normalizeExtensions(files.extensions) },
  };
}

function section(obj: Record<string, unknown>, key: string): Record<string, unknown> {
  const v = obj[key];
  return isObject(v) ? v : {};
}

function nonEmptyString(v: unknown): string | undefined {
  if (typeof v !== "string") return undefined;
  const t = v.trim();
  return t ? t : undefined;
}

function normalizeOperators(v: unknown, log: Logger): string {
  if (typeof v !== "string") return DEFAULT_CONFIG.lexer.operators;

  const kept = new Set<string>();
  for (const c of Array.from(v)) {
    if (!canBeOperator(c)) {
      log.warn(`'${c}' cannot be an operator; ignored`);
      continue;
    }
    kept.add(c);
  }
  return [...kept].join("");
}

function normalizeExtensions(v: unknown): string[] {
  const list: unknown[] = Array.isArray(v) ? v : DEFAULT_CONFIG.files.extensions;
  const set = new Set<string>();
  for (const item of list) {
    const ext = nonEmptyString(item);
    if (ext) set.add(ext.startsWith(".") ? ext : `.${ext}`);
  }
  return set.size > 0 ? [...set] : [...DEFAULT_CONFIG.files.extensions];
}
