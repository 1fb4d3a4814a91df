// src/language/configuration.ts
//
// Lox Project Configuration Resolver
// ----------------------------------
// Reads lox.config.json from the project root and resolves it against the defaults.
//
// - project root detection (lox.config.json, a .lox marker folder, or a git root)
// - field-by-field validation: a value of the wrong type keeps its default
// - LOX_LOG_LEVEL overrides "logLevel"
//
// Exports:
//   - LoxConfig (type)
//   - DEFAULT_CONFIG
//   - loadLoxConfig(filePath, options?): Promise<ResolvedLoxConfig>
//   - resolveConfig(raw, env?)
//   - findLoxProjectRoot(startDir): Promise<string | null>

import * as fs from "fs";
import * as path from "path";

import { parseLogLevel, type LogLevel } from "../utils/logger";
import { normalizeExtension } from "../utils/paths";

export const CONFIG_FILE_NAME = "lox.config.json";
export const LOG_LEVEL_ENV = "LOX_LOG_LEVEL";

export type LoxConfig = {
  // Name shown in logs
  name: string;
  logLevel: LogLevel;

  repl: {
    prompt: string;
  };

  // Dumps printed before evaluation
  debug: {
    printTokens: boolean;
    printAst: boolean;
  };

  diagnostics: {
    enabled: boolean;
    // Cap on diagnostics published per document
    maxProblems: number;
    // Warn when tokens follow a complete expression
    warnTrailingTokens: boolean;
  };

  hover: {
    evaluate: boolean;
  };

  files: {
    extensions: string[];
  };
};

export type ResolvedLoxConfig = LoxConfig & {
  projectRoot: string | null;
  configPath: string | null;
};

export type LoadConfigOptions = {
  env?: NodeJS.ProcessEnv;
};

export const DEFAULT_CONFIG: Readonly<LoxConfig> = Object.freeze({
  name: "Lox Project",
  logLevel: "warn",
  repl: { prompt: "> " },
  debug: { printTokens: false, printAst: false },
  diagnostics: { enabled: true, maxProblems: 100, warnTrailingTokens: true },
  hover: { evaluate: true },
  files: { extensions: [".lox"] },
});

/* =========================================================
   Public API
   ========================================================= */

export async function loadLoxConfig(filePath: string, options: LoadConfigOptions = {}): Promise<ResolvedLoxConfig> {
  const startDir = (await isDirectory(filePath)) ? filePath : path.dirname(filePath);

  const projectRoot = await findLoxProjectRoot(startDir);
  const configPath = projectRoot ? await findConfigFile(projectRoot) : null;

  const raw = configPath ? await safeReadJson(configPath) : null;

  return {
    ...resolveConfig(raw, options.env ?? process.env),
    projectRoot,
    configPath,
  };
}

/** Resolve parsed JSON (or nothing) against DEFAULT_CONFIG. */
export function resolveConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): LoxConfig {
  const root = isObject(raw) ? raw : {};
  const d = DEFAULT_CONFIG;

  const repl = section(root, "repl");
  const debug = section(root, "debug");
  const diagnostics = section(root, "diagnostics");
  const hover = section(root, "hover");
  const files = section(root, "files");

  const fileLevel = typeof root.logLevel === "string" ? parseLogLevel(root.logLevel) : null;
  const envLevel = parseLogLevel(env[LOG_LEVEL_ENV]);

  const extensions = uniqueStrings(readStringArray(files, "extensions", d.files.extensions).map(normalizeExtension));

  return {
    name: readString(root, "name", d.name),
    logLevel: envLevel ?? fileLevel ?? d.logLevel,
    repl: {
      prompt: readString(repl, "prompt", d.repl.prompt),
    },
    debug: {
      printTokens: readBoolean(debug, "printTokens", d.debug.printTokens),
      printAst: readBoolean(debug, "printAst", d.debug.printAst),
    },
    diagnostics: {
      enabled: readBoolean(diagnostics, "enabled", d.diagnostics.enabled),
      maxProblems: readCount(diagnostics, "maxProblems", d.diagnostics.maxProblems),
      warnTrailingTokens: readBoolean(diagnostics, "warnTrailingTokens", d.diagnostics.warnTrailingTokens),
    },
    hover: {
      evaluate: readBoolean(hover, "evaluate", d.hover.evaluate),
    },
    files: {
      extensions: extensions.length > 0 ? extensions : [...d.files.extensions],
    },
  };
}

export async function findLoxProjectRoot(startDir: string): Promise<string | null> {
  let dir = path.resolve(startDir);

  // Stop at filesystem root
  for (let i = 0; i < 60; i++) {
    if (await exists(path.join(dir, CONFIG_FILE_NAME))) return dir;
    if (await exists(path.join(dir, ".lox"))) return dir; // marker folder
    if (await exists(path.join(dir, ".git"))) return dir; // git root fallback

    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  return null;
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
    return (await fs.promises.lstat(p)).isDirectory();
  } catch {
    return false;
  }
}

/* =========================================================
   JSON utilities
   ========================================================= */

// Unreadable or malformed config resolves to the defaults.
async function safeReadJson(p: string): Promise<unknown> {
  try {
    const text = await fs.promises.readFile(p, "utf8");
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return null;
  }
}

/* =========================================================
   Field readers
   ========================================================= */

type JsonObject = Record<string, unknown>;

function isObject(x: unknown): x is JsonObject {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function section(obj: JsonObject, key: string): JsonObject {
  const v = obj[key];
  return isObject(v) ? v : {};
}

function readString(obj: JsonObject, key: string, fallback: string): string {
  const v = obj[key];
  return typeof v === "string" ? v : fallback;
}

function readBoolean(obj: JsonObject, key: string, fallback: boolean): boolean {
  const v = obj[key];
  return typeof v === "boolean" ? v : fallback;
}

function readCount(obj: JsonObject, key: string, fallback: number): number {
  const v = obj[key];
  return typeof v === "number" && Number.isInteger(v) && v >= 0 ? v : fallback;
}

function readStringArray(obj: JsonObject, key: string, fallback: readonly string[]): string[] {
  const v = obj[key];
  if (!Array.isArray(v)) return [...fallback];
  return v.filter((s): s is string => typeof s === "string");
}

function uniqueStrings(list: readonly string[]): string[] {
  const set = new Set<string>();
  for (const s of list) {
    const t = s.trim();
    if (t) set.add(t);
  }
  return [...set.values()];
}
