// src/utils/paths.ts
//
// Lox Paths Helpers
// -----------------
// Path handling shared by the CLI, the config loader and the language server.
//
// Exports:
//   - resolveUserPath()
//   - normalizeExtension()
//   - hasSourceExtension()

import * as path from "path";
import * as os from "os";

export type ResolvePathEnv = {
  cwd: string;
  homeDir?: string;
};

/**
 * Resolve a user-provided path into an absolute filesystem path.
 * Supports relative paths (from cwd), absolute paths and "~" home expansion.
 */
export function resolveUserPath(userPath: string, env: ResolvePathEnv): string {
  const p = userPath.trim();
  if (!p) return env.cwd;

  if (p === "~" || p.startsWith("~/") || p.startsWith("~\\")) {
    const home = env.homeDir ?? os.homedir();
    return path.resolve(home, p.slice(2));
  }

  if (path.isAbsolute(p)) return p;

  return path.resolve(env.cwd, p);
}

/** "lox" -> ".lox"; empty input stays empty. */
export function normalizeExtension(ext: string): string {
  const e = ext.trim().toLowerCase();
  if (!e) return "";
  return e.startsWith(".") ? e : `.${e}`;
}

export function hasSourceExtension(filePath: string, extensions: readonly string[]): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return extensions.some((e) => normalizeExtension(e) === ext);
}
