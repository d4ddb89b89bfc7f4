import os from "node:os";
import path from "node:path";
import { realpathSync } from "node:fs";
import { stat } from "node:fs/promises";

function isMissingPathError(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) return false;
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}

/** Expands a leading `~` against `homeDir` and makes the path absolute. */
export function expandUser(input: string, homeDir: string = os.homedir()): string {
  const trimmed = input.trim();
  if (trimmed === "~") return path.resolve(homeDir);
  if (trimmed.startsWith("~/") || trimmed.startsWith("~\\")) {
    return path.resolve(homeDir, trimmed.slice(2));
  }
  return path.resolve(trimmed);
}

/**
 * Absolute path with symlinks resolved for the part of it that exists on disk. The missing tail
 * is appended verbatim.
 */
export function canonicalize(target: string): string {
  const absolute = path.resolve(target);
  const missing: string[] = [];
  let current = absolute;

  for (;;) {
    try {
      return path.join(realpathSync(current), ...missing);
    } catch (error) {
      if (!isMissingPathError(error)) throw error;
      const parent = path.dirname(current);
      if (parent === current) return absolute;
      missing.unshift(path.basename(current));
      current = parent;
    }
  }
}

export function isUnderRoot(target: string, root: string): boolean {
  const relative = path.relative(root, target);
  if (relative === "") return true;
  if (relative === ".." || relative.startsWith(`..${path.sep}`)) return false;
  return !path.isAbsolute(relative);
}

export function isUnderAnyRoot(target: string, roots: Iterable<string>): boolean {
  const canonical = canonicalize(target);
  for (const root of roots) {
    if (isUnderRoot(canonical, root)) return true;
  }
  return false;
}

/** Joins a single file name onto a directory without letting it leave that directory. */
export function safeJoinDir(dirPath: string, filename: string): string {
  let name = filename.replace(/[/\\]/g, "_");
  if (name === "" || name === "." || name === "..") {
    name = "_";
  }
  return path.resolve(dirPath, name);
}

export function isHidden(target: string): boolean {
  return path.basename(target).startsWith(".");
}

/** Lowercased extension without the dot; empty for dotfiles and names without one. */
export function extensionOf(target: string): string {
  return path.extname(target).slice(1).toLowerCase();
}

export function stemOf(target: string): string {
  return path.parse(target).name;
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isDirectory();
  } catch {
    return false;
  }
}
