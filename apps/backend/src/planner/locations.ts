import path from "node:path";
import { readdir } from "node:fs/promises";
import { expandUser, isDirectory, pathExists, stemOf } from "../guard/paths.js";

export const DESKTOP = "~/Desktop";
export const DOCUMENTS = "~/Documents";
export const DOWNLOADS = "~/Downloads";

/** Search order for bare folder names. */
const DEFAULT_ROOTS = [DESKTOP, DOCUMENTS, DOWNLOADS] as const;

const LOCATION_WORDS: Record<string, string> = {
  桌面: DESKTOP,
  文稿: DOCUMENTS,
  文档: DOCUMENTS,
  下载: DOWNLOADS,
  下载目录: DOWNLOADS,
  下载文件夹: DOWNLOADS,
};

const LOCATION_PREFIX_PATTERN =
  /^(?<loc>下载文件夹|下载目录|下载|桌面|文稿|文档)(?:下面的|上面的|下的|里的|中的|上的|上面|下面|上|下|里|中)?\s*(?<name>.*)$/;

const FOLDER_SUFFIX_PATTERN = /(?:文件夹)?(?:下面|下|里|中)?$/;

export interface LocationPrefix {
  baseDir: string | null;
  name: string;
}

function looksLikePath(token: string): boolean {
  return token.includes("/") || token.startsWith("~");
}

export function stripQuotes(token: string): string {
  return token.trim().replace(/^["'“”‘’]+|["'“”‘’]+$/g, "").trim();
}

/** Drops a trailing "文件夹" and locative particle: "工作文件夹里" -> "工作". */
export function normalizeFolderText(text: string): string {
  return text.trim().replace(FOLDER_SUFFIX_PATTERN, "").trim();
}

export function splitLocationPrefix(text: string): LocationPrefix {
  const match = LOCATION_PREFIX_PATTERN.exec(text.trim());
  const loc = match?.groups?.loc;
  if (!match || !loc) {
    return { baseDir: null, name: text };
  }
  return {
    baseDir: LOCATION_WORDS[loc] ?? null,
    name: (match.groups?.name ?? "").trim(),
  };
}

/**
 * Turns the loose file and folder phrases of a command into paths under the user's home
 * directory.
 */
export class LocationResolver {
  readonly homeDir: string;

  constructor(homeDir: string) {
    this.homeDir = homeDir;
  }

  expand(target: string): string {
    return expandUser(target, this.homeDir);
  }

  async resolveInputFile(token: string): Promise<string> {
    if (looksLikePath(token)) {
      return this.expand(token);
    }
    const { baseDir, name } = splitLocationPrefix(token);
    if (baseDir) {
      return this.resolveExistingFile(this.expand(baseDir), name);
    }
    return this.resolveExistingFile(this.expand(DESKTOP), token);
  }

  /** Folder phrases given as paths are passed through untouched and expanded at execution. */
  async resolveInputFolder(token: string): Promise<string> {
    if (looksLikePath(token)) {
      return token;
    }
    const folder = normalizeFolderText(token);
    const { baseDir, name } = splitLocationPrefix(folder);
    if (baseDir) {
      return name ? path.resolve(this.expand(baseDir), name) : this.expand(baseDir);
    }

    const existing = await this.resolveExistingFolder(folder);
    if (existing) return existing;

    return path.resolve(this.expand(DOCUMENTS), folder);
  }

  /**
   * Exact name first, then a unique same-stem entry. Anything else returns the literal
   * candidate so the missing file is reported when the move runs.
   */
  async resolveExistingFile(baseDir: string, name: string): Promise<string> {
    const candidate = path.resolve(baseDir, name);
    if (await pathExists(candidate)) {
      return candidate;
    }
    if (!(await isDirectory(baseDir))) {
      return candidate;
    }

    const entries = await readdir(baseDir);
    const matches = entries.filter((entry) => entry === name || stemOf(entry) === name);
    if (matches.length === 1) {
      return path.resolve(baseDir, matches[0]);
    }
    return candidate;
  }

  async resolveExistingFolder(name: string): Promise<string | null> {
    for (const root of DEFAULT_ROOTS) {
      const candidate = path.resolve(this.expand(root), name);
      if (await isDirectory(candidate)) {
        return candidate;
      }
    }
    return null;
  }
}
