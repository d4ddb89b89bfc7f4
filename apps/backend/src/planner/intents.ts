import path from "node:path";
import {
  ensureFolderAction,
  moveAction,
  openAppAction,
  openPathAction,
  playMusicAction,
  renameAction,
  type Action,
} from "@deskpilot/shared";
import type { PlannerConfig } from "../config/rules.js";
import { resolveAppName } from "./appAliases.js";
import { stripQuotes, type LocationResolver } from "./locations.js";
import { planOrganizeDesktop } from "./organize.js";

export type IntentName = "open_path" | "move_file" | "play_music" | "open_app" | "organize_desktop";

export type IntentCaptures = Record<string, string | undefined>;

export interface PlanningContext {
  config: PlannerConfig;
  locations: LocationResolver;
}

export interface IntentFamily {
  name: IntentName;
  match(text: string): IntentCaptures | null;
  build(captures: IntentCaptures, context: PlanningContext): Promise<Action[]>;
}

const OPEN_PATH_PATTERN = /^(?:打开路径|打开文件夹|打开目录)\s*(?<path>.+?)\s*$/;
const MOVE_PATTERN =
  /^(?:把|将)\s*(?<file>.+?)\s*(?:放到|放入|放进|移动到|移到|移动至|移至)\s*(?<folder>.+?)(?:\s*(?:并)?(?:重命名为|重命名成|改名为|改名成)\s*(?<newname>.+))?\s*$/;
const PLAY_MUSIC_PATTERN = /^(?:打开)?音乐.*(?:自动播放|播放).*$/;
const OPEN_APP_PATTERN = /^(?:打开软件|打开应用|打开)\s*(?<app>.+?)\s*$/;

const ORGANIZE_PHRASES = [
  "整理桌面",
  "整理一下桌面",
  "整理桌面文件",
  "整理桌面并分类",
  "整理桌面文件并分类",
  "分类桌面",
  "分类桌面文件",
];

function captureGroups(pattern: RegExp, text: string): IntentCaptures | null {
  const match = pattern.exec(text);
  if (!match) return null;
  return { ...match.groups };
}

function requireCapture(captures: IntentCaptures, key: string): string {
  const value = captures[key];
  if (value === undefined) {
    throw new Error(`Intent capture "${key}" is missing.`);
  }
  return value;
}

/** Evaluated in order; the first family whose matcher accepts the text wins. */
export const INTENT_FAMILIES: readonly IntentFamily[] = [
  {
    name: "open_path",
    match: (text) => captureGroups(OPEN_PATH_PATTERN, text),
    build: async (captures) => [openPathAction(requireCapture(captures, "path").trim())],
  },
  {
    name: "move_file",
    match: (text) => captureGroups(MOVE_PATTERN, text),
    build: async (captures, { locations }) => {
      const folder = await locations.resolveInputFolder(stripQuotes(requireCapture(captures, "folder")));
      const src = await locations.resolveInputFile(stripQuotes(requireCapture(captures, "file")));
      const actions: Action[] = [ensureFolderAction(folder), moveAction(src, folder)];

      const newName = captures.newname?.trim();
      if (newName) {
        // The rename runs after the move, so it targets the file inside the destination.
        const movedPath = path.join(locations.expand(folder), path.basename(src));
        actions.push(renameAction(movedPath, newName));
      }
      return actions;
    },
  },
  {
    name: "play_music",
    match: (text) => (PLAY_MUSIC_PATTERN.test(text) ? {} : null),
    build: async () => [playMusicAction()],
  },
  {
    name: "open_app",
    match: (text) => (text.startsWith("打开路径") ? null : captureGroups(OPEN_APP_PATTERN, text)),
    build: async (captures) => [openAppAction(resolveAppName(requireCapture(captures, "app")))],
  },
  {
    name: "organize_desktop",
    match: (text) => (ORGANIZE_PHRASES.some((phrase) => text.includes(phrase)) ? {} : null),
    build: async (_captures, { config, locations }) => planOrganizeDesktop(locations, config),
  },
];

export function matchIntent(text: string): { family: IntentFamily; captures: IntentCaptures } | null {
  for (const family of INTENT_FAMILIES) {
    const captures = family.match(text);
    if (captures) return { family, captures };
  }
  return null;
}
