import path from "node:path";
import { readdir } from "node:fs/promises";
import {
  ensureFolderAction,
  escalateRisk,
  moveAction,
  type Action,
} from "@deskpilot/shared";
import type { PlannerConfig } from "../config/rules.js";
import { extensionOf, isDirectory, isHidden } from "../guard/paths.js";
import { DESKTOP, type LocationResolver } from "./locations.js";

export function batchRiskReason(threshold: number): string {
  return `批量操作较多（>${threshold} 个文件），建议确认后执行`;
}

function matchKeywordRule(filename: string, config: PlannerConfig): string | null {
  const lowered = filename.toLowerCase();
  for (const rule of config.keywordRules) {
    for (const keyword of rule.keywords) {
      if (keyword && lowered.includes(keyword.toLowerCase())) {
        return rule.dstDir;
      }
    }
  }
  return null;
}

function matchExtensionRule(filename: string, config: PlannerConfig): string | null {
  const extension = extensionOf(filename);
  if (!extension) return null;
  return config.extensionRules[extension] ?? null;
}

/** Destination directory for a file name, or null when no rule claims it. */
function classifyFile(filename: string, config: PlannerConfig): string | null {
  return matchKeywordRule(filename, config) ?? matchExtensionRule(filename, config);
}

async function listDesktopCandidates(
  locations: LocationResolver,
  config: PlannerConfig,
): Promise<string[]> {
  const desktop = locations.expand(DESKTOP);
  const names = (await readdir(desktop)).sort();
  const candidates: string[] = [];

  for (const name of names) {
    const fullPath = path.join(desktop, name);
    if (config.skipHidden && isHidden(fullPath)) continue;
    if (config.skipDirectories && (await isDirectory(fullPath))) continue;
    candidates.push(fullPath);
  }
  return candidates;
}

export async function planOrganizeDesktop(
  locations: LocationResolver,
  config: PlannerConfig,
): Promise<Action[]> {
  const actions: Action[] = [];

  for (const filePath of await listDesktopCandidates(locations, config)) {
    const dstDir = classifyFile(path.basename(filePath), config);
    if (!dstDir) continue;
    actions.push(ensureFolderAction(dstDir), moveAction(filePath, dstDir));
  }

  // Two actions per classified file.
  if (actions.length < config.batchRiskThreshold * 2) {
    return actions;
  }
  const reason = batchRiskReason(config.batchRiskThreshold);
  return actions.map((action) =>
    action.type === "move" || action.type === "rename" ? escalateRisk(action, "high", reason) : action,
  );
}
