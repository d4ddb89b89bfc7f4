import os from "node:os";
import path from "node:path";
import { cp, mkdir, rename, rm } from "node:fs/promises";
import {
  describeAction,
  escalateRisk,
  serializeAction,
  type ActionOutcomeContract,
  type ExecutableAction,
  type ExecuteResultContract,
  type MoveAction,
  type PreviewEntry,
  type PreviewResult,
  type RenameAction,
} from "@deskpilot/shared";
import { GuardViolationError, errorMessage, isPermissionError } from "../errors.js";
import {
  canonicalize,
  expandUser,
  extensionOf,
  isDirectory,
  isUnderAnyRoot,
  pathExists,
  safeJoinDir,
} from "../guard/paths.js";
import { logWarn } from "../logs.js";
import { createSystemLauncher, type ProcessOutcome, type SystemLauncher } from "./launcher.js";

export const CONFIRM_REQUIRED_ERROR = "存在高风险操作，需要确认后才能执行";

export const RISK_REASONS = {
  moveOverwrite: "目标已存在，可能覆盖同名文件",
  renameOverwrite: "重命名目标已存在，可能覆盖同名文件",
  extensionChange: "改变了文件扩展名，属于高风险操作",
  notAFolder: "同名路径存在但不是文件夹",
} as const;

const PERMISSION_HINT =
  "请在 macOS 系统设置 > 隐私与安全性 中为运行本服务的终端/应用授权“文件与文件夹”或“完全磁盘访问”。";

export type ActionOutcome = ActionOutcomeContract;
export type ExecuteResult = ExecuteResultContract;

export interface ExecutorOptions {
  allowedRoots: string[];
  homeDir?: string;
  launcher?: SystemLauncher;
}

interface MoveLocation {
  src: string;
  dstDir: string;
  dst: string;
}

interface RenameLocation {
  source: string;
  dst: string;
}

export function describeFailure(error: unknown): string {
  if (error instanceof GuardViolationError) {
    return `安全拦截：${error.message}`;
  }
  if (isPermissionError(error)) {
    return `权限不足，无法访问路径：${errorMessage(error)}. ${PERMISSION_HINT}`;
  }
  return errorMessage(error);
}

function withDiagnostics(message: string, outcome: ProcessOutcome): string {
  const diagnostics = outcome.output.trim();
  return diagnostics ? `${message}\n${diagnostics}` : message;
}

async function movePath(src: string, dst: string): Promise<void> {
  try {
    await rename(src, dst);
  } catch (error) {
    if (!(error instanceof Error) || !("code" in error) || error.code !== "EXDEV") throw error;
    await cp(src, dst, { recursive: true, errorOnExist: false, force: true });
    await rm(src, { recursive: true, force: true });
  }
}

/**
 * Validates planned actions against the allowed roots, previews their effect and, once
 * confirmed, applies them one by one.
 */
export class Executor {
  readonly allowedRoots: string[];
  private readonly homeDir: string;
  private readonly launcher: SystemLauncher;

  constructor(options: ExecutorOptions) {
    this.homeDir = options.homeDir ?? os.homedir();
    this.allowedRoots = options.allowedRoots.map((root) => canonicalize(expandUser(root, this.homeDir)));
    this.launcher = options.launcher ?? createSystemLauncher();
  }

  isAllowed(target: string): boolean {
    return isUnderAnyRoot(target, this.allowedRoots);
  }

  private guarded(target: string): string {
    const expanded = expandUser(target, this.homeDir);
    if (!this.isAllowed(expanded)) {
      throw new GuardViolationError(expanded);
    }
    return expanded;
  }

  private locateMove(action: MoveAction): MoveLocation {
    const src = this.guarded(action.src);
    const dstDir = this.guarded(action.dst_dir);
    const dst = this.guarded(safeJoinDir(dstDir, path.basename(src)));
    return { src, dstDir, dst };
  }

  private locateRename(action: RenameAction): RenameLocation {
    const source = this.guarded(action.path);
    const dst = this.guarded(safeJoinDir(path.dirname(source), action.new_name));
    return { source, dst };
  }

  private async previewAction(action: ExecutableAction): Promise<PreviewEntry> {
    switch (action.type) {
      case "ensure_folder": {
        const folder = this.guarded(action.path);
        const clash = (await pathExists(folder)) && !(await isDirectory(folder));
        const checked = clash ? escalateRisk(action, "high", RISK_REASONS.notAFolder) : action;
        return { ...serializeAction(checked), computed_path: folder };
      }
      case "move": {
        const { dst } = this.locateMove(action);
        const checked = (await pathExists(dst)) ? escalateRisk(action, "high", RISK_REASONS.moveOverwrite) : action;
        return { ...serializeAction(checked), computed_dst: dst };
      }
      case "rename": {
        const { source, dst } = this.locateRename(action);
        let checked = action;
        if (await pathExists(dst)) {
          checked = escalateRisk(checked, "high", RISK_REASONS.renameOverwrite);
        }
        const fromExtension = extensionOf(source);
        const toExtension = extensionOf(dst);
        if (fromExtension && toExtension && fromExtension !== toExtension) {
          checked = escalateRisk(checked, "high", RISK_REASONS.extensionChange);
        }
        return { ...serializeAction(checked), computed_dst: dst };
      }
      case "open_path": {
        this.guarded(action.path);
        return serializeAction(action);
      }
      case "open_app":
      case "play_music":
      case "unsupported":
        return serializeAction(action);
    }
  }

  /** Read-only. Throws GuardViolationError when any action leaves the allowed roots. */
  async preview(actions: ExecutableAction[]): Promise<PreviewResult> {
    const entries: PreviewEntry[] = [];
    for (const action of actions) {
      entries.push(await this.previewAction(action));
    }
    return {
      actions: entries,
      requires_confirm: entries.some((entry) => entry.risk === "high"),
    };
  }

  private async applyAction(action: ExecutableAction): Promise<ActionOutcome> {
    const wire = serializeAction(action);

    switch (action.type) {
      case "ensure_folder": {
        await mkdir(this.guarded(action.path), { recursive: true });
        return { action: wire, ok: true };
      }
      case "move": {
        const { src, dstDir, dst } = this.locateMove(action);
        await mkdir(dstDir, { recursive: true });
        await movePath(src, dst);
        return { action: wire, ok: true, moved_to: dst };
      }
      case "rename": {
        const { source, dst } = this.locateRename(action);
        await rename(source, dst);
        return { action: wire, ok: true, renamed_to: dst };
      }
      case "open_app": {
        const outcome = await this.launcher.openApplication(action.name);
        if (outcome.exitCode === 0) return { action: wire, ok: true };
        return { action: wire, ok: false, error: withDiagnostics(`打开应用失败：${action.name}`, outcome) };
      }
      case "play_music": {
        const outcome = await this.launcher.playMusic();
        if (outcome.exitCode === 0) return { action: wire, ok: true };
        return { action: wire, ok: false, error: withDiagnostics("播放失败", outcome) };
      }
      case "open_path": {
        this.launcher.revealPath(this.guarded(action.path));
        return { action: wire, ok: true };
      }
      case "unsupported":
        return { action: wire, ok: false, error: `未知动作类型：${action.requestedType}` };
    }
  }

  private async executeAction(action: ExecutableAction): Promise<ActionOutcome> {
    try {
      const outcome = await this.applyAction(action);
      if (!outcome.ok) {
        logWarn("action_failed", { type: describeAction(action), error: outcome.error });
      }
      return outcome;
    } catch (error) {
      const message = describeFailure(error);
      logWarn("action_failed", { type: describeAction(action), error: message });
      return { action: serializeAction(action), ok: false, error: message };
    }
  }

  /**
   * Previews first; a batch that needs confirmation is returned untouched unless `confirm` is
   * set. Each action's failure is recorded without stopping the rest.
   */
  async execute(actions: ExecutableAction[], confirm = false): Promise<ExecuteResult> {
    const preview = await this.preview(actions);
    if (preview.requires_confirm && !confirm) {
      return { ok: false, error: CONFIRM_REQUIRED_ERROR, results: [], preview };
    }

    const results: ActionOutcome[] = [];
    for (const action of actions) {
      results.push(await this.executeAction(action));
    }
    return {
      ok: results.every((result) => result.ok),
      results,
      preview,
    };
  }
}
