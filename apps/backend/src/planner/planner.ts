import os from "node:os";
import type { Action } from "@deskpilot/shared";
import type { PlannerConfig } from "../config/rules.js";
import { matchIntent, type IntentName } from "./intents.js";
import { LocationResolver } from "./locations.js";

export const EMPTY_INPUT_ERROR = "请输入指令";
export const HELP_MESSAGE =
  "无法解析指令。可试试：整理桌面文件并分类 / 把 XXX 移动到 YYY 并重命名为 ZZZ / 打开软件 AppName / 打开路径 /path";

export type PlanResult =
  | { ok: true; intent: IntentName; actions: Action[] }
  | { ok: false; error: string };

export interface PlannerOptions {
  homeDir?: string;
}

export class Planner {
  private readonly locations: LocationResolver;

  constructor(options: PlannerOptions = {}) {
    this.locations = new LocationResolver(options.homeDir ?? os.homedir());
  }

  get homeDir(): string {
    return this.locations.homeDir;
  }

  /** `config` is loaded by the caller for every request. */
  async plan(text: string, config: PlannerConfig): Promise<PlanResult> {
    const trimmed = text.trim();
    if (!trimmed) {
      return { ok: false, error: EMPTY_INPUT_ERROR };
    }

    const matched = matchIntent(trimmed);
    if (!matched) {
      return { ok: false, error: HELP_MESSAGE };
    }

    const actions = await matched.family.build(matched.captures, {
      config,
      locations: this.locations,
    });
    return { ok: true, intent: matched.family.name, actions };
  }
}
