import os from "node:os";
import path from "node:path";
import { realpathSync } from "node:fs";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { parseRulesDocument, type PlannerConfig, type RulesDocument } from "../src/config/rules.js";
import type { ProcessOutcome, SystemLauncher } from "../src/executor/launcher.js";

export const TEST_ROOTS = ["~/Desktop", "~/Documents", "~/Downloads"];

export interface TempHome {
  home: string;
  desktop: string;
  documents: string;
  downloads: string;
  file(relativePath: string, content?: string): Promise<string>;
  cleanup(): Promise<void>;
}

/** A throwaway home directory with the three default roots; symlinks already resolved. */
export async function createTempHome(): Promise<TempHome> {
  const home = realpathSync(await mkdtemp(path.join(os.tmpdir(), "deskpilot-home-")));
  const desktop = path.join(home, "Desktop");
  const documents = path.join(home, "Documents");
  const downloads = path.join(home, "Downloads");
  await Promise.all([desktop, documents, downloads].map((dir) => mkdir(dir, { recursive: true })));

  return {
    home,
    desktop,
    documents,
    downloads,
    async file(relativePath, content = "x") {
      const target = path.join(home, relativePath);
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, content);
      return target;
    },
    cleanup: () => rm(home, { recursive: true, force: true }),
  };
}

export async function createTempDir(prefix: string): Promise<string> {
  return realpathSync(await mkdtemp(path.join(os.tmpdir(), prefix)));
}

export function testConfig(overrides: RulesDocument = {}): PlannerConfig {
  return parseRulesDocument({
    allowed_roots: TEST_ROOTS,
    keyword_rules: [{ keywords: ["发票", "invoice"], dst_dir: "~/Desktop/整理/发票" }],
    extension_rules: { pdf: "~/Desktop/整理/文档", png: "~/Desktop/整理/图片" },
    ...overrides,
  });
}

export class RecordingLauncher implements SystemLauncher {
  readonly opened: string[] = [];
  readonly revealed: string[] = [];
  musicPlays = 0;
  outcome: ProcessOutcome = { exitCode: 0, output: "" };

  async openApplication(name: string): Promise<ProcessOutcome> {
    this.opened.push(name);
    return this.outcome;
  }

  async playMusic(): Promise<ProcessOutcome> {
    this.musicPlays += 1;
    return this.outcome;
  }

  revealPath(targetPath: string): void {
    this.revealed.push(targetPath);
  }
}
