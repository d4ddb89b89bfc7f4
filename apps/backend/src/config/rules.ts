import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "../errors.js";

export const DEFAULT_ALLOWED_ROOTS = ["~/Desktop", "~/Documents", "~/Downloads"];

const KeywordRuleSchema = z.object({
  keywords: z.array(z.string()).default([]),
  dst_dir: z.string().min(1),
});

const RulesDocumentSchema = z.object({
  allowed_roots: z.array(z.string().min(1)).default(DEFAULT_ALLOWED_ROOTS),
  keyword_rules: z.array(KeywordRuleSchema).default([]),
  extension_rules: z.record(z.string(), z.string().min(1)).default({}),
  skip_hidden: z.boolean().default(true),
  skip_directories: z.boolean().default(true),
  batch_risk_threshold: z.number().int().nonnegative().default(20),
});

export interface KeywordRule {
  keywords: string[];
  dstDir: string;
}

export interface PlannerConfig {
  allowedRoots: string[];
  keywordRules: KeywordRule[];
  extensionRules: Record<string, string>;
  skipHidden: boolean;
  skipDirectories: boolean;
  batchRiskThreshold: number;
}

export type RulesDocument = z.input<typeof RulesDocumentSchema>;

function normalizeExtensionKey(extension: string): string {
  return extension.trim().replace(/^\./, "").toLowerCase();
}

export function parseRulesDocument(raw: unknown, sourcePath = "<inline>"): PlannerConfig {
  const result = RulesDocumentSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError("规则文件格式不正确", sourcePath, issues);
  }

  const document = result.data;
  const extensionRules: Record<string, string> = {};
  for (const [extension, dstDir] of Object.entries(document.extension_rules)) {
    extensionRules[normalizeExtensionKey(extension)] = dstDir;
  }

  return {
    allowedRoots: [...new Set(document.allowed_roots)],
    keywordRules: document.keyword_rules.map((rule) => ({
      keywords: rule.keywords,
      dstDir: rule.dst_dir,
    })),
    extensionRules,
    skipHidden: document.skip_hidden,
    skipDirectories: document.skip_directories,
    batchRiskThreshold: document.batch_risk_threshold,
  };
}

/** Reads and validates the rules document. Called once per planning request. */
export function loadPlannerConfig(rulesPath: string): PlannerConfig {
  const resolvedPath = path.resolve(rulesPath);

  let text: string;
  try {
    text = fs.readFileSync(resolvedPath, "utf8");
  } catch (error) {
    throw new ConfigurationError("无法读取规则文件", resolvedPath, errorMessage(error));
  }

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    throw new ConfigurationError("规则文件不是有效的 YAML", resolvedPath, errorMessage(error));
  }

  return parseRulesDocument(raw, resolvedPath);
}
