import {
  serializeAction,
  type Action,
  type ActionWire,
  type AssistantResultContract,
  type ChatMessage,
  type ExecuteResultContract,
  type PreviewResult,
} from "@deskpilot/shared";
import type { PlannerConfig } from "../config/rules.js";
import type { Executor } from "../executor/executor.js";
import type { Planner, PlanResult } from "../planner/planner.js";
import type { LlmProvider } from "../providers/llm.js";
import { introFor, sanitizeReply } from "./sanitize.js";

const REPLY_TEMPERATURE = 0.85;

export interface AssistantDependencies {
  planner: Planner;
  executor: Executor;
  llm: LlmProvider;
  loadConfig(): PlannerConfig;
}

export interface AssistantInput {
  text: string;
  history: ChatMessage[];
  assistantName: string | null;
}

export type AssistantResult = AssistantResultContract;

export function personaPrompt(assistantName: string | null): string {
  const name = assistantName ?? "桌面助手";
  return [
    `你是本地桌面助手，名字叫「${name}」。`,
    "风格：温暖、真诚、富有共情，语言生动但保持简短。",
    "允许2到3句短句，不要任何表情符号，不要换行，不要项目符号。",
    "若执行成功，先确认再一句轻量关怀或追问；若未执行，先共情再给出原因与下一步建议。",
    `若这是首次回复，请自然包含“${introFor(name)}”。`,
  ].join("");
}

interface ToolSummary {
  input: string;
  plan_ok: boolean;
  plan_error: string | null;
  actions: ActionWire[];
  preview: PreviewResult | Record<string, never>;
  execute: ExecuteResultContract | Record<string, never>;
  executed: boolean;
}

function buildMessages(input: AssistantInput, summary: ToolSummary): ChatMessage[] {
  return [
    { role: "system", content: personaPrompt(input.assistantName) },
    ...input.history,
    { role: "user", content: input.text },
    { role: "system", content: JSON.stringify(summary) },
  ];
}

/**
 * Plans the request, runs it straight away when nothing needs confirmation and asks the LLM
 * to describe the outcome. `input.text` must already be non-empty.
 */
export async function runAssistant(
  deps: AssistantDependencies,
  input: AssistantInput,
): Promise<AssistantResult> {
  const text = input.text.trim();
  const plan: PlanResult = await deps.planner.plan(text, deps.loadConfig());

  let actions: Action[] = [];
  let preview: PreviewResult | Record<string, never> = {};
  let execute: ExecuteResultContract | Record<string, never> = {};
  let executed = false;

  if (plan.ok) {
    actions = plan.actions;
    const checked = await deps.executor.preview(actions);
    preview = checked;
    if (!checked.requires_confirm) {
      const result = await deps.executor.execute(actions, true);
      execute = result;
      executed = result.ok;
    }
  }

  const wireActions = actions.map((action) => serializeAction(action));
  const summary: ToolSummary = {
    input: text,
    plan_ok: plan.ok,
    plan_error: plan.ok ? null : plan.error,
    actions: wireActions,
    preview,
    execute,
    executed,
  };

  const raw = await deps.llm.chat(buildMessages({ ...input, text }, summary), {
    temperature: REPLY_TEMPERATURE,
  });

  let reply = sanitizeReply(raw, input.assistantName);
  const isFirstReply = !input.history.some((message) => message.role === "assistant");
  if (isFirstReply && input.assistantName) {
    const intro = introFor(input.assistantName);
    if (!reply.includes(intro)) {
      reply = sanitizeReply(`你好，${intro}。${reply}`, input.assistantName);
    }
  }

  return {
    ok: true,
    reply,
    actions: wireActions,
    preview,
    execute,
    executed,
  };
}
