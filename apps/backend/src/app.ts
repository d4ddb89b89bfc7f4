import express from "express";
import type { Response } from "express";
import cors from "cors";
import { randomUUID } from "node:crypto";
import { ZodError } from "zod";
import {
  AssistantRequestSchema,
  ExecuteRequestSchema,
  PlanRequestSchema,
  TtsRequestSchema,
  decodeActions,
  serializeAction,
  type ApiErrorEnvelope,
  type PlanResultContract,
} from "@deskpilot/shared";
import { runAssistant } from "./assistant/assistant.js";
import { loadPlannerConfig, type PlannerConfig } from "./config/rules.js";
import { ConfigurationError, GuardViolationError, errorMessage } from "./errors.js";
import { CONFIRM_REQUIRED_ERROR, type Executor } from "./executor/executor.js";
import { logError, logInfo, logWarn } from "./logs.js";
import { EMPTY_INPUT_ERROR, type Planner } from "./planner/planner.js";
import { LlmProviderError, type LlmProvider } from "./providers/llm.js";
import { TtsProviderError, type TtsProvider } from "./providers/tts.js";

export const EMPTY_TTS_TEXT_ERROR = "请输入文本";

export interface AppDependencies {
  planner: Planner;
  executor: Executor;
  llm: LlmProvider;
  tts: TtsProvider;
  rulesPath: string;
}

export function sendError(
  res: Response,
  status: number,
  code: string,
  message: string,
  requestId: string,
  details?: unknown,
) {
  const body: ApiErrorEnvelope = {
    error: {
      code,
      message,
      requestId,
      ...(details === undefined ? {} : { details }),
    },
  };
  res.status(status).json(body);
}

function sendFailure(
  res: Response,
  error: unknown,
  requestId: string,
  fallback: { code: string; message: string },
) {
  if (error instanceof ZodError) {
    sendError(res, 400, "INVALID_REQUEST", "Request body is invalid.", requestId, error.issues);
    return;
  }
  if (error instanceof GuardViolationError) {
    sendError(res, 403, "GUARD_VIOLATION", error.message, requestId, { path: error.targetPath });
    return;
  }
  if (error instanceof ConfigurationError) {
    logError("rules_load_failed", { request_id: requestId, path: error.sourcePath, error: error.message });
    sendError(res, 500, "RULES_LOAD_FAILED", error.message, requestId, {
      path: error.sourcePath,
      cause: error.causeText,
    });
    return;
  }
  if (error instanceof LlmProviderError) {
    logError("llm_failed", { request_id: requestId, error: error.message });
    sendError(res, 502, "LLM_REQUEST_FAILED", error.message, requestId, error.causeText);
    return;
  }
  if (error instanceof TtsProviderError) {
    logError("tts_failed", { request_id: requestId, error: error.message });
    sendError(res, 502, "TTS_REQUEST_FAILED", error.message, requestId, error.causeText);
    return;
  }

  logError("request_failed", { request_id: requestId, code: fallback.code, error: errorMessage(error) });
  sendError(res, 500, fallback.code, fallback.message, requestId, errorMessage(error));
}

export function createApp(deps: AppDependencies) {
  const { planner, executor, llm, tts, rulesPath } = deps;

  const loadConfig = (): PlannerConfig => {
    const config = loadPlannerConfig(rulesPath);
    logInfo("rules_loaded", { path: rulesPath, roots: config.allowedRoots.length });
    return config;
  };

  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.get("/", (_req, res) => {
    res.json({
      ok: true,
      service: "deskpilot-backend",
      message: "Backend is running. POST /api/plan to plan a command.",
    });
  });

  app.get("/api/rules", (_req, res) => {
    const requestId = randomUUID();
    try {
      const config = loadConfig();
      res.json({ rules_path: rulesPath, allowed_roots: config.allowedRoots });
    } catch (error) {
      sendFailure(res, error, requestId, { code: "RULES_READ_FAILED", message: "Could not read rules." });
    }
  });

  app.post("/api/plan", async (req, res) => {
    const requestId = randomUUID();
    try {
      const { text } = PlanRequestSchema.parse(req.body);
      const config = loadConfig();
      const result = await planner.plan(text, config);

      if (!result.ok) {
        logInfo("plan_rejected", { request_id: requestId, error: result.error });
        const body: PlanResultContract = { ok: false, error: result.error };
        res.status(400).json(body);
        return;
      }

      logInfo("plan_completed", {
        request_id: requestId,
        intent: result.intent,
        actions: result.actions.length,
      });
      const body: PlanResultContract = {
        ok: true,
        actions: result.actions.map((action) => serializeAction(action)),
        allowed_roots: config.allowedRoots,
      };
      res.json(body);
    } catch (error) {
      sendFailure(res, error, requestId, { code: "PLAN_FAILED", message: "Could not plan command." });
    }
  });

  app.post("/api/preview", async (req, res) => {
    const requestId = randomUUID();
    try {
      const { actions } = ExecuteRequestSchema.parse(req.body);
      const preview = await executor.preview(decodeActions(actions));
      logInfo("preview_completed", {
        request_id: requestId,
        actions: preview.actions.length,
        requires_confirm: preview.requires_confirm,
      });
      res.json(preview);
    } catch (error) {
      sendFailure(res, error, requestId, { code: "PREVIEW_FAILED", message: "Could not preview actions." });
    }
  });

  app.post("/api/execute", async (req, res) => {
    const requestId = randomUUID();
    try {
      const { actions, confirm } = ExecuteRequestSchema.parse(req.body);
      const result = await executor.execute(decodeActions(actions), confirm);

      if (result.error === CONFIRM_REQUIRED_ERROR) {
        logWarn("execute_gated", { request_id: requestId, actions: actions.length });
      } else {
        logInfo("execute_completed", {
          request_id: requestId,
          ok: result.ok,
          succeeded: result.results.filter((outcome) => outcome.ok).length,
          failed: result.results.filter((outcome) => !outcome.ok).length,
        });
      }
      res.json(result);
    } catch (error) {
      sendFailure(res, error, requestId, { code: "EXECUTE_FAILED", message: "Could not execute actions." });
    }
  });

  app.post("/api/assistant", async (req, res) => {
    const requestId = randomUUID();
    try {
      const payload = AssistantRequestSchema.parse(req.body);
      if (!payload.text.trim()) {
        res.status(400).json({ ok: false, error: EMPTY_INPUT_ERROR });
        return;
      }

      const result = await runAssistant(
        { planner, executor, llm, loadConfig },
        { text: payload.text, history: payload.history, assistantName: payload.assistant_name },
      );
      logInfo("assistant_replied", {
        request_id: requestId,
        provider: llm.name,
        actions: result.actions.length,
        executed: result.executed,
      });
      res.json(result);
    } catch (error) {
      sendFailure(res, error, requestId, { code: "ASSISTANT_FAILED", message: "Assistant request failed." });
    }
  });

  app.post("/api/tts", async (req, res) => {
    const requestId = randomUUID();
    try {
      const payload = TtsRequestSchema.parse(req.body);
      const text = payload.text.trim();
      if (!text) {
        res.status(400).json({ ok: false, error: EMPTY_TTS_TEXT_ERROR });
        return;
      }

      const { audio, format } = await tts.synthesize(text, payload.voice_type ?? undefined);
      logInfo("tts_synthesized", { request_id: requestId, provider: tts.name, bytes: audio.length });
      res.json({ ok: true, audio_base64: audio.toString("base64"), format });
    } catch (error) {
      sendFailure(res, error, requestId, { code: "TTS_FAILED", message: "Speech synthesis failed." });
    }
  });

  return app;
}
