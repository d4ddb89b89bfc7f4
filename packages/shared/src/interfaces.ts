import type { ActionWire, PreviewResult } from "./schemas.js";

export type PlanResultContract =
  | {
      ok: true;
      actions: ActionWire[];
      allowed_roots: string[];
    }
  | {
      ok: false;
      error: string;
    };

export type ActionOutcomeContract =
  | {
      action: ActionWire;
      ok: true;
      moved_to?: string;
      renamed_to?: string;
    }
  | {
      action: ActionWire;
      ok: false;
      error: string;
    };

export interface ExecuteResultContract {
  ok: boolean;
  error?: string;
  results: ActionOutcomeContract[];
  preview: PreviewResult;
}

export interface AssistantResultContract {
  ok: true;
  reply: string;
  actions: ActionWire[];
  preview: PreviewResult | Record<string, never>;
  execute: ExecuteResultContract | Record<string, never>;
  executed: boolean;
}

export interface ApiErrorEnvelope {
  error: {
    code: string;
    message: string;
    requestId: string;
    details?: unknown;
  };
}
