import { z } from "zod";

export const RiskLevelSchema = z.enum(["low", "medium", "high"]);

export const ActionKindSchema = z.enum([
  "ensure_folder",
  "move",
  "rename",
  "open_app",
  "open_path",
  "play_music",
]);

const riskFields = {
  risk: RiskLevelSchema.default("low"),
  reason: z.string().default(""),
};

export const EnsureFolderActionSchema = z.object({
  type: z.literal("ensure_folder"),
  path: z.string().min(1),
  ...riskFields,
});

export const MoveActionSchema = z.object({
  type: z.literal("move"),
  src: z.string().min(1),
  dst_dir: z.string().min(1),
  ...riskFields,
});

export const RenameActionSchema = z.object({
  type: z.literal("rename"),
  path: z.string().min(1),
  new_name: z.string().min(1),
  ...riskFields,
});

export const OpenAppActionSchema = z.object({
  type: z.literal("open_app"),
  name: z.string().min(1),
  ...riskFields,
});

export const OpenPathActionSchema = z.object({
  type: z.literal("open_path"),
  path: z.string().min(1),
  ...riskFields,
});

export const PlayMusicActionSchema = z.object({
  type: z.literal("play_music"),
  ...riskFields,
});

export const ActionSchema = z.discriminatedUnion("type", [
  EnsureFolderActionSchema,
  MoveActionSchema,
  RenameActionSchema,
  OpenAppActionSchema,
  OpenPathActionSchema,
  PlayMusicActionSchema,
]);

/** Any mapping carrying a string `type`; the kind is checked later. */
export const ActionWireSchema = z.looseObject({
  type: z.string().min(1),
});

/** A serialized action plus `computed_dst` / `computed_path` where the executor derived one. */
export const PreviewEntrySchema = ActionWireSchema;

export const PreviewResultSchema = z.object({
  actions: z.array(PreviewEntrySchema),
  requires_confirm: z.boolean(),
});

export const PlanRequestSchema = z.object({
  text: z.string(),
});

export const ExecuteRequestSchema = z.object({
  actions: z.array(ActionWireSchema),
  confirm: z.boolean().default(false),
});

export const ChatMessageSchema = z.object({
  role: z.enum(["system", "user", "assistant"]),
  content: z.string(),
});

export const AssistantRequestSchema = z.object({
  text: z.string(),
  history: z.array(ChatMessageSchema).default([]),
  assistant_name: z.string().nullable().default("小T"),
});

export const TtsRequestSchema = z.object({
  text: z.string(),
  voice_type: z.string().nullable().optional(),
});

export type RiskLevel = z.infer<typeof RiskLevelSchema>;
export type ActionKind = z.infer<typeof ActionKindSchema>;
export type EnsureFolderAction = z.infer<typeof EnsureFolderActionSchema>;
export type MoveAction = z.infer<typeof MoveActionSchema>;
export type RenameAction = z.infer<typeof RenameActionSchema>;
export type OpenAppAction = z.infer<typeof OpenAppActionSchema>;
export type OpenPathAction = z.infer<typeof OpenPathActionSchema>;
export type PlayMusicAction = z.infer<typeof PlayMusicActionSchema>;
export type Action = z.infer<typeof ActionSchema>;
export type ActionWire = z.infer<typeof ActionWireSchema>;
export type PreviewEntry = z.infer<typeof PreviewEntrySchema>;
export type PreviewResult = z.infer<typeof PreviewResultSchema>;
export type PlanRequest = z.infer<typeof PlanRequestSchema>;
export type ExecuteRequest = z.infer<typeof ExecuteRequestSchema>;
export type ChatMessage = z.infer<typeof ChatMessageSchema>;
export type AssistantRequest = z.infer<typeof AssistantRequestSchema>;
export type TtsRequest = z.infer<typeof TtsRequestSchema>;
