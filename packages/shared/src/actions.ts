import {
  ActionKindSchema,
  ActionSchema,
  type Action,
  type ActionWire,
  type EnsureFolderAction,
  type MoveAction,
  type OpenAppAction,
  type OpenPathAction,
  type PlayMusicAction,
  type RenameAction,
  type RiskLevel,
} from "./schemas.js";

/**
 * A wire action whose `type` is not one of the known kinds. It is carried through to the
 * executor so the failure can be reported next to the other results.
 */
export interface UnsupportedAction {
  type: "unsupported";
  requestedType: string;
  fields: Record<string, unknown>;
}

export type ExecutableAction = Action | UnsupportedAction;

const RISK_RANK: Record<RiskLevel, number> = {
  low: 0,
  medium: 1,
  high: 2,
};

function riskRank(risk: RiskLevel): number {
  return RISK_RANK[risk];
}

export function ensureFolderAction(path: string): EnsureFolderAction {
  return { type: "ensure_folder", path, risk: "low", reason: "" };
}

export function moveAction(src: string, dstDir: string): MoveAction {
  return { type: "move", src, dst_dir: dstDir, risk: "low", reason: "" };
}

export function renameAction(path: string, newName: string): RenameAction {
  return { type: "rename", path, new_name: newName, risk: "low", reason: "" };
}

export function openAppAction(name: string): OpenAppAction {
  return { type: "open_app", name, risk: "low", reason: "" };
}

export function openPathAction(path: string): OpenPathAction {
  return { type: "open_path", path, risk: "low", reason: "" };
}

export function playMusicAction(): PlayMusicAction {
  return { type: "play_music", risk: "low", reason: "" };
}

/**
 * Raises the risk of an action. Lower levels never replace a higher one; an equal or higher
 * level replaces the reason.
 */
export function escalateRisk<T extends Action>(action: T, risk: RiskLevel, reason: string): T {
  if (riskRank(risk) < riskRank(action.risk)) return action;
  return { ...action, risk, reason };
}

export function serializeAction(action: ExecutableAction): ActionWire {
  if (action.type === "unsupported") {
    return { ...action.fields, type: action.requestedType };
  }
  const wire: ActionWire = { type: action.type };
  for (const [key, value] of Object.entries(action)) {
    if (value === undefined || value === null) continue;
    wire[key] = value;
  }
  return wire;
}

/** Throws a ZodError when a known kind is missing its fields. */
export function decodeAction(wire: ActionWire): ExecutableAction {
  if (!ActionKindSchema.safeParse(wire.type).success) {
    const { type, ...fields } = wire;
    return { type: "unsupported", requestedType: type, fields };
  }
  return ActionSchema.parse(wire);
}

export function decodeActions(wires: ActionWire[]): ExecutableAction[] {
  return wires.map((wire) => decodeAction(wire));
}

export function describeAction(action: ExecutableAction): string {
  return action.type === "unsupported" ? action.requestedType : action.type;
}
