import os from "node:os";
import path from "node:path";

export interface ServerSettings {
  port: number;
  rulesPath: string;
  homeDir: string;
}

function parsePort(raw: string | undefined): number {
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0 || parsed > 65535) {
    return 8787;
  }
  return parsed;
}

export function parseTimeoutMs(raw: string | undefined, fallback: number): number {
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return Math.floor(parsed);
}

export function loadServerSettings(env = process.env): ServerSettings {
  return {
    port: parsePort(env.PORT),
    rulesPath: path.resolve(env.DESKPILOT_RULES_PATH ?? path.join("config", "rules.yaml")),
    homeDir: env.DESKPILOT_HOME ? path.resolve(env.DESKPILOT_HOME) : os.homedir(),
  };
}
