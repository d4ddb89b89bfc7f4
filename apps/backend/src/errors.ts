export class GuardViolationError extends Error {
  readonly targetPath: string;

  constructor(targetPath: string) {
    super(`路径不在允许范围内：${targetPath}`);
    this.name = "GuardViolationError";
    this.targetPath = targetPath;
  }
}

export class ConfigurationError extends Error {
  readonly sourcePath: string;
  readonly causeText?: string;

  constructor(message: string, sourcePath: string, causeText?: string) {
    super(message);
    this.name = "ConfigurationError";
    this.sourcePath = sourcePath;
    this.causeText = causeText;
  }
}

export function isPermissionError(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) return false;
  return error.code === "EACCES" || error.code === "EPERM";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
