import { spawn } from "node:child_process";
import { logWarn } from "../logs.js";

export interface ProcessOutcome {
  exitCode: number | null;
  output: string;
}

/** OS side effects the executor delegates to. Swapped for a recorder in tests. */
export interface SystemLauncher {
  openApplication(name: string): Promise<ProcessOutcome>;
  playMusic(): Promise<ProcessOutcome>;
  revealPath(targetPath: string): void;
}

const PLAY_MUSIC_SCRIPT = 'tell application "Music"\nactivate\nplay\nend tell';

/** Only the tail of a process's output is kept for diagnostics. */
export const MAX_DIAGNOSTIC_CHARS = 4096;

function keepTail(current: string, chunk: Buffer): string {
  const next = current + chunk.toString();
  return next.length > MAX_DIAGNOSTIC_CHARS ? next.slice(-MAX_DIAGNOSTIC_CHARS) : next;
}

export function runProcess(command: string, args: string[]): Promise<ProcessOutcome> {
  return new Promise((resolve) => {
    let output = "";
    const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });

    child.stdout.on("data", (data: Buffer) => {
      output = keepTail(output, data);
    });
    child.stderr.on("data", (data: Buffer) => {
      output = keepTail(output, data);
    });
    child.on("error", (error) => {
      resolve({ exitCode: null, output: `${output}${error.message}` });
    });
    child.on("close", (code) => {
      resolve({ exitCode: code, output });
    });
  });
}

function detach(command: string, args: string[]) {
  const child = spawn(command, args, {
    detached: true,
    stdio: "ignore",
  });
  child.on("error", (error) => {
    logWarn("reveal_path_failed", { command, error: error.message });
  });
  child.unref();
}

export function createSystemLauncher(platform: NodeJS.Platform = process.platform): SystemLauncher {
  return {
    openApplication(name) {
      if (platform === "darwin") return runProcess("open", ["-a", name]);
      if (platform === "win32") return runProcess("cmd", ["/c", "start", "", name]);
      // An app name is not a command line; running it would start arbitrary binaries.
      return Promise.resolve({ exitCode: 1, output: `Opening applications is not supported on ${platform}.` });
    },

    playMusic() {
      if (platform === "darwin") return runProcess("osascript", ["-e", PLAY_MUSIC_SCRIPT]);
      return Promise.resolve({ exitCode: 1, output: `Music playback is not supported on ${platform}.` });
    },

    revealPath(targetPath) {
      if (platform === "darwin") {
        detach("open", [targetPath]);
        return;
      }
      if (platform === "win32") {
        detach("explorer", [targetPath]);
        return;
      }
      detach("xdg-open", [targetPath]);
    },
  };
}
