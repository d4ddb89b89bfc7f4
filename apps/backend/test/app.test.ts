import path from "node:path";
import { once } from "node:events";
import type { Server } from "node:http";
import { writeFile } from "node:fs/promises";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { createApp } from "../src/app.js";
import { Executor } from "../src/executor/executor.js";
import { Planner } from "../src/planner/planner.js";
import { StubLlmProvider } from "../src/providers/llm.js";
import { StubTtsProvider, type SynthesizedAudio, type TtsProvider } from "../src/providers/tts.js";
import { createTempHome, RecordingLauncher, TEST_ROOTS, type TempHome } from "./helpers.js";

class FixedTts implements TtsProvider {
  readonly name = "fixed";
  readonly requests: Array<{ text: string; voiceType?: string }> = [];

  async synthesize(text: string, voiceType?: string): Promise<SynthesizedAudio> {
    this.requests.push({ text, voiceType });
    return { audio: Buffer.from("abc"), format: "mp3" };
  }
}

describe("HTTP API", () => {
  let home: TempHome;
  let launcher: RecordingLauncher;
  let tts: FixedTts;
  let server: Server;
  let baseUrl: string;

  async function start(rulesPath: string, ttsProvider: TtsProvider) {
    const app = createApp({
      planner: new Planner({ homeDir: home.home }),
      executor: new Executor({ allowedRoots: TEST_ROOTS, homeDir: home.home, launcher }),
      llm: new StubLlmProvider(),
      tts: ttsProvider,
      rulesPath,
    });
    server = app.listen(0, "127.0.0.1");
    await once(server, "listening");
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server has no port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  }

  async function post(route: string, body: unknown) {
    const response = await fetch(`${baseUrl}${route}`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    });
    const json: unknown = await response.json();
    return { status: response.status, body: json };
  }

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    home = await createTempHome();
    launcher = new RecordingLauncher();
    tts = new FixedTts();
    const rulesPath = await home.file("rules.yaml", "allowed_roots:\n  - ~/Desktop\n  - ~/Documents\n");
    await start(rulesPath, tts);
  });

  afterEach(async () => {
    server.close();
    await once(server, "close");
    await home.cleanup();
    vi.restoreAllMocks();
  });

  it("answers health checks", async () => {
    const response = await fetch(`${baseUrl}/health`);
    expect(await response.json()).toEqual({ ok: true });
  });

  it("plans a command", async () => {
    expect(await post("/api/plan", { text: "打开软件 日历" })).toEqual({
      status: 200,
      body: {
        ok: true,
        actions: [{ type: "open_app", name: "Calendar", risk: "low", reason: "" }],
        allowed_roots: ["~/Desktop", "~/Documents"],
      },
    });
  });

  it("rejects empty commands with 400", async () => {
    expect(await post("/api/plan", { text: " " })).toEqual({
      status: 400,
      body: { ok: false, error: "请输入指令" },
    });
  });

  it("validates request bodies", async () => {
    expect(await post("/api/plan", {})).toMatchObject({
      status: 400,
      body: { error: { code: "INVALID_REQUEST" } },
    });
    expect(await post("/api/execute", { actions: [{ type: "move", src: "/tmp/a" }] })).toMatchObject({
      status: 400,
      body: { error: { code: "INVALID_REQUEST" } },
    });
  });

  it("maps guard violations to 403", async () => {
    const outside = path.join(home.home, "Library", "secret.txt");
    const result = await post("/api/preview", {
      actions: [{ type: "move", src: outside, dst_dir: "~/Documents" }],
    });
    expect(result).toMatchObject({
      status: 403,
      body: { error: { code: "GUARD_VIOLATION", details: { path: outside } } },
    });
  });

  it("previews and executes with the confirmation gate", async () => {
    const src = await home.file("Desktop/notes.txt");
    const actions = [{ type: "rename", path: src, new_name: "notes.md" }];

    const preview = await post("/api/preview", { actions });
    expect(preview.body).toMatchObject({ requires_confirm: true });

    const gated = await post("/api/execute", { actions });
    expect(gated.body).toMatchObject({ ok: false, error: "存在高风险操作，需要确认后才能执行", results: [] });

    const confirmed = await post("/api/execute", { actions, confirm: true });
    expect(confirmed.body).toMatchObject({
      ok: true,
      results: [{ ok: true, renamed_to: path.join(home.desktop, "notes.md") }],
    });
  });

  it("reports unknown action kinds per action", async () => {
    expect(await post("/api/execute", { actions: [{ type: "format_disk" }] })).toMatchObject({
      status: 200,
      body: {
        ok: false,
        results: [{ action: { type: "format_disk" }, ok: false, error: "未知动作类型：format_disk" }],
      },
    });
  });

  it("replies through the assistant", async () => {
    expect(await post("/api/assistant", { text: "打开软件 日历" })).toMatchObject({
      status: 200,
      body: { ok: true, executed: true, reply: "你好，我是你的桌面助手小T。收到：打开软件 日历" },
    });
    expect(launcher.opened).toEqual(["Calendar"]);
  });

  it("synthesizes speech as base64", async () => {
    expect(await post("/api/tts", { text: " 你好 ", voice_type: "vivi" })).toEqual({
      status: 200,
      body: { ok: true, audio_base64: "YWJj", format: "mp3" },
    });
    expect(tts.requests).toEqual([{ text: "你好", voiceType: "vivi" }]);

    expect((await post("/api/tts", { text: "" })).body).toEqual({ ok: false, error: "请输入文本" });
  });

  it("exposes the rules in use", async () => {
    const response = await fetch(`${baseUrl}/api/rules`);
    expect(await response.json()).toEqual({
      rules_path: path.join(home.home, "rules.yaml"),
      allowed_roots: ["~/Desktop", "~/Documents"],
    });
  });
});

describe("HTTP API without usable configuration", () => {
  let home: TempHome;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    home = await createTempHome();
    const app = createApp({
      planner: new Planner({ homeDir: home.home }),
      executor: new Executor({ allowedRoots: TEST_ROOTS, homeDir: home.home, launcher: new RecordingLauncher() }),
      llm: new StubLlmProvider(),
      tts: new StubTtsProvider(),
      rulesPath: path.join(home.home, "missing.yaml"),
    });
    server = app.listen(0, "127.0.0.1");
    await once(server, "listening");
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server has no port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.close();
    await once(server, "close");
    await home.cleanup();
    vi.restoreAllMocks();
  });

  it("fails planning with RULES_LOAD_FAILED", async () => {
    const response = await fetch(`${baseUrl}/api/plan`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ text: "整理桌面" }),
    });
    expect(response.status).toBe(500);
    expect(await response.json()).toMatchObject({
      error: { code: "RULES_LOAD_FAILED", message: "无法读取规则文件" },
    });
  });

  it("reports the unconfigured speech provider", async () => {
    const response = await fetch(`${baseUrl}/api/tts`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ text: "你好" }),
    });
    expect(response.status).toBe(502);
    expect(await response.json()).toMatchObject({ error: { code: "TTS_REQUEST_FAILED" } });
  });
});
