import { parseTimeoutMs } from "../config/env.js";
import { DeepSeekProvider } from "./deepseek.js";
import { DoubaoTtsProvider } from "./doubao.js";
import { StubLlmProvider, type LlmProvider } from "./llm.js";
import { StubTtsProvider, type TtsProvider } from "./tts.js";

export function createLlmProviderFromEnv(env = process.env): LlmProvider {
  const providerName = (env.LLM_PROVIDER ?? "stub").toLowerCase();

  if (providerName === "deepseek") {
    return new DeepSeekProvider({
      apiKey: (env.DEEPSEEK_API_KEY ?? "").trim(),
      baseUrl: env.DEEPSEEK_API_BASE ?? "https://api.deepseek.com",
      model: env.DEEPSEEK_MODEL ?? "deepseek-chat",
      timeoutMs: parseTimeoutMs(env.DEEPSEEK_TIMEOUT_MS, 60000),
    });
  }

  return new StubLlmProvider();
}

export function createTtsProviderFromEnv(env = process.env): TtsProvider {
  const providerName = (env.TTS_PROVIDER ?? "stub").toLowerCase();

  if (providerName === "doubao") {
    return new DoubaoTtsProvider({
      appId: (env.DOUBAO_APP_ID ?? "").trim(),
      accessToken: (env.DOUBAO_ACCESS_TOKEN ?? "").trim(),
      cluster: (env.DOUBAO_CLUSTER ?? "").trim(),
      defaultVoice: env.DOUBAO_VOICE_TYPE,
      timeoutMs: parseTimeoutMs(env.DOUBAO_TIMEOUT_MS, 60000),
    });
  }

  return new StubTtsProvider();
}
