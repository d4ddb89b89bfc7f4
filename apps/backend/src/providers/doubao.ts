import { randomUUID } from "node:crypto";
import { TtsProviderError, type SynthesizedAudio, type TtsProvider } from "./tts.js";

const DEFAULT_API_URL = "https://openspeech.bytedance.com/api/v1/tts";
const DEFAULT_VOICE = "zh_female_vv_uranus_bigtts";

const VOICE_ALIASES: Record<string, string> = {
  调皮公主: "saturn_zh_female_tiaopigongzhu_tob",
  tiaopigongzhu: "saturn_zh_female_tiaopigongzhu_tob",
  可爱公主: "saturn_zh_female_keainvsheng_tob",
  keainvsheng: "saturn_zh_female_keainvsheng_tob",
  vivi: DEFAULT_VOICE,
  "vivi2.0": DEFAULT_VOICE,
  "vivi 2.0": DEFAULT_VOICE,
  vv: DEFAULT_VOICE,
};

const FALLBACK_VOICES = [
  "zh_female_shuangkuaisisi_moon_bigtts",
  "zh_male_wennuanahu_moon_bigtts",
  "zh_female_wanwanxiaohe_moon_bigtts",
  "zh_male_jingqiangkanye_moon_bigtts",
];

/** The service answered but produced no audio for this voice. */
class VoiceRejectedError extends TtsProviderError {
  constructor(message: string, causeText?: string) {
    super(message, causeText);
    this.name = "VoiceRejectedError";
  }
}

export interface DoubaoTtsProviderOptions {
  appId: string;
  accessToken: string;
  cluster: string;
  defaultVoice?: string;
  apiUrl?: string;
  timeoutMs: number;
}

export function resolveVoiceType(raw: string | undefined, fallback = DEFAULT_VOICE): string {
  const trimmed = (raw ?? "").trim() || fallback;
  return VOICE_ALIASES[trimmed] ?? trimmed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Finds the audio payload (base64 text or a download URL) wherever the response nests it. */
export function extractAudio(data: unknown): string | null {
  if (typeof data === "string") return data;
  if (!isRecord(data)) return null;

  for (const key of ["audio", "audio_base64"]) {
    const value = data[key];
    if (typeof value === "string") return value;
  }

  const inner = data.data;
  if (typeof inner === "string") return inner;
  if (isRecord(inner)) {
    const found = extractAudio(inner);
    if (found) return found;
  }
  if (Array.isArray(inner)) {
    for (const item of inner) {
      const found = isRecord(item) ? extractAudio(item) : null;
      if (found) return found;
    }
  }

  for (const key of ["speech", "result"]) {
    const nested = data[key];
    const found = isRecord(nested) ? extractAudio(nested) : null;
    if (found) return found;
  }

  const audioUrl = data.audio_url;
  return typeof audioUrl === "string" ? audioUrl : null;
}

function isSuccessCode(code: unknown): boolean {
  return code === undefined || code === null || code === 0 || code === "0" || code === 3000;
}

function formatFromContentType(contentType: string): string {
  const match = /audio\/([^;\s]+)/.exec(contentType);
  return match?.[1] ?? "mp3";
}

export class DoubaoTtsProvider implements TtsProvider {
  readonly name = "doubao";
  private readonly options: DoubaoTtsProviderOptions;

  constructor(options: DoubaoTtsProviderOptions) {
    this.options = options;
  }

  private buildPayload(text: string, voiceType: string) {
    // The expressive "saturn" voices sound best untouched; the others get a slight lift.
    const tuned = !voiceType.startsWith("saturn_");
    return {
      app: {
        appid: this.options.appId,
        token: this.options.accessToken,
        cluster: this.options.cluster || "volcano_tts",
      },
      user: { uid: "deskpilot" },
      audio: {
        voice_type: voiceType,
        encoding: "mp3",
        rate: 24000,
        speed_ratio: tuned ? 0.95 : 1.0,
        volume_ratio: tuned ? 1.1 : 1.0,
        pitch_ratio: tuned ? 1.05 : 1.0,
      },
      request: {
        reqid: randomUUID().replace(/-/g, ""),
        text,
        text_type: "plain",
        operation: "query",
      },
    };
  }

  private async post(text: string, voiceType: string): Promise<Response> {
    try {
      return await fetch(this.options.apiUrl ?? DEFAULT_API_URL, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          authorization: `Bearer;${this.options.accessToken}`,
        },
        body: JSON.stringify(this.buildPayload(text, voiceType)),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new TtsProviderError(
        "豆包TTS请求失败",
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  private async download(url: string): Promise<SynthesizedAudio> {
    const response = await fetch(url, { signal: AbortSignal.timeout(this.options.timeoutMs) });
    if (!response.ok) {
      const detail = await response.text().catch(() => "");
      throw new TtsProviderError(`豆包TTS音频下载失败：HTTP ${response.status}`, detail);
    }
    return {
      audio: Buffer.from(await response.arrayBuffer()),
      format: formatFromContentType(response.headers.get("content-type") ?? ""),
    };
  }

  private async synthesizeWithVoice(text: string, voiceType: string): Promise<SynthesizedAudio> {
    const response = await this.post(text, voiceType);
    const contentType = response.headers.get("content-type") ?? "";

    if (contentType.includes("audio/")) {
      return {
        audio: Buffer.from(await response.arrayBuffer()),
        format: formatFromContentType(contentType),
      };
    }

    const bodyText = await response.text();
    let data: unknown;
    try {
      data = JSON.parse(bodyText);
    } catch {
      throw new TtsProviderError(`豆包TTS请求失败：HTTP ${response.status}`, bodyText);
    }

    const audio = extractAudio(data);
    if (audio) {
      if (audio.startsWith("http")) return this.download(audio);
      return { audio: Buffer.from(audio, "base64"), format: "mp3" };
    }

    const code = isRecord(data) ? data.code : undefined;
    const message = isRecord(data) && typeof data.message === "string" ? data.message : "豆包TTS调用失败";
    if (!isSuccessCode(code) || !response.ok) {
      throw new VoiceRejectedError(`${message}，请确认 voice_type=${voiceType} 在你的账号中可用`, bodyText);
    }
    throw new VoiceRejectedError("豆包TTS响应中没有音频数据", bodyText);
  }

  /**
   * Tries the requested voice, then the fallback voices while the service keeps rejecting them.
   * Transport failures end the attempt at once.
   */
  async synthesize(text: string, voiceType?: string): Promise<SynthesizedAudio> {
    if (!this.options.appId || !this.options.accessToken) {
      throw new TtsProviderError("缺少豆包TTS的APPID或Access Token");
    }

    const primary = resolveVoiceType(voiceType, this.options.defaultVoice);
    const candidates = [primary, ...FALLBACK_VOICES.filter((voice) => voice !== primary)];
    let lastError: TtsProviderError | null = null;

    for (const candidate of candidates) {
      try {
        return await this.synthesizeWithVoice(text, candidate);
      } catch (error) {
        if (!(error instanceof VoiceRejectedError)) throw error;
        lastError = error;
      }
    }
    throw lastError ?? new TtsProviderError("豆包TTS调用失败");
  }
}
