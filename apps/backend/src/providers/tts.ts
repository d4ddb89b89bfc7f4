export interface SynthesizedAudio {
  audio: Buffer;
  format: string;
}

export interface TtsProvider {
  readonly name: string;
  synthesize(text: string, voiceType?: string): Promise<SynthesizedAudio>;
}

export class TtsProviderError extends Error {
  readonly causeText?: string;

  constructor(message: string, causeText?: string) {
    super(message);
    this.name = "TtsProviderError";
    this.causeText = causeText;
  }
}

export class StubTtsProvider implements TtsProvider {
  readonly name = "stub";

  async synthesize(): Promise<SynthesizedAudio> {
    throw new TtsProviderError("未配置语音合成服务（TTS_PROVIDER）");
  }
}
