import type { ChatMessage } from "@deskpilot/shared";

export type { ChatMessage };

export interface ChatOptions {
  temperature?: number;
}

export interface LlmProvider {
  readonly name: string;
  chat(messages: ChatMessage[], options?: ChatOptions): Promise<string>;
}

export class LlmProviderError extends Error {
  readonly causeText?: string;

  constructor(message: string, causeText?: string) {
    super(message);
    this.name = "LlmProviderError";
    this.causeText = causeText;
  }
}

export class StubLlmProvider implements LlmProvider {
  readonly name = "stub";

  async chat(messages: ChatMessage[]): Promise<string> {
    const lastUserMessage = [...messages].reverse().find((m) => m.role === "user");
    return `收到：${lastUserMessage?.content ?? "空输入"}`;
  }
}
