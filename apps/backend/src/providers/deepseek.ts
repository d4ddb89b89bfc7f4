import { z } from "zod";
import type { ChatMessage, ChatOptions, LlmProvider } from "./llm.js";
import { LlmProviderError } from "./llm.js";

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            role: z.string().optional(),
            content: z.string().nullish(),
          })
          .optional(),
      }),
    )
    .optional(),
});

export interface DeepSeekProviderOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

/** OpenAI-compatible `/chat/completions` client. */
export class DeepSeekProvider implements LlmProvider {
  readonly name = "deepseek";
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly timeoutMs: number;

  constructor(options: DeepSeekProviderOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
  }

  async chat(messages: ChatMessage[], options: ChatOptions = {}): Promise<string> {
    if (!this.apiKey) {
      throw new LlmProviderError("缺少 DEEPSEEK_API_KEY");
    }
    if (!messages.length) {
      throw new LlmProviderError("DeepSeekProvider requires at least one message.");
    }

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.model,
          messages,
          temperature: options.temperature ?? 0.7,
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new LlmProviderError(
        `Failed to reach DeepSeek at ${this.baseUrl}.`,
        error instanceof Error ? error.message : String(error),
      );
    }

    if (!response.ok) {
      const errorBody = await response.text().catch(() => "");
      throw new LlmProviderError(
        `DeepSeek returned HTTP ${response.status}.`,
        errorBody || response.statusText,
      );
    }

    const parsed = ChatCompletionResponseSchema.safeParse(await response.json().catch(() => null));
    if (!parsed.success) {
      throw new LlmProviderError("DeepSeek returned an unexpected response.", parsed.error.message);
    }
    const content = parsed.data.choices?.[0]?.message?.content?.trim();

    if (!content) {
      throw new LlmProviderError("DeepSeek 返回为空");
    }

    return content;
  }
}
