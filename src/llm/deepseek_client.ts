import { postJson, trimTrailingSlash } from "./http";
import type { LlmClient, LlmGenerateOptions, LlmGenerateResult, LlmMessage } from "./types";

type DeepSeekClientOptions = {
  apiKey: string;
  model: string;
  baseUrl: string;
  timeoutMs: number;
};

type ChatCompletionResponse = {
  choices?: Array<{
    message?: {
      content?: unknown;
    };
  }>;
};

function isChatCompletionResponse(value: unknown): value is ChatCompletionResponse {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function extractText(response: unknown): string {
  if (!isChatCompletionResponse(response)) return "";
  for (const choice of response.choices ?? []) {
    const content = choice.message?.content;
    if (typeof content === "string" && content.trim()) {
      return content.trim();
    }
  }
  return "";
}

/** DeepSeek chat completions（OpenAI 兼容格式） */
export class DeepSeekClient implements LlmClient {
  readonly provider = "deepseek" as const;

  constructor(private readonly options: DeepSeekClientOptions) {}

  get model(): string {
    return this.options.model;
  }

  get configured(): boolean {
    return this.options.apiKey.trim().length > 0;
  }

  async generateText(
    messages: LlmMessage[],
    options: LlmGenerateOptions = {},
  ): Promise<LlmGenerateResult> {
    if (!this.configured) {
      throw new Error("[llm] DeepSeek 未配置：请在 .env 中设置 DEEPSEEK_API_KEY");
    }
    if (!messages.some((item) => item.role === "user")) {
      throw new Error("[llm] DeepSeek 请求至少需要一条 user 消息");
    }

    const body: Record<string, unknown> = {
      model: this.model,
      messages: messages.map((item) => ({ role: item.role, content: item.content })),
      stream: false,
    };
    if (typeof options.temperature === "number") {
      body.temperature = options.temperature;
    }
    if (typeof options.maxOutputTokens === "number") {
      body.max_tokens = Math.max(1, Math.floor(options.maxOutputTokens));
    }

    const raw = await postJson(`${trimTrailingSlash(this.options.baseUrl)}/chat/completions`, {
      headers: {
        Authorization: `Bearer ${this.options.apiKey}`,
      },
      body,
      timeoutMs: options.timeoutMs ?? this.options.timeoutMs,
      signal: options.signal,
    });

    const text = extractText(raw);
    if (!text) {
      throw new Error("[llm] DeepSeek 返回为空，未提取到文本结果");
    }

    return {
      provider: this.provider,
      model: this.model,
      text,
      raw,
    };
  }
}
