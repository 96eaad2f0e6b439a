import { getText, trimTrailingSlash } from "./http";
import {
  joinSystemMessages,
  type LlmClient,
  type LlmGenerateOptions,
  type LlmGenerateResult,
  type LlmMessage,
} from "./types";

type PollinationsClientOptions = {
  baseUrl: string;
  model: string;
  seed: number;
  timeoutMs: number;
};

/**
 * Pollinations 文本接口：GET <base>/<prompt>?model=&seed=&system=
 *
 * 接口只接收单条 prompt，多条 user/assistant 消息按顺序拼接。
 */
export class PollinationsClient implements LlmClient {
  readonly provider = "pollinations" as const;

  constructor(private readonly options: PollinationsClientOptions) {}

  get model(): string {
    return this.options.model;
  }

  get configured(): boolean {
    return this.options.baseUrl.trim().length > 0;
  }

  buildUrl(messages: LlmMessage[], options: LlmGenerateOptions = {}): string {
    const prompt = messages
      .filter((item) => item.role !== "system")
      .map((item) => item.content.trim())
      .filter(Boolean)
      .join("\n\n");
    if (!prompt) {
      throw new Error("[llm] Pollinations 请求至少需要一条 user 消息");
    }

    const params = new URLSearchParams({
      model: this.model,
      seed: String(Math.floor(options.seed ?? this.options.seed)),
    });
    const system = joinSystemMessages(messages);
    if (system) params.set("system", system);
    if (typeof options.temperature === "number") {
      params.set("temperature", String(options.temperature));
    }

    return `${trimTrailingSlash(this.options.baseUrl)}/${encodeURIComponent(prompt)}?${params.toString()}`;
  }

  async generateText(
    messages: LlmMessage[],
    options: LlmGenerateOptions = {},
  ): Promise<LlmGenerateResult> {
    if (!this.configured) {
      throw new Error("[llm] Pollinations 未配置：请在 .env 中设置 POLLINATIONS_BASE_URL");
    }

    const url = this.buildUrl(messages, options);
    const raw = await getText(url, {
      timeoutMs: options.timeoutMs ?? this.options.timeoutMs,
      signal: options.signal,
    });

    const text = raw.trim();
    if (!text) {
      throw new Error("[llm] Pollinations 返回为空");
    }

    return {
      provider: this.provider,
      model: this.model,
      text,
      raw,
    };
  }
}
