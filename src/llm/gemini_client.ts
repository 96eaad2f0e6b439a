import { GoogleGenAI, type Content } from "@google/genai";

import { trimTrailingSlash } from "./http";
import {
  joinSystemMessages,
  type LlmClient,
  type LlmGenerateOptions,
  type LlmGenerateResult,
  type LlmMessage,
} from "./types";

type GeminiClientOptions = {
  apiKey: string;
  model: string;
  /** 为空时使用 SDK 默认地址 */
  baseUrl: string;
  timeoutMs: number;
};

export class GeminiClient implements LlmClient {
  readonly provider = "gemini" as const;
  private sdk: GoogleGenAI | null = null;

  constructor(private readonly options: GeminiClientOptions) {}

  get model(): string {
    return this.options.model;
  }

  get configured(): boolean {
    return this.options.apiKey.trim().length > 0;
  }

  private getSdk(): GoogleGenAI {
    if (this.sdk) return this.sdk;
    const baseUrl = trimTrailingSlash(this.options.baseUrl.trim());
    this.sdk = new GoogleGenAI({
      apiKey: this.options.apiKey.trim(),
      httpOptions: {
        timeout: this.options.timeoutMs,
        ...(baseUrl ? { baseUrl } : {}),
      },
    });
    return this.sdk;
  }

  async generateText(
    messages: LlmMessage[],
    options: LlmGenerateOptions = {},
  ): Promise<LlmGenerateResult> {
    if (!this.configured) {
      throw new Error("[llm] Gemini 未配置：请在 .env 中设置 GEMINI_API_KEY");
    }

    const contents: Content[] = messages
      .filter((item) => item.role !== "system")
      .map((item) => ({
        role: item.role === "assistant" ? "model" : "user",
        parts: [{ text: item.content }],
      }));
    if (contents.length === 0) {
      throw new Error("[llm] Gemini 请求至少需要一条 user/assistant 消息");
    }

    const systemInstruction = joinSystemMessages(messages);
    const response = await this.getSdk().models.generateContent({
      model: this.model,
      contents,
      config: {
        ...(systemInstruction ? { systemInstruction } : {}),
        ...(typeof options.temperature === "number" ? { temperature: options.temperature } : {}),
        ...(typeof options.maxOutputTokens === "number"
          ? { maxOutputTokens: Math.max(1, Math.floor(options.maxOutputTokens)) }
          : {}),
        ...(typeof options.seed === "number" ? { seed: Math.floor(options.seed) } : {}),
        ...(options.signal ? { abortSignal: options.signal } : {}),
      },
    });

    const text = response.text?.trim();
    if (!text) {
      throw new Error("[llm] Gemini 返回为空，未提取到文本结果");
    }

    return {
      provider: this.provider,
      model: this.model,
      text,
      raw: response,
    };
  }
}
