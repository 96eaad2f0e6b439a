export type LlmProviderName = "pollinations" | "deepseek" | "gemini";

export type LlmMessageRole = "system" | "user" | "assistant";

export type LlmMessage = {
  role: LlmMessageRole;
  content: string;
};

export type LlmGenerateOptions = {
  temperature?: number;
  maxOutputTokens?: number;
  /** 随机种子，不支持的服务商会忽略 */
  seed?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type LlmGenerateResult = {
  provider: LlmProviderName;
  model: string;
  text: string;
  raw: unknown;
};

export interface LlmClient {
  readonly provider: LlmProviderName;
  readonly model: string;
  readonly configured: boolean;
  generateText(messages: LlmMessage[], options?: LlmGenerateOptions): Promise<LlmGenerateResult>;
}

/** 合并所有 system 消息 */
export function joinSystemMessages(messages: LlmMessage[]): string {
  return messages
    .filter((item) => item.role === "system")
    .map((item) => item.content.trim())
    .filter(Boolean)
    .join("\n\n");
}
