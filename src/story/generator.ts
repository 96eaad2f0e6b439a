import { setTimeout as delay } from "node:timers/promises";
import { config, type AppConfig } from "../config";
import type { EmotionCategory } from "../emotion/types";
import { createLlmClientFromConfig } from "../llm/factory";
import type { LlmClient, LlmGenerateResult, LlmMessage } from "../llm/types";
import { type CircuitBreakerOptions, runExternalCall } from "../utils/external_call";
import { clamp, normalizeError } from "../utils/helpers";
import { logger } from "../utils/logger";
import { validateFragments } from "./fragments";
import {
  ENHANCEMENT_TYPES,
  type EnhancementType,
  STORY_EDITOR_SYSTEM_PROMPT,
  STORY_WRITER_SYSTEM_PROMPT,
  type StoryLength,
  type StoryPromptInput,
  type StoryStyle,
  buildEnhancementPrompt,
  buildStoryPrompt,
  buildVersionRequirement,
  toMessages,
} from "./prompt";

export const STORY_SEED_MAX = 10000;

export type StoryMetadata = {
  fragments: string[];
  style: StoryStyle;
  tone: EmotionCategory;
  length: StoryLength;
  customRequirements: string;
  characterCount: number;
  generatedAt: number;
  seed: number;
  provider: string;
  model: string;
  version?: number;
};

export type StorySuccess = {
  success: true;
  story: string;
  metadata: StoryMetadata;
};

export type StoryFailure = {
  success: false;
  error: string;
};

export type StoryResult = StorySuccess | StoryFailure;

export type EnhancementResult =
  | {
      success: true;
      originalStory: string;
      enhancedStory: string;
      enhancementType: EnhancementType;
      originalLength: number;
      enhancedLength: number;
    }
  | StoryFailure;

export type StoryGeneratorOptions = {
  timeoutMs: number;
  retries?: number;
  retryDelayMs?: number;
  circuitBreaker?: CircuitBreakerOptions;
  versionDelayMs?: number;
  maxVersions?: number;
  random?: () => number;
  now?: () => number;
};

const GENERATION_FAILED = "API调用失败，请稍后重试";
const ENHANCEMENT_FAILED = "故事增强失败，请稍后重试";
const NO_CLIENT = "未配置文本生成服务";

/**
 * 记忆碎片 → 故事。所有失败都以 { success: false } 返回，不向调用方抛出。
 */
export class StoryGenerator {
  private readonly versionDelayMs: number;
  private readonly maxVersions: number;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(
    readonly client: LlmClient | null,
    private readonly options: StoryGeneratorOptions,
  ) {
    this.versionDelayMs = Math.max(0, options.versionDelayMs ?? 1000);
    this.maxVersions = Math.max(1, Math.floor(options.maxVersions ?? 5));
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  get available(): boolean {
    return this.client?.configured === true;
  }

  async generateStory(request: StoryPromptInput): Promise<StoryResult> {
    const validation = validateFragments(request.fragments);
    if (!validation.valid) {
      return { success: false, error: validation.errors.join("；") };
    }
    for (const warning of validation.warnings) {
      logger.debug("[story] 碎片提示:", warning);
    }

    const input: StoryPromptInput = { ...request, fragments: validation.cleanedFragments };
    const prompt = buildStoryPrompt(input);
    const seed = this.nextSeed();

    try {
      const result = await this.complete(
        "generate_story",
        toMessages(STORY_WRITER_SYSTEM_PROMPT, prompt),
        seed,
      );
      const story = result.text.trim();
      if (!story) {
        logger.warn("[story] 生成结果为空");
        return { success: false, error: GENERATION_FAILED };
      }
      return {
        success: true,
        story,
        metadata: {
          fragments: input.fragments,
          style: input.style ?? "novel",
          tone: input.tone ?? "warmth",
          length: input.length ?? "medium",
          customRequirements: input.customRequirements?.trim() ?? "",
          characterCount: story.length,
          generatedAt: this.now(),
          seed,
          provider: result.provider,
          model: result.model,
        },
      };
    } catch (error) {
      logger.warn("[story] 生成失败:", normalizeError(error).message);
      return { success: false, error: this.client ? GENERATION_FAILED : NO_CLIENT };
    }
  }

  /** 顺序生成多个版本，版本间等待 versionDelayMs；失败的版本被略过 */
  async generateVersions(request: StoryPromptInput, count: number): Promise<StorySuccess[]> {
    const total = Math.floor(clamp(count, 1, this.maxVersions));
    const base = request.customRequirements?.trim() ?? "";
    const versions: StorySuccess[] = [];

    for (let version = 1; version <= total; version += 1) {
      const requirement = buildVersionRequirement(version);
      const result = await this.generateStory({
        ...request,
        customRequirements: base ? `${base}\n${requirement}` : requirement,
      });
      if (result.success) {
        versions.push({ ...result, metadata: { ...result.metadata, version } });
      } else {
        logger.warn(`[story] 第${version}个版本生成失败: ${result.error}`);
      }
      if (version < total && this.versionDelayMs > 0) {
        await delay(this.versionDelayMs);
      }
    }
    logger.info(`[story] 多版本生成完成 ${versions.length}/${total}`);
    return versions;
  }

  async enhanceStory(story: string, type: EnhancementType = "details"): Promise<EnhancementResult> {
    const original = story.trim();
    if (!original) {
      return { success: false, error: "请提供原始故事内容" };
    }

    try {
      const result = await this.complete(
        "enhance_story",
        toMessages(STORY_EDITOR_SYSTEM_PROMPT, buildEnhancementPrompt(original, type)),
      );
      const enhanced = result.text.trim();
      if (!enhanced) {
        logger.warn("[story] 增强结果为空");
        return { success: false, error: ENHANCEMENT_FAILED };
      }
      logger.info(`[story] ${ENHANCEMENT_TYPES[type].label} ${original.length} -> ${enhanced.length}`);
      return {
        success: true,
        originalStory: original,
        enhancedStory: enhanced,
        enhancementType: type,
        originalLength: original.length,
        enhancedLength: enhanced.length,
      };
    } catch (error) {
      logger.warn("[story] 增强失败:", normalizeError(error).message);
      return { success: false, error: this.client ? ENHANCEMENT_FAILED : NO_CLIENT };
    }
  }

  private nextSeed(): number {
    const value = Math.floor(this.random() * STORY_SEED_MAX) + 1;
    return clamp(value, 1, STORY_SEED_MAX);
  }

  private async complete(
    operation: string,
    messages: LlmMessage[],
    seed?: number,
  ): Promise<LlmGenerateResult> {
    const client = this.client;
    if (!client) {
      throw new Error("[story] llm client not configured");
    }
    return runExternalCall(
      {
        service: `llm:${client.provider}`,
        operation,
        timeoutMs: this.options.timeoutMs,
        retries: this.options.retries,
        retryDelayMs: this.options.retryDelayMs,
        circuitBreaker: this.options.circuitBreaker,
      },
      ({ signal }) =>
        client.generateText(messages, {
          seed,
          signal,
          timeoutMs: this.options.timeoutMs,
        }),
    );
  }
}

export function createStoryGeneratorFromConfig(
  client: LlmClient | null = createLlmClientFromConfig(),
  appConfig: AppConfig = config,
): StoryGenerator {
  return new StoryGenerator(client, {
    timeoutMs: appConfig.llm.timeoutMs,
    retries: appConfig.llm.retries,
    retryDelayMs: appConfig.llm.retryDelayMs,
    circuitBreaker: appConfig.llm.circuitBreaker,
    versionDelayMs: appConfig.story.versionDelayMs,
    maxVersions: appConfig.story.maxVersions,
  });
}
