import type { EmotionCategory } from "../emotion/types";
import type { LlmMessage } from "../llm/types";

export type StoryStyle = "novel" | "film" | "prose_poem" | "diary" | "memoir" | "dream";
export type StoryLength = "short" | "medium" | "long";
export type EnhancementType = "details" | "emotion" | "imagery" | "plot";

export const STORY_STYLES: Record<StoryStyle, string> = {
  novel: "小说风格",
  film: "电影桥段",
  prose_poem: "诗意散文",
  diary: "日记体",
  memoir: "回忆录",
  dream: "梦境叙述",
};

export const STORY_LENGTHS: Record<StoryLength, { label: string; range: string }> = {
  short: { label: "短", range: "200-300字" },
  medium: { label: "中等", range: "400-600字" },
  long: { label: "长", range: "800-1000字" },
};

/** 情感基调描述，按情感类别取 */
export const EMOTIONAL_TONES: Record<EmotionCategory, string> = {
  warmth: "温馨感人",
  sorrow: "淡淡忧伤",
  longing: "深深思念",
  anticipation: "充满希望",
  loss: "略带失落",
  calm: "宁静安详",
  joy: "欢快愉悦",
  helplessness: "迷茫困顿",
};

export const ENHANCEMENT_TYPES: Record<EnhancementType, { label: string; instruction: string }> = {
  details: {
    label: "细节丰富",
    instruction: "请为这个故事添加更多生动的细节描写，包括环境、人物表情、动作等，使故事更加立体丰满。",
  },
  emotion: {
    label: "情感深化",
    instruction: "请深化故事中的情感表达，让人物的内心世界更加丰富，情感变化更加细腻。",
  },
  imagery: {
    label: "意境提升",
    instruction: "请提升故事的意境和文学性，使用更优美的语言和更深刻的意象。",
  },
  plot: {
    label: "情节完善",
    instruction: "请完善故事的情节结构，添加必要的转折和高潮，使故事更加引人入胜。",
  },
};

export const STORY_WRITER_SYSTEM_PROMPT = [
  "你是一位富有想象力的作家，擅长将零散的记忆碎片编织成动人的故事。",
  "你的写作风格优美流畅，善于营造意境，能够准确把握情感基调。",
  "请根据用户提供的记忆碎片和要求，创作出高质量的故事作品。",
].join("\n");

export const STORY_EDITOR_SYSTEM_PROMPT =
  "你是一位专业的文学编辑，擅长改进和完善故事内容，能够在保持原作风格的基础上进行有效的增强。";

export type StoryPromptInput = {
  fragments: string[];
  style?: StoryStyle;
  tone?: EmotionCategory;
  length?: StoryLength;
  customRequirements?: string;
};

export function buildStoryPrompt(input: StoryPromptInput): string {
  const fragments = input.fragments.map((item) => item.trim()).filter(Boolean);
  if (fragments.length === 0) return "";

  const style = STORY_STYLES[input.style ?? "novel"];
  const tone = EMOTIONAL_TONES[input.tone ?? "warmth"];
  const length = STORY_LENGTHS[input.length ?? "medium"].range;

  const lines = [
    `请根据以下记忆碎片创作一个${style}的故事：`,
    "",
    `记忆碎片：${fragments.join("、")}`,
    "",
    "创作要求：",
    `1. 故事风格：${style}`,
    `2. 情感基调：${tone}`,
    `3. 故事长度：${length}`,
    "4. 将这些记忆碎片自然地融入到一个连贯的故事中",
    '5. 故事要有明确的情节线索，体现"回忆情节 重合明显 模糊了从前"的意境',
    "6. 语言要优美流畅，富有画面感",
    "7. 结尾要有一定的意境和回味",
  ];

  const custom = input.customRequirements?.trim();
  if (custom) {
    lines.push("", `额外要求：${custom}`);
  }
  lines.push("", "请开始创作：");
  return lines.join("\n");
}

/** 多版本生成时附加给第 n 个版本的要求 */
export function buildVersionRequirement(version: number): string {
  return `这是第${version}个版本，请在保持核心情节的基础上，尝试不同的叙述角度或细节描写。`;
}

export function buildEnhancementPrompt(story: string, type: EnhancementType = "details"): string {
  return [
    "原始故事：",
    story.trim(),
    "",
    "增强要求：",
    ENHANCEMENT_TYPES[type].instruction,
    "",
    "请在保持原故事核心内容和风格的基础上，按照要求进行增强改写：",
  ].join("\n");
}

export function toMessages(systemPrompt: string, prompt: string): LlmMessage[] {
  return [
    { role: "system", content: systemPrompt },
    { role: "user", content: prompt },
  ];
}
