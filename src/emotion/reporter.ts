import type { MatchHit } from "./matcher";
import {
  EMOTION_CATEGORIES,
  type AnalysisResult,
  type DiversityLevel,
  type EmotionCategory,
  type KeywordAttributionMap,
  type WeightMap,
} from "./types";

export const NO_EMOTION_SUMMARY = "未检测到明显的情感倾向。";

const DIVERSITY_TEXT: Record<DiversityLevel, string> = {
  highly_diverse: "情感状态较为复杂多样",
  moderately_diverse: "情感状态中等复杂",
  singular: "情感状态相对单一",
};

export type RankedEmotion = {
  category: EmotionCategory;
  weight: number;
};

/** 每个类别收集第一、二阶段命中的词，保持首次出现顺序 */
export function attributeKeywords(hits: readonly MatchHit[]): KeywordAttributionMap {
  const attribution: KeywordAttributionMap = {};
  for (const hit of hits) {
    const words = attribution[hit.category] ?? [];
    if (!words.includes(hit.token)) words.push(hit.token);
    attribution[hit.category] = words;
  }
  return attribution;
}

/** 按权重降序；同权重按 order 顺序 */
export function rankEmotions(
  weights: WeightMap,
  order: readonly EmotionCategory[] = EMOTION_CATEGORIES,
): RankedEmotion[] {
  const ranked: RankedEmotion[] = [];
  for (const category of order) {
    const weight = weights[category];
    if (weight !== undefined && weight > 0) ranked.push({ category, weight });
  }
  // Array.prototype.sort 是稳定排序
  return ranked.sort((a, b) => b.weight - a.weight);
}

export function diversityLevel(diversity: number): DiversityLevel {
  if (diversity > 0.7) return "highly_diverse";
  if (diversity > 0.4) return "moderately_diverse";
  return "singular";
}

export function describeDiversity(diversity: number): string {
  return DIVERSITY_TEXT[diversityLevel(diversity)];
}

export type SummaryOptions = {
  labels: Readonly<Record<EmotionCategory, string>>;
  order?: readonly EmotionCategory[];
};

export function summarize(result: AnalysisResult, options: SummaryOptions): string {
  const ranked = rankEmotions(result.emotionWeights, options.order);
  if (ranked.length === 0) return NO_EMOTION_SUMMARY;

  const label = (category: EmotionCategory) => options.labels[category];
  const parts: string[] = [];

  const dominant = result.dominantEmotion;
  const dominantWeight = dominant ? result.emotionWeights[dominant] : undefined;
  if (dominant && dominantWeight !== undefined) {
    parts.push(`主导情感是**${label(dominant)}**（权重: ${dominantWeight.toFixed(2)}）`);
  }

  const secondary = ranked.filter((item) => item.category !== dominant).slice(0, 2);
  if (secondary.length > 0) {
    const text = secondary
      .map((item) => `${label(item.category)}(${item.weight.toFixed(2)})`)
      .join(", ");
    parts.push(`次要情感包括: ${text}`);
  }

  parts.push(describeDiversity(result.emotionDiversity));
  return `${parts.join("；")}。`;
}
