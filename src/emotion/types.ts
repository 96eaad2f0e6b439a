export type EmotionCategory =
  | "joy"
  | "longing"
  | "loss"
  | "warmth"
  | "sorrow"
  | "anticipation"
  | "helplessness"
  | "calm";

/** 固定的情感类别集合，顺序即默认声明顺序 */
export const EMOTION_CATEGORIES: readonly EmotionCategory[] = [
  "joy",
  "longing",
  "loss",
  "warmth",
  "sorrow",
  "anticipation",
  "helplessness",
  "calm",
];

export function isEmotionCategory(value: unknown): value is EmotionCategory {
  return typeof value === "string" && EMOTION_CATEGORIES.some((item) => item === value);
}

export type TokenSequence = string[];

/** 原始累加分值；缺失的类别视为 0 */
export type RawScoreMap = Map<EmotionCategory, number>;

/** 归一化权重，非空时总和为 1 */
export type WeightMap = Partial<Record<EmotionCategory, number>>;

/** 类别 → 触发该类别的词（首次出现顺序，不重复） */
export type KeywordAttributionMap = Partial<Record<EmotionCategory, string[]>>;

export type AnalysisResult = {
  readonly emotionWeights: Readonly<WeightMap>;
  readonly emotionKeywords: Readonly<KeywordAttributionMap>;
  readonly dominantEmotion: EmotionCategory | null;
  readonly emotionDiversity: number;
  readonly processedWords: readonly string[];
  readonly wordCount: number;
};

export type DiversityLevel = "highly_diverse" | "moderately_diverse" | "singular";
