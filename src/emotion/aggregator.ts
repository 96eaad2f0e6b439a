import { clamp01 } from "../utils/helpers";
import { EMOTION_CATEGORIES, type EmotionCategory, type RawScoreMap, type WeightMap } from "./types";

export type NormalizedEmotions = {
  weights: WeightMap;
  dominant: EmotionCategory | null;
  diversity: number;
};

/** 正分取平方根，压低单一类别的优势；非正分丢弃 */
export function smoothScores(
  raw: RawScoreMap,
  order: readonly EmotionCategory[] = EMOTION_CATEGORIES,
): Map<EmotionCategory, number> {
  const smoothed = new Map<EmotionCategory, number>();
  for (const category of order) {
    const value = raw.get(category) ?? 0;
    if (value > 0) smoothed.set(category, Math.sqrt(value));
  }
  return smoothed;
}

export function normalizeWeights(
  raw: RawScoreMap,
  order: readonly EmotionCategory[] = EMOTION_CATEGORIES,
): WeightMap {
  const smoothed = smoothScores(raw, order);
  let total = 0;
  for (const value of smoothed.values()) total += value;

  const weights: WeightMap = {};
  if (total <= 0) return weights;
  for (const [category, value] of smoothed) {
    weights[category] = value / total;
  }
  return weights;
}

/** 最大权重的类别；并列时取 order 中靠前者 */
export function selectDominant(
  weights: WeightMap,
  order: readonly EmotionCategory[] = EMOTION_CATEGORIES,
): EmotionCategory | null {
  let best: EmotionCategory | null = null;
  let bestWeight = 0;
  for (const category of order) {
    const weight = weights[category];
    if (weight === undefined || weight <= 0) continue;
    if (best === null || weight > bestWeight) {
      best = category;
      bestWeight = weight;
    }
  }
  return best;
}

/** 归一化香农熵：H / log2(n)，n 为非零类别数；n < 2 时为 0 */
export function computeDiversity(weights: WeightMap): number {
  const values = Object.values(weights).filter(
    (value): value is number => typeof value === "number" && value > 0,
  );
  if (values.length < 2) return 0;

  const entropy = -values.reduce((sum, value) => sum + value * Math.log2(value), 0);
  return clamp01(entropy / Math.log2(values.length));
}

export function normalize(
  raw: RawScoreMap,
  order: readonly EmotionCategory[] = EMOTION_CATEGORIES,
): NormalizedEmotions {
  const weights = normalizeWeights(raw, order);
  return {
    weights,
    dominant: selectDominant(weights, order),
    diversity: computeDiversity(weights),
  };
}
