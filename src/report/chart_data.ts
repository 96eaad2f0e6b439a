import { rankEmotions } from "../emotion/reporter";
import { EMOTION_CATEGORIES, type EmotionCategory, type WeightMap } from "../emotion/types";
import type { EmotionHistoryEntry } from "../session/history_store";

/**
 * 图表数据整形：只产出数据，不负责渲染。
 */

export type WordFrequency = {
  word: string;
  value: number;
};

export type EmotionSeriesPoint = {
  category: EmotionCategory;
  label: string;
  color: string;
  weight: number;
  percent: number;
};

export type TimelinePoint = {
  index: number;
  analyzedAt: number;
  dominant: EmotionCategory | null;
  diversity: number;
  weights: Record<EmotionCategory, number>;
};

export type ChartPalette = {
  labels: Readonly<Record<EmotionCategory, string>>;
  colors: Readonly<Record<EmotionCategory, string>>;
  order?: readonly EmotionCategory[];
};

const UNWEIGHTED_WORD_WEIGHT = 0.1;
const FREQUENCY_SCALE = 10;

/** 词云频率表：每出现一次累加 (类别权重 ?? 0.1) × 10，按值降序 */
export function buildWordFrequencies(
  keywords: Readonly<Partial<Record<EmotionCategory, readonly string[]>>>,
  weights: WeightMap,
): WordFrequency[] {
  const frequencies = new Map<string, number>();
  for (const category of EMOTION_CATEGORIES) {
    const words = keywords[category];
    if (!words) continue;
    const weight = weights[category] ?? UNWEIGHTED_WORD_WEIGHT;
    for (const word of words) {
      frequencies.set(word, (frequencies.get(word) ?? 0) + weight * FREQUENCY_SCALE);
    }
  }
  return [...frequencies.entries()]
    .map(([word, value]) => ({ word, value }))
    .sort((a, b) => b.value - a.value);
}

export function buildEmotionSeries(weights: WeightMap, palette: ChartPalette): EmotionSeriesPoint[] {
  return rankEmotions(weights, palette.order).map((item) => ({
    category: item.category,
    label: palette.labels[item.category],
    color: palette.colors[item.category],
    weight: item.weight,
    percent: Math.round(item.weight * 1000) / 10,
  }));
}

function denseWeights(weights: WeightMap): Record<EmotionCategory, number> {
  const dense: Record<EmotionCategory, number> = {
    joy: 0,
    longing: 0,
    loss: 0,
    warmth: 0,
    sorrow: 0,
    anticipation: 0,
    helplessness: 0,
    calm: 0,
  };
  for (const category of EMOTION_CATEGORIES) {
    dense[category] = weights[category] ?? 0;
  }
  return dense;
}

/** 历史记录 → 时间线；缺失类别补 0，便于折线图逐类绘制 */
export function buildTimelineSeries(history: readonly EmotionHistoryEntry[]): TimelinePoint[] {
  return history.map((entry, index) => ({
    index: index + 1,
    analyzedAt: entry.analyzedAt,
    dominant: entry.result.dominantEmotion,
    diversity: entry.result.emotionDiversity,
    weights: denseWeights(entry.result.emotionWeights),
  }));
}
