import type { EmotionLexicon } from "../emotion/lexicon";
import type { AnalysisResult } from "../emotion/types";
import { buildEmotionSeries, buildWordFrequencies } from "../report/chart_data";
import { formatWeightsTable } from "../report/export";
import type { EmotionHistoryEntry } from "../session/history_store";
import type { StorySuccess } from "../story/generator";
import { EMOTIONAL_TONES, STORY_STYLES } from "../story/prompt";
import { clipText } from "../utils/helpers";
import { formatBeijingDateTime } from "../utils/logger";

const BAR_WIDTH = 20;

export function formatAnalysisOutput(
  result: AnalysisResult,
  summary: string,
  lexicon: EmotionLexicon,
): string {
  const lines = [`情感分析结果（有效词 ${result.wordCount} 个）`, summary];
  if (result.dominantEmotion === null) {
    return lines.join("\n");
  }
  lines.push("", formatWeightsTable(result.emotionWeights, lexicon.labels, lexicon.categories));

  const keywords = lexicon.categories
    .map((category) => {
      const words = result.emotionKeywords[category];
      return words && words.length > 0 ? `${lexicon.labels[category]}: ${words.join(", ")}` : "";
    })
    .filter(Boolean);
  if (keywords.length > 0) {
    lines.push("", `关键词 ${keywords.join("；")}`);
  }
  return lines.join("\n");
}

/** 文本条形图与词频表 */
export function formatChartOutput(result: AnalysisResult, lexicon: EmotionLexicon): string {
  const series = buildEmotionSeries(result.emotionWeights, {
    labels: lexicon.labels,
    colors: lexicon.colors,
    order: lexicon.categories,
  });
  if (series.length === 0) return "暂无可绘制的情感数据";

  const lines = ["情感分布:"];
  for (const point of series) {
    const bar = "█".repeat(Math.max(1, Math.round(point.weight * BAR_WIDTH)));
    lines.push(`  ${point.label} ${bar} ${point.percent}% ${point.color}`);
  }

  const words = buildWordFrequencies(result.emotionKeywords, result.emotionWeights);
  if (words.length > 0) {
    lines.push(
      "词频:",
      `  ${words.map((item) => `${item.word}(${item.value.toFixed(1)})`).join(" ")}`,
    );
  }
  return lines.join("\n");
}

export function formatStoryOutput(story: StorySuccess): string {
  const { metadata } = story;
  const title = metadata.version ? `【版本 ${metadata.version}】` : "【故事】";
  return [
    title,
    story.story,
    `（${STORY_STYLES[metadata.style]} / ${EMOTIONAL_TONES[metadata.tone]} / ${metadata.characterCount}字）`,
  ].join("\n");
}

export function formatHistoryOutput(
  entries: readonly EmotionHistoryEntry[],
  lexicon: EmotionLexicon,
): string {
  if (entries.length === 0) return "暂无分析记录";
  return entries
    .map((entry, index) => {
      const dominant = entry.result.dominantEmotion;
      const label = dominant ? lexicon.labels[dominant] : "无";
      const weight = dominant ? (entry.result.emotionWeights[dominant] ?? 0).toFixed(2) : "-";
      const time = formatBeijingDateTime(new Date(entry.analyzedAt));
      return `#${index + 1} ${time} ${label}(${weight}) ${clipText(entry.text, 20)}`;
    })
    .join("\n");
}
