import fs from "node:fs/promises";
import path from "node:path";

import { config } from "../config";
import { rankEmotions, summarize } from "../emotion/reporter";
import { EMOTION_CATEGORIES, type AnalysisResult, type EmotionCategory, type WeightMap } from "../emotion/types";
import { formatBeijingDateTime, formatBeijingTimeTag, logger } from "../utils/logger";

export type ReportFormat = "markdown" | "text" | "json";

export const REPORT_EXTENSIONS: Record<ReportFormat, string> = {
  markdown: "md",
  text: "txt",
  json: "json",
};

export function isReportFormat(value: string): value is ReportFormat {
  return value === "markdown" || value === "text" || value === "json";
}

export type ReportOptions = {
  labels: Readonly<Record<EmotionCategory, string>>;
  order?: readonly EmotionCategory[];
  /** 被分析的原文，可省略 */
  text?: string;
  now?: Date;
};

export function formatWeightsTable(
  weights: WeightMap,
  labels: Readonly<Record<EmotionCategory, string>>,
  order: readonly EmotionCategory[] = EMOTION_CATEGORIES,
): string {
  const rows = rankEmotions(weights, order).map(
    (item) =>
      `| ${labels[item.category]} | ${item.weight.toFixed(3)} | ${(item.weight * 100).toFixed(1)}% |`,
  );
  return ["| 情感类型 | 权重 | 百分比 |", "| --- | --- | --- |", ...rows].join("\n");
}

function keywordLines(
  result: AnalysisResult,
  labels: Readonly<Record<EmotionCategory, string>>,
): Array<{ label: string; words: string }> {
  const lines: Array<{ label: string; words: string }> = [];
  for (const category of EMOTION_CATEGORIES) {
    const words = result.emotionKeywords[category];
    if (!words || words.length === 0) continue;
    lines.push({ label: labels[category], words: words.join(", ") });
  }
  return lines;
}

function renderMarkdown(result: AnalysisResult, options: ReportOptions, timestamp: string): string {
  const lines = ["# 情感光谱分析报告", "", `**分析时间**: ${timestamp}`, ""];
  if (options.text?.trim()) {
    lines.push("## 原始文本", "", `> ${options.text.trim()}`, "");
  }
  lines.push("## 情感分布", "", formatWeightsTable(result.emotionWeights, options.labels, options.order), "");

  const keywords = keywordLines(result, options.labels);
  if (keywords.length > 0) {
    lines.push("## 情感关键词", "");
    for (const item of keywords) lines.push(`- **${item.label}**: ${item.words}`);
    lines.push("");
  }

  lines.push(
    "## 分析总结",
    "",
    summarize(result, { labels: options.labels, order: options.order }),
    "",
    "## 统计信息",
    "",
    `- 有效词数: ${result.wordCount}`,
    `- 情感多样性: ${result.emotionDiversity.toFixed(3)}`,
  );
  return lines.join("\n");
}

function renderText(result: AnalysisResult, options: ReportOptions, timestamp: string): string {
  const lines = ["情感光谱分析报告", `分析时间: ${timestamp}`];
  if (options.text?.trim()) {
    lines.push(`原始文本: ${options.text.trim()}`);
  }
  lines.push("", "情感分布:");
  const ranked = rankEmotions(result.emotionWeights, options.order);
  if (ranked.length === 0) {
    lines.push("  (无)");
  }
  for (const item of ranked) {
    lines.push(`  ${options.labels[item.category]}: ${(item.weight * 100).toFixed(1)}%`);
  }
  const keywords = keywordLines(result, options.labels);
  if (keywords.length > 0) {
    lines.push("", "情感关键词:");
    for (const item of keywords) lines.push(`  ${item.label}: ${item.words}`);
  }
  lines.push(
    "",
    `总结: ${summarize(result, { labels: options.labels, order: options.order })}`,
    `有效词数: ${result.wordCount}`,
    `情感多样性: ${result.emotionDiversity.toFixed(3)}`,
  );
  return lines.join("\n");
}

function renderJson(result: AnalysisResult, options: ReportOptions, timestamp: string): string {
  return JSON.stringify(
    {
      generatedAt: timestamp,
      text: options.text ?? null,
      summary: summarize(result, { labels: options.labels, order: options.order }),
      result,
    },
    null,
    2,
  );
}

export function exportAnalysisReport(
  result: AnalysisResult,
  format: ReportFormat,
  options: ReportOptions,
): string {
  const timestamp = formatBeijingDateTime(options.now ?? new Date());
  switch (format) {
    case "markdown":
      return renderMarkdown(result, options, timestamp);
    case "text":
      return renderText(result, options, timestamp);
    case "json":
      return renderJson(result, options, timestamp);
  }
}

export type SaveReportOptions = {
  outputDir?: string;
  now?: Date;
};

/** 写入 <outputDir>/emotion_report_<北京时间>.<ext>，返回绝对路径 */
export async function saveReport(
  content: string,
  format: ReportFormat,
  options: SaveReportOptions = {},
): Promise<string> {
  const outputDir = path.resolve(process.cwd(), options.outputDir ?? config.report.outputDir);
  await fs.mkdir(outputDir, { recursive: true });
  const fileName = `emotion_report_${formatBeijingTimeTag(options.now ?? new Date())}.${REPORT_EXTENSIONS[format]}`;
  const filePath = path.join(outputDir, fileName);
  await fs.writeFile(filePath, content, "utf8");
  logger.info(`[report] 已导出 ${filePath}`);
  return filePath;
}
