import fs from "node:fs";
import path from "node:path";

import { config } from "../config";
import { logger } from "../utils/logger";
import { EMOTION_CATEGORIES, isEmotionCategory, type EmotionCategory } from "./types";

/**
 * 情感词典：主词表、语义触发词、停用词与展示信息。
 *
 * 进程启动时加载一次，之后只读。数据文件结构见 data/emotion_lexicon.json。
 */
export type EmotionLexicon = {
  /** 声明顺序，也是并列时的优先顺序 */
  readonly categories: readonly EmotionCategory[];
  readonly keywords: ReadonlyMap<EmotionCategory, readonly string[]>;
  /** 关键词 → 类别，用于精确匹配 */
  readonly keywordIndex: ReadonlyMap<string, EmotionCategory>;
  readonly semanticRules: ReadonlyMap<EmotionCategory, readonly string[]>;
  readonly stopwords: ReadonlySet<string>;
  readonly labels: Readonly<Record<EmotionCategory, string>>;
  readonly colors: Readonly<Record<EmotionCategory, string>>;
};

const FALLBACK_LABELS: Record<EmotionCategory, string> = {
  joy: "喜悦",
  longing: "思念",
  loss: "失落",
  warmth: "温暖",
  sorrow: "忧伤",
  anticipation: "期待",
  helplessness: "无助",
  calm: "平静",
};

const FALLBACK_COLOR = "#888888";

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function normalizeWordList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  const seen = new Set<string>();
  const result: string[] = [];
  for (const item of value) {
    if (typeof item !== "string") continue;
    const word = item.trim();
    if (!word || seen.has(word)) continue;
    seen.add(word);
    result.push(word);
  }
  return result;
}

function normalizeString(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim() ? value.trim() : fallback;
}

export function parseLexicon(raw: unknown): EmotionLexicon {
  if (!isRecord(raw) || !Array.isArray(raw.categories)) {
    throw new Error("[lexicon] 词典格式错误：缺少 categories 数组");
  }

  const categories: EmotionCategory[] = [];
  const keywords = new Map<EmotionCategory, string[]>();
  const semanticRules = new Map<EmotionCategory, string[]>();
  const labels: Record<EmotionCategory, string> = { ...FALLBACK_LABELS };
  const colors: Record<EmotionCategory, string> = {
    joy: FALLBACK_COLOR,
    longing: FALLBACK_COLOR,
    loss: FALLBACK_COLOR,
    warmth: FALLBACK_COLOR,
    sorrow: FALLBACK_COLOR,
    anticipation: FALLBACK_COLOR,
    helplessness: FALLBACK_COLOR,
    calm: FALLBACK_COLOR,
  };

  for (const entry of raw.categories) {
    if (!isRecord(entry)) continue;
    const key = entry.key;
    if (!isEmotionCategory(key)) {
      logger.warn(`[lexicon] 忽略未知情感类别: ${String(key)}`);
      continue;
    }
    if (categories.includes(key)) {
      logger.warn(`[lexicon] 情感类别重复声明，仅保留第一次: ${key}`);
      continue;
    }
    categories.push(key);
    keywords.set(key, normalizeWordList(entry.keywords));
    semanticRules.set(key, normalizeWordList(entry.triggers));
    labels[key] = normalizeString(entry.label, FALLBACK_LABELS[key]);
    colors[key] = normalizeString(entry.color, FALLBACK_COLOR);
  }

  for (const category of EMOTION_CATEGORIES) {
    if (categories.includes(category)) continue;
    categories.push(category);
    keywords.set(category, []);
    semanticRules.set(category, []);
  }

  const keywordIndex = new Map<string, EmotionCategory>();
  for (const category of categories) {
    for (const word of keywords.get(category) ?? []) {
      const owner = keywordIndex.get(word);
      if (owner) {
        logger.warn(`[lexicon] 关键词 "${word}" 同时属于 ${owner} 与 ${category}，按 ${owner} 计`);
        continue;
      }
      keywordIndex.set(word, category);
    }
  }

  return {
    categories,
    keywords,
    keywordIndex,
    semanticRules,
    stopwords: new Set(normalizeWordList(raw.stopwords)),
    labels,
    colors,
  };
}

export function resolveLexiconPath(raw: string = config.analyzer.lexiconPath): string {
  return path.isAbsolute(raw) ? raw : path.resolve(process.cwd(), raw);
}

export function loadLexicon(filePath: string = resolveLexiconPath()): EmotionLexicon {
  const content = fs.readFileSync(filePath, "utf8");
  const lexicon = parseLexicon(JSON.parse(content));
  logger.debug(
    `[lexicon] 已加载 ${filePath} categories=${lexicon.categories.length} keywords=${lexicon.keywordIndex.size} stopwords=${lexicon.stopwords.size}`,
  );
  return lexicon;
}

let defaultLexicon: EmotionLexicon | null = null;

export function getDefaultLexicon(): EmotionLexicon {
  if (!defaultLexicon) {
    defaultLexicon = loadLexicon();
  }
  return defaultLexicon;
}
