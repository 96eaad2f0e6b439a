import type { TokenSequence } from "./types";

/** 分词策略；同一输入必须得到同一结果 */
export interface WordSegmenter {
  segment(text: string): string[];
}

/** 基于 ICU 词典的中文分词（Intl.Segmenter word 粒度） */
export class IntlWordSegmenter implements WordSegmenter {
  private readonly segmenter: Intl.Segmenter;

  constructor(locale = "zh-CN") {
    this.segmenter = new Intl.Segmenter(locale, { granularity: "word" });
  }

  segment(text: string): string[] {
    return Array.from(this.segmenter.segment(text), (item) => item.segment);
  }
}

/** 按空白切分，用于已分好词的输入 */
export class WhitespaceSegmenter implements WordSegmenter {
  segment(text: string): string[] {
    return text.split(/\s+/);
  }
}

const NON_WORD_CHARS = /[^\u4e00-\u9fa5a-zA-Z0-9\s]/g;

/** 只保留中文、英文字母、数字和空白 */
export function stripNonWordChars(text: string): string {
  return text.replace(NON_WORD_CHARS, "");
}

export type TokenizeOptions = {
  segmenter: WordSegmenter;
  stopwords: ReadonlySet<string>;
};

export function tokenize(text: string, options: TokenizeOptions): TokenSequence {
  const cleaned = stripNonWordChars(text);
  if (!cleaned.trim()) return [];

  const tokens: TokenSequence = [];
  for (const segment of options.segmenter.segment(cleaned)) {
    const word = segment.trim();
    // 单字词一律丢弃
    if (word.length < 2) continue;
    if (options.stopwords.has(word)) continue;
    tokens.push(word);
  }
  return tokens;
}
