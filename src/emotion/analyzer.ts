import { logger } from "../utils/logger";
import { normalize } from "./aggregator";
import { getDefaultLexicon, type EmotionLexicon } from "./lexicon";
import { matchTokens } from "./matcher";
import { AfinnPolarityScorer, type PolarityScorer } from "./polarity";
import { attributeKeywords, summarize as summarizeResult } from "./reporter";
import { IntlWordSegmenter, tokenize, type WordSegmenter } from "./tokenizer";
import type { AnalysisResult } from "./types";

export type EmotionAnalyzerOptions = {
  lexicon?: EmotionLexicon;
  segmenter?: WordSegmenter;
  polarityScorer?: PolarityScorer;
};

export function createEmptyResult(): AnalysisResult {
  return {
    emotionWeights: {},
    emotionKeywords: {},
    dominantEmotion: null,
    emotionDiversity: 0,
    processedWords: [],
    wordCount: 0,
  };
}

/**
 * 情感光谱分析：分词 → 多阶段匹配 → 平滑归一化 → 主导情感与多样性。
 *
 * 实例只持有只读的词典与策略对象，可在多个请求间共享。
 */
export class EmotionAnalyzer {
  readonly lexicon: EmotionLexicon;
  private readonly segmenter: WordSegmenter;
  private readonly polarityScorer: PolarityScorer;

  constructor(options: EmotionAnalyzerOptions = {}) {
    this.lexicon = options.lexicon ?? getDefaultLexicon();
    this.segmenter = options.segmenter ?? new IntlWordSegmenter();
    this.polarityScorer = options.polarityScorer ?? new AfinnPolarityScorer();
  }

  tokenize(text: string): string[] {
    return tokenize(text, { segmenter: this.segmenter, stopwords: this.lexicon.stopwords });
  }

  analyze(text: string): AnalysisResult {
    if (typeof text !== "string") {
      throw new TypeError(`[emotion] analyze 需要字符串输入，收到 ${typeof text}`);
    }
    if (!text.trim()) return createEmptyResult();

    const words = this.tokenize(text);
    const report = matchTokens(words, this.lexicon, this.polarityScorer);
    const { weights, dominant, diversity } = normalize(report.scores, this.lexicon.categories);

    logger.debug(
      `[emotion] words=${words.length} exact=${report.exactMatches} fuzzy=${report.fuzzyMatches} ` +
        `semantic=${report.semanticScore.toFixed(1)} fallbacks=${report.fallbacks.join(",") || "-"} ` +
        `dominant=${dominant ?? "-"}`,
    );

    return {
      emotionWeights: weights,
      emotionKeywords: attributeKeywords(report.hits),
      dominantEmotion: dominant,
      emotionDiversity: diversity,
      processedWords: words,
      wordCount: words.length,
    };
  }

  summarize(result: AnalysisResult): string {
    return summarizeResult(result, {
      labels: this.lexicon.labels,
      order: this.lexicon.categories,
    });
  }
}

let defaultAnalyzer: EmotionAnalyzer | null = null;

export function getDefaultAnalyzer(): EmotionAnalyzer {
  if (!defaultAnalyzer) {
    defaultAnalyzer = new EmotionAnalyzer();
  }
  return defaultAnalyzer;
}

export function analyze(text: string): AnalysisResult {
  return getDefaultAnalyzer().analyze(text);
}

export function summarize(result: AnalysisResult): string {
  return getDefaultAnalyzer().summarize(result);
}
