import Sentiment from "sentiment";

import { clamp, clamp01, normalizeError } from "../utils/helpers";

export type PolarityScore = {
  /** 情感倾向，[-1, 1] */
  polarity: number;
  /** 主观程度，[0, 1] */
  subjectivity: number;
};

export interface PolarityScorer {
  score(text: string): PolarityScore;
}

export type PolarityOutcome =
  | { ok: true; score: PolarityScore }
  | { ok: false; error: Error };

/** 评分失败时使用的中性分值 */
export const NEUTRAL_POLARITY: PolarityScore = { polarity: 0, subjectivity: 0 };

/**
 * 基于 AFINN 词表的通用极性评分。
 *
 * polarity 为每词平均分按 AFINN 单词分值上限 5 缩放；subjectivity 为带情感分值的词所占比例。
 * 词表只覆盖英文，中文文本通常得到 0 / 0。
 */
export class AfinnPolarityScorer implements PolarityScorer {
  private readonly sentiment = new Sentiment();

  score(text: string): PolarityScore {
    const result = this.sentiment.analyze(text);
    const tokens = result.tokens.filter(Boolean);
    if (tokens.length === 0) return NEUTRAL_POLARITY;

    const opinionated = result.positive.length + result.negative.length;
    return {
      polarity: clamp(result.score / tokens.length / 5, -1, 1),
      subjectivity: clamp01(opinionated / tokens.length),
    };
  }
}

/** 在局部范围内调用评分器，异常与非法数值都转为失败结果 */
export function scorePolarity(scorer: PolarityScorer, text: string): PolarityOutcome {
  try {
    const score = scorer.score(text);
    if (!Number.isFinite(score.polarity) || !Number.isFinite(score.subjectivity)) {
      return { ok: false, error: new Error("[polarity] 评分结果不是有限数值") };
    }
    return { ok: true, score };
  } catch (error) {
    return { ok: false, error: normalizeError(error) };
  }
}
