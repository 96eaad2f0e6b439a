import { logger } from "../utils/logger";
import type { EmotionLexicon } from "./lexicon";
import {
  NEUTRAL_POLARITY,
  scorePolarity,
  type PolarityOutcome,
  type PolarityScorer,
} from "./polarity";
import type { EmotionCategory, RawScoreMap, TokenSequence } from "./types";

/** 各匹配阶段的加分 */
export const MATCH_WEIGHTS = {
  exact: 1.5,
  fuzzyContains: 0.8,
  fuzzyContained: 0.6,
  semantic: 0.4,
} as const;

/** 模糊匹配允许的长度差 */
export const FUZZY_LENGTH_TOLERANCE = 2;

export const POLARITY_FALLBACK = {
  /** 匹配总量低于该值时才参考极性评分 */
  maxMatches: 2,
  minSubjectivity: 0.3,
  positiveMin: 0.2,
  negativeMax: -0.2,
  neutralMaxAbs: 0.1,
  neutralMinSubjectivity: 0.5,
} as const;

export type MatchPass = "exact" | "fuzzy";

export type MatchHit = {
  token: string;
  category: EmotionCategory;
  pass: MatchPass;
};

export type FallbackKind =
  | "polarity_positive"
  | "polarity_negative"
  | "polarity_neutral"
  | "calm_floor";

export type MatchReport = {
  scores: RawScoreMap;
  /** 第一、二阶段的命中记录，按发生顺序 */
  hits: MatchHit[];
  exactMatches: number;
  fuzzyMatches: number;
  semanticScore: number;
  /** 未参考极性评分时为 null */
  polarity: PolarityOutcome | null;
  fallbacks: FallbackKind[];
};

export function addScore(scores: RawScoreMap, category: EmotionCategory, delta: number): void {
  scores.set(category, (scores.get(category) ?? 0) + delta);
}

export function sumScores(scores: RawScoreMap): number {
  let total = 0;
  for (const value of scores.values()) total += value;
  return total;
}

function matchExact(
  tokens: TokenSequence,
  lexicon: EmotionLexicon,
  scores: RawScoreMap,
  hits: MatchHit[],
): number {
  let matches = 0;
  for (const token of tokens) {
    const category = lexicon.keywordIndex.get(token);
    if (!category) continue;
    addScore(scores, category, MATCH_WEIGHTS.exact);
    hits.push({ token, category, pass: "exact" });
    matches += 1;
  }
  return matches;
}

function matchFuzzy(
  tokens: TokenSequence,
  lexicon: EmotionLexicon,
  scores: RawScoreMap,
  hits: MatchHit[],
): number {
  let matches = 0;
  for (const token of tokens) {
    for (const category of lexicon.categories) {
      for (const keyword of lexicon.keywords.get(category) ?? []) {
        if (keyword.length < 2) continue;
        let delta = 0;
        if (token.includes(keyword) && token.length <= keyword.length + FUZZY_LENGTH_TOLERANCE) {
          delta = MATCH_WEIGHTS.fuzzyContains;
        } else if (
          keyword.includes(token) &&
          keyword.length <= token.length + FUZZY_LENGTH_TOLERANCE
        ) {
          delta = MATCH_WEIGHTS.fuzzyContained;
        }
        if (delta === 0) continue;
        addScore(scores, category, delta);
        hits.push({ token, category, pass: "fuzzy" });
        matches += 1;
      }
    }
  }
  return matches;
}

/** 语义触发词匹配，一个词可同时命中多个类别 */
function matchSemantic(tokens: TokenSequence, lexicon: EmotionLexicon, scores: RawScoreMap): number {
  let total = 0;
  for (const token of tokens) {
    for (const category of lexicon.categories) {
      for (const trigger of lexicon.semanticRules.get(category) ?? []) {
        if (trigger.includes(token) || token.includes(trigger)) {
          addScore(scores, category, MATCH_WEIGHTS.semantic);
          total += MATCH_WEIGHTS.semantic;
        }
      }
    }
  }
  return total;
}

function applyPolarityFallback(
  polarity: number,
  subjectivity: number,
  scores: RawScoreMap,
): FallbackKind | null {
  if (subjectivity <= POLARITY_FALLBACK.minSubjectivity) return null;

  if (polarity > POLARITY_FALLBACK.positiveMin) {
    addScore(scores, "joy", polarity * 1.5);
    addScore(scores, "warmth", polarity * 1.0);
    return "polarity_positive";
  }
  if (polarity < POLARITY_FALLBACK.negativeMax) {
    addScore(scores, "sorrow", Math.abs(polarity) * 1.5);
    addScore(scores, "loss", Math.abs(polarity) * 1.0);
    return "polarity_negative";
  }
  // 主观但中性的文本往往情感复杂
  if (
    Math.abs(polarity) <= POLARITY_FALLBACK.neutralMaxAbs &&
    subjectivity > POLARITY_FALLBACK.neutralMinSubjectivity
  ) {
    addScore(scores, "longing", 0.3);
    addScore(scores, "calm", 0.2);
    return "polarity_neutral";
  }
  return null;
}

export function matchTokens(
  tokens: TokenSequence,
  lexicon: EmotionLexicon,
  scorer: PolarityScorer,
): MatchReport {
  const scores: RawScoreMap = new Map();
  const hits: MatchHit[] = [];
  const report: MatchReport = {
    scores,
    hits,
    exactMatches: 0,
    fuzzyMatches: 0,
    semanticScore: 0,
    polarity: null,
    fallbacks: [],
  };
  if (tokens.length === 0) return report;

  report.exactMatches = matchExact(tokens, lexicon, scores, hits);
  report.fuzzyMatches = matchFuzzy(tokens, lexicon, scores, hits);
  report.semanticScore = matchSemantic(tokens, lexicon, scores);

  const totalMatches = report.exactMatches + report.fuzzyMatches + report.semanticScore;
  // 匹配充足时分值已为正
  if (totalMatches >= POLARITY_FALLBACK.maxMatches) return report;

  const outcome = scorePolarity(scorer, tokens.join(" "));
  report.polarity = outcome;
  if (!outcome.ok) {
    logger.debug("[emotion] 极性评分失败，按中性处理:", outcome.error.message);
  }
  const { polarity, subjectivity } = outcome.ok ? outcome.score : NEUTRAL_POLARITY;

  const fallback = applyPolarityFallback(polarity, subjectivity, scores);
  if (fallback) report.fallbacks.push(fallback);

  if (sumScores(scores) === 0) {
    addScore(scores, "calm", subjectivity > POLARITY_FALLBACK.minSubjectivity ? 0.3 : 0.1);
    report.fallbacks.push("calm_floor");
  }
  return report;
}

/** 只返回原始分值 */
export function score(
  tokens: TokenSequence,
  lexicon: EmotionLexicon,
  scorer: PolarityScorer,
): RawScoreMap {
  return matchTokens(tokens, lexicon, scorer).scores;
}
