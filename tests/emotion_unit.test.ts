import assert from "node:assert/strict";

import { EmotionAnalyzer, analyze, createEmptyResult, getDefaultAnalyzer, summarize } from "../src/emotion/analyzer";
import { computeDiversity, normalize, selectDominant } from "../src/emotion/aggregator";
import { getDefaultLexicon, parseLexicon } from "../src/emotion/lexicon";
import { MATCH_WEIGHTS, matchTokens, score } from "../src/emotion/matcher";
import { AfinnPolarityScorer, scorePolarity, type PolarityScore, type PolarityScorer } from "../src/emotion/polarity";
import {
  NO_EMOTION_SUMMARY,
  attributeKeywords,
  diversityLevel,
  rankEmotions,
  summarize as summarizeWith,
} from "../src/emotion/reporter";
import { WhitespaceSegmenter, stripNonWordChars, tokenize } from "../src/emotion/tokenizer";
import { EMOTION_CATEGORIES, type AnalysisResult, type EmotionCategory } from "../src/emotion/types";
import { logger } from "../src/utils/logger";

async function runTest(name: string, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
    console.log(`PASS ${name}`);
  } catch (error) {
    console.error(`FAIL ${name}`);
    console.error(error);
    process.exitCode = 1;
  }
}

function approx(actual: number | undefined, expected: number, epsilon = 1e-9): void {
  assert.equal(typeof actual, "number");
  assert.ok(
    Math.abs((actual ?? Number.NaN) - expected) < epsilon,
    `expected ${expected}, got ${String(actual)}`,
  );
}

class FixedScorer implements PolarityScorer {
  calls: string[] = [];

  constructor(private readonly value: PolarityScore) {}

  score(text: string): PolarityScore {
    this.calls.push(text);
    return this.value;
  }
}

class ThrowingScorer implements PolarityScorer {
  score(): PolarityScore {
    throw new Error("scorer offline");
  }
}

const testLexicon = parseLexicon({
  version: 1,
  categories: [
    { key: "joy", label: "喜悦", color: "#FFD700", keywords: ["开心", "快乐"], triggers: ["笑"] },
    { key: "sorrow", label: "忧伤", color: "#4682B4", keywords: ["悲伤", "难过极了"], triggers: ["哭"] },
    { key: "warmth", label: "温暖", color: "#FF8C69", keywords: ["温暖", "阳光"], triggers: ["家"] },
    { key: "calm", label: "平静", color: "#87CEEB", keywords: ["平静"], triggers: ["静"] },
  ],
  stopwords: ["我们", "今天"],
});

const segmenter = new WhitespaceSegmenter();
const neutral = (): FixedScorer => new FixedScorer({ polarity: 0, subjectivity: 0 });

function weightSum(result: AnalysisResult): number {
  return Object.values(result.emotionWeights).reduce((sum, value) => sum + (value ?? 0), 0);
}

async function main() {
  logger.setLevel("error");

  await runTest("lexicon parse keeps declaration order and appends missing categories", async () => {
    assert.deepEqual(testLexicon.categories, [
      "joy",
      "sorrow",
      "warmth",
      "calm",
      "longing",
      "loss",
      "anticipation",
      "helplessness",
    ]);
    assert.equal(testLexicon.keywordIndex.get("难过极了"), "sorrow");
    assert.deepEqual(testLexicon.keywords.get("longing"), []);
    assert.equal(testLexicon.labels.longing, "思念");
    assert.equal(testLexicon.colors.joy, "#FFD700");
    assert.equal(testLexicon.stopwords.has("我们"), true);
  });

  await runTest("lexicon parse ignores unknown categories and keeps first duplicate keyword", async () => {
    const lexicon = parseLexicon({
      categories: [
        { key: "joy", keywords: ["开心", "开心"] },
        { key: "anger", keywords: ["愤怒"] },
        { key: "warmth", keywords: ["开心", "温暖"] },
      ],
    });
    assert.equal(lexicon.keywordIndex.get("开心"), "joy");
    assert.equal(lexicon.keywordIndex.has("愤怒"), false);
    assert.deepEqual(lexicon.keywords.get("joy"), ["开心"]);
    assert.deepEqual(lexicon.keywords.get("warmth"), ["开心", "温暖"]);
    assert.equal(lexicon.stopwords.size, 0);
  });

  await runTest("lexicon parse rejects payload without categories", async () => {
    assert.throws(() => parseLexicon({ stopwords: [] }), /categories/);
    assert.throws(() => parseLexicon(null), /categories/);
  });

  await runTest("bundled lexicon covers every category with twelve keywords", async () => {
    const lexicon = getDefaultLexicon();
    assert.deepEqual(lexicon.categories, EMOTION_CATEGORIES);
    for (const category of EMOTION_CATEGORIES) {
      assert.equal(lexicon.keywords.get(category)?.length, 12, category);
      assert.ok((lexicon.semanticRules.get(category)?.length ?? 0) > 0, category);
    }
    assert.equal(lexicon.keywordIndex.size, 96);
    assert.equal(lexicon.labels.helplessness, "无助");
    for (const word of lexicon.stopwords) {
      assert.equal(lexicon.keywordIndex.has(word), false, word);
    }
  });

  await runTest("tokenizer strips punctuation and drops short words and stopwords", async () => {
    const options = { segmenter, stopwords: testLexicon.stopwords };
    assert.equal(stripNonWordChars("开心！ok, 123…"), "开心ok 123");
    assert.deepEqual(tokenize("我们 开心！ 的 快乐a", options), ["开心", "快乐a"]);
    assert.deepEqual(tokenize("   ", options), []);
    assert.deepEqual(tokenize("！！！……", options), []);
  });

  await runTest("default segmenter yields multi-character non-stopword tokens", async () => {
    const analyzer = new EmotionAnalyzer({ polarityScorer: neutral() });
    const words = analyzer.tokenize("今天和家人一起吃饭，真的很开心！");
    assert.ok(words.length > 0);
    for (const word of words) {
      assert.ok(word.length >= 2, word);
      assert.equal(analyzer.lexicon.stopwords.has(word), false, word);
    }
  });

  await runTest("matcher exact hit also fires fuzzy contains", async () => {
    const scorer = neutral();
    const report = matchTokens(["开心"], testLexicon, scorer);
    approx(report.scores.get("joy"), MATCH_WEIGHTS.exact + MATCH_WEIGHTS.fuzzyContains);
    assert.equal(report.exactMatches, 1);
    assert.equal(report.fuzzyMatches, 1);
    assert.equal(report.semanticScore, 0);
    assert.deepEqual(report.hits, [
      { token: "开心", category: "joy", pass: "exact" },
      { token: "开心", category: "joy", pass: "fuzzy" },
    ]);
    assert.equal(report.polarity, null);
    assert.equal(scorer.calls.length, 0);
  });

  await runTest("matcher scores fuzzy contains, fuzzy contained and semantic triggers", async () => {
    const contains = score(["快乐家"], testLexicon, neutral());
    approx(contains.get("joy"), 0.8);
    approx(contains.get("warmth"), 0.4);

    const contained = matchTokens(["难过"], testLexicon, neutral());
    approx(contained.scores.get("sorrow"), 0.6);
    assert.deepEqual(contained.hits, [{ token: "难过", category: "sorrow", pass: "fuzzy" }]);

    const semantic = matchTokens(["家笑"], testLexicon, neutral());
    approx(semantic.scores.get("joy"), 0.4);
    approx(semantic.scores.get("warmth"), 0.4);
    approx(semantic.semanticScore, 0.8);
    assert.deepEqual(semantic.hits, []);
  });

  await runTest("matcher consults polarity only when matches are scarce", async () => {
    const scorer = neutral();
    matchTokens(["开心", "难过"], testLexicon, scorer);
    assert.equal(scorer.calls.length, 0);

    matchTokens(["难过", "随便"], testLexicon, scorer);
    assert.deepEqual(scorer.calls, ["难过 随便"]);
  });

  await runTest("polarity fallback branches", async () => {
    const positive = matchTokens(["随便"], testLexicon, new FixedScorer({ polarity: 0.5, subjectivity: 0.6 }));
    approx(positive.scores.get("joy"), 0.75);
    approx(positive.scores.get("warmth"), 0.5);
    assert.deepEqual(positive.fallbacks, ["polarity_positive"]);

    const negative = matchTokens(["随便"], testLexicon, new FixedScorer({ polarity: -0.4, subjectivity: 0.5 }));
    approx(negative.scores.get("sorrow"), 0.6);
    approx(negative.scores.get("loss"), 0.4);
    assert.deepEqual(negative.fallbacks, ["polarity_negative"]);

    const mixed = matchTokens(["随便"], testLexicon, new FixedScorer({ polarity: 0.05, subjectivity: 0.6 }));
    approx(mixed.scores.get("longing"), 0.3);
    approx(mixed.scores.get("calm"), 0.2);
    assert.deepEqual(mixed.fallbacks, ["polarity_neutral"]);

    const gap = matchTokens(["随便"], testLexicon, new FixedScorer({ polarity: 0.15, subjectivity: 0.6 }));
    assert.deepEqual([...gap.scores.entries()], [["calm", 0.3]]);
    assert.deepEqual(gap.fallbacks, ["calm_floor"]);

    const objective = matchTokens(["随便"], testLexicon, neutral());
    assert.deepEqual([...objective.scores.entries()], [["calm", 0.1]]);
  });

  await runTest("polarity scorer failures degrade to the calm floor", async () => {
    const thrown = matchTokens(["随便"], testLexicon, new ThrowingScorer());
    assert.deepEqual([...thrown.scores.entries()], [["calm", 0.1]]);
    assert.equal(thrown.polarity?.ok, false);
    assert.deepEqual(thrown.fallbacks, ["calm_floor"]);

    const invalid = scorePolarity(new FixedScorer({ polarity: Number.NaN, subjectivity: 1 }), "x");
    assert.equal(invalid.ok, false);
  });

  await runTest("matcher returns empty scores for empty tokens", async () => {
    const scorer = neutral();
    const report = matchTokens([], testLexicon, scorer);
    assert.equal(report.scores.size, 0);
    assert.equal(scorer.calls.length, 0);
  });

  await runTest("afinn scorer maps comparative score into polarity range", async () => {
    const scorer = new AfinnPolarityScorer();
    const positive = scorer.score("good");
    approx(positive.polarity, 3 / 5);
    approx(positive.subjectivity, 1);

    const unknown = scorer.score("开心");
    assert.deepEqual(unknown, { polarity: 0, subjectivity: 0 });
  });

  await runTest("aggregator smooths with square root and normalizes", async () => {
    const result = normalize(new Map<EmotionCategory, number>([["joy", 4], ["sorrow", 1]]));
    approx(result.weights.joy, 2 / 3);
    approx(result.weights.sorrow, 1 / 3);
    assert.equal(result.dominant, "joy");
    approx(result.diversity, 0.9182958340544896);
  });

  await runTest("aggregator drops non-positive scores and handles empty input", async () => {
    const result = normalize(new Map<EmotionCategory, number>([["joy", 0], ["sorrow", -1]]));
    assert.deepEqual(result.weights, {});
    assert.equal(result.dominant, null);
    assert.equal(result.diversity, 0);
  });

  await runTest("dominant ties resolve by declaration order", async () => {
    const raw = new Map<EmotionCategory, number>([["warmth", 1], ["joy", 1]]);
    assert.equal(normalize(raw).dominant, "joy");
    assert.equal(selectDominant({ warmth: 0.5, joy: 0.5 }, ["warmth", "joy"]), "warmth");
  });

  await runTest("diversity is normalized entropy", async () => {
    approx(computeDiversity({ joy: 0.25, sorrow: 0.25, warmth: 0.25, calm: 0.25 }), 1);
    assert.equal(computeDiversity({ calm: 1 }), 0);
    assert.equal(computeDiversity({}), 0);
  });

  await runTest("reporter attributes keywords and ranks emotions", async () => {
    const attribution = attributeKeywords([
      { token: "开心", category: "joy", pass: "exact" },
      { token: "开心", category: "joy", pass: "fuzzy" },
      { token: "快乐家", category: "joy", pass: "fuzzy" },
      { token: "难过", category: "sorrow", pass: "fuzzy" },
    ]);
    assert.deepEqual(attribution, { joy: ["开心", "快乐家"], sorrow: ["难过"] });
    assert.deepEqual(Object.keys(attribution), ["joy", "sorrow"]);

    assert.deepEqual(rankEmotions({ warmth: 0.5, joy: 0.5, calm: 0 }), [
      { category: "joy", weight: 0.5 },
      { category: "warmth", weight: 0.5 },
    ]);
  });

  await runTest("reporter diversity levels use strict thresholds", async () => {
    assert.equal(diversityLevel(0.71), "highly_diverse");
    assert.equal(diversityLevel(0.7), "moderately_diverse");
    assert.equal(diversityLevel(0.41), "moderately_diverse");
    assert.equal(diversityLevel(0.4), "singular");
  });

  await runTest("reporter summary names dominant and up to two secondary emotions", async () => {
    const result: AnalysisResult = {
      emotionWeights: { joy: 0.52, warmth: 0.3, calm: 0.18 },
      emotionKeywords: {},
      dominantEmotion: "joy",
      emotionDiversity: 0.8,
      processedWords: [],
      wordCount: 0,
    };
    assert.equal(
      summarizeWith(result, { labels: testLexicon.labels }),
      "主导情感是**喜悦**（权重: 0.52）；次要情感包括: 温暖(0.30), 平静(0.18)；情感状态较为复杂多样。",
    );

    const single: AnalysisResult = { ...result, emotionWeights: { calm: 1 }, dominantEmotion: "calm", emotionDiversity: 0 };
    assert.equal(summarizeWith(single, { labels: testLexicon.labels }), "主导情感是**平静**（权重: 1.00）；情感状态相对单一。");

    assert.equal(summarizeWith(createEmptyResult(), { labels: testLexicon.labels }), NO_EMOTION_SUMMARY);
  });

  await runTest("analyzer runs the full pipeline on pre-segmented text", async () => {
    const scorer = neutral();
    const analyzer = new EmotionAnalyzer({ lexicon: testLexicon, segmenter, polarityScorer: scorer });
    const result = analyzer.analyze("开心 难过！");

    assert.deepEqual(result.processedWords, ["开心", "难过"]);
    assert.equal(result.wordCount, 2);
    approx(result.emotionWeights.joy, 0.6619211691487806);
    approx(result.emotionWeights.sorrow, 0.3380788308512195);
    assert.deepEqual(Object.keys(result.emotionWeights), ["joy", "sorrow"]);
    assert.deepEqual(result.emotionKeywords, { joy: ["开心"], sorrow: ["难过"] });
    assert.equal(result.dominantEmotion, "joy");
    approx(result.emotionDiversity, 0.9229684026471769);
    assert.equal(
      analyzer.summarize(result),
      "主导情感是**喜悦**（权重: 0.66）；次要情感包括: 忧伤(0.34)；情感状态较为复杂多样。",
    );
    assert.deepEqual(analyzer.analyze("开心 难过！"), result);
  });

  await runTest("analyzer returns empty result for blank text and filtered tokens", async () => {
    const analyzer = new EmotionAnalyzer({ lexicon: testLexicon, segmenter, polarityScorer: neutral() });
    assert.deepEqual(analyzer.analyze("   "), createEmptyResult());
    assert.deepEqual(analyzer.analyze("的 了 我们"), createEmptyResult());
    assert.equal(analyzer.summarize(analyzer.analyze("")), NO_EMOTION_SUMMARY);
  });

  await runTest("analyzer rejects non-string input", async () => {
    const analyzer = new EmotionAnalyzer({ lexicon: testLexicon, segmenter, polarityScorer: neutral() });
    assert.throws(() => Reflect.apply(analyzer.analyze, analyzer, [42]), TypeError);
  });

  await runTest("analyzer on bundled lexicon weighs warmth over joy", async () => {
    const analyzer = new EmotionAnalyzer({ segmenter, polarityScorer: neutral() });
    const result = analyzer.analyze("开心 温暖 阳光");
    approx(result.emotionWeights.joy, 0.4337905459690627);
    approx(result.emotionWeights.warmth, 0.5662094540309373);
    assert.equal(result.dominantEmotion, "warmth");
    assert.deepEqual(result.emotionKeywords, { joy: ["开心"], warmth: ["温暖", "阳光"] });

    const calm = analyzer.analyze("平静");
    assert.deepEqual(calm.emotionWeights, { calm: 1 });
    assert.equal(calm.emotionDiversity, 0);
  });

  await runTest("module-level analyze and summarize share the default analyzer", async () => {
    assert.equal(getDefaultAnalyzer(), getDefaultAnalyzer());
    const text = "心里很平静，也很安心";
    const result = analyze(text);
    assert.deepEqual(result, getDefaultAnalyzer().analyze(text));
    assert.equal(summarize(result), getDefaultAnalyzer().summarize(result));
    assert.deepEqual(analyze(" "), createEmptyResult());
    assert.equal(summarize(analyze(" ")), NO_EMOTION_SUMMARY);
  });

  await runTest("analyzer with default segmenter produces normalized weights", async () => {
    const analyzer = new EmotionAnalyzer({ polarityScorer: neutral() });
    const result = analyzer.analyze("和家人一起吃饭，真的很开心！");
    approx(weightSum(result), 1, 1e-6);
    assert.ok(result.dominantEmotion === "joy" || result.dominantEmotion === "warmth");
    for (const value of Object.values(result.emotionWeights)) {
      assert.ok(value !== undefined && value >= 0 && value <= 1);
    }
    assert.ok(result.emotionDiversity >= 0 && result.emotionDiversity <= 1);
  });

  await runTest("sunny diary sentence ranks joy or warmth near the top and is repeatable", async () => {
    const analyzer = new EmotionAnalyzer({ polarityScorer: neutral() });
    const text = "今天阳光很好，心情特别开心，笑容满面地走在路上。";
    const result = analyzer.analyze(text);
    const top = rankEmotions(result.emotionWeights, analyzer.lexicon.categories)
      .slice(0, 3)
      .map((item) => item.category);
    assert.ok(top.includes("joy") || top.includes("warmth"), top.join(","));
    assert.deepEqual(analyzer.analyze(text), result);
  });
}

void main();
