import { isEmotionCategory, type EmotionCategory } from "../../emotion/types";
import { getLlmSetupSummary } from "../../llm/factory";
import { exportAnalysisReport, isReportFormat, saveReport } from "../../report/export";
import { clearSession } from "../../session/history_store";
import { splitFragments } from "../../story/fragments";
import {
  ENHANCEMENT_TYPES,
  STORY_LENGTHS,
  STORY_STYLES,
  type EnhancementType,
  type StoryLength,
  type StoryPromptInput,
  type StoryStyle,
} from "../../story/prompt";
import { formatAnalysisOutput, formatChartOutput, formatHistoryOutput, formatStoryOutput } from "../format";
import { defaultCommandMiddlewares, runMiddlewares } from "./middleware";
import type {
  CommandDefinition,
  CommandExecutionContext,
  CommandMiddleware,
  ParsedCommand,
  RegisteredCommand,
} from "./types";

type EmptyPayload = Record<string, never>;

const emptyPayload: EmptyPayload = {};

function defineCommand<Payload>(definition: CommandDefinition<Payload>): RegisteredCommand {
  return {
    name: definition.name,
    help: definition.help,
    match(message) {
      const payload = definition.parse(message);
      if (payload === null) return null;
      return {
        name: definition.name,
        requiresLlm: definition.requiresLlm === true,
        run: (context) => definition.execute(context, payload),
      };
    },
  };
}

function splitParts(message: string): string[] {
  return message.trim().split(/\s+/);
}

/** 匹配 "/命令" 或 "/命令 参数"，返回参数部分 */
function matchCommand(message: string, name: string): string | null {
  const trimmed = message.trim();
  if (trimmed === name) return "";
  if (trimmed.startsWith(`${name} `)) return trimmed.slice(name.length + 1).trim();
  return null;
}

function findKey<Key extends string>(
  keys: readonly Key[],
  labelOf: (key: Key) => string,
  value: string,
): Key | undefined {
  return keys.find((key) => key === value || labelOf(key) === value);
}

const STYLE_KEYS: readonly StoryStyle[] = ["novel", "film", "prose_poem", "diary", "memoir", "dream"];
const LENGTH_KEYS: readonly StoryLength[] = ["short", "medium", "long"];
const ENHANCEMENT_KEYS: readonly EnhancementType[] = ["details", "emotion", "imagery", "plot"];

export function parseStyle(value: string): StoryStyle | undefined {
  return findKey(STYLE_KEYS, (key) => STORY_STYLES[key], value);
}

export function parseLength(value: string): StoryLength | undefined {
  return findKey(LENGTH_KEYS, (key) => STORY_LENGTHS[key].label, value);
}

export function parseEnhancementType(value: string): EnhancementType | undefined {
  return findKey(ENHANCEMENT_KEYS, (key) => ENHANCEMENT_TYPES[key].label, value);
}

export type StoryArgs = {
  request: StoryPromptInput;
  errors: string[];
};

/**
 * "--style=diary --tone=sorrow --length=short --req=... 碎片 碎片，碎片"
 * 选项值接受英文 key 或中文名；其余部分按空白与常用分隔符切成碎片。
 */
export function parseStoryArgs(raw: string, labels: Readonly<Record<EmotionCategory, string>>): StoryArgs {
  const request: StoryPromptInput = { fragments: [] };
  const errors: string[] = [];
  const rest: string[] = [];

  for (const part of raw.trim().split(/\s+/).filter(Boolean)) {
    const option = part.match(/^--(style|tone|length|req)=(.*)$/);
    if (!option) {
      rest.push(part);
      continue;
    }
    const [, key, value] = option;
    switch (key) {
      case "style": {
        const style = parseStyle(value);
        if (style) request.style = style;
        else errors.push(`未知风格: ${value}`);
        break;
      }
      case "tone": {
        const tone = isEmotionCategory(value)
          ? value
          : Object.entries(labels).find(([, label]) => label === value)?.[0];
        if (isEmotionCategory(tone)) request.tone = tone;
        else errors.push(`未知情感基调: ${value}`);
        break;
      }
      case "length": {
        const length = parseLength(value);
        if (length) request.length = length;
        else errors.push(`未知长度: ${value}`);
        break;
      }
      case "req":
        request.customRequirements = value;
        break;
    }
  }

  request.fragments = splitFragments(rest.join("，"));
  return { request, errors };
}

function withLatestTone(context: CommandExecutionContext, request: StoryPromptInput): StoryPromptInput {
  if (request.tone) return request;
  const latest = context.session.emotions.latest()?.result.dominantEmotion;
  return latest ? { ...request, tone: latest } : request;
}

function getCommandHelpText(): string {
  return commandRegistry
    .map((definition) => definition.help?.trim() || "")
    .filter(Boolean)
    .join("\n");
}

const STORY_USAGE = "用法：/故事 [--style=风格] [--tone=情感] [--length=短|中等|长] [--req=额外要求] 碎片1，碎片2";

const builtInCommands: RegisteredCommand[] = [
  defineCommand({
    name: "help",
    help: "/帮助  查看命令",
    parse(message) {
      return matchCommand(message, "/帮助") === "" ? emptyPayload : null;
    },
    async execute(context) {
      context.print(getCommandHelpText());
    },
  }),
  defineCommand({
    name: "analyze",
    help: "/分析 <文本>  分析情感光谱（直接输入文本亦可）",
    parse(message) {
      const text = matchCommand(message, "/分析");
      return text === null ? null : { text };
    },
    async execute(context, payload) {
      await analyzeText(context, payload.text);
    },
  }),
  defineCommand({
    name: "story",
    help: "/故事 [选项] <碎片>  根据记忆碎片生成故事",
    requiresLlm: true,
    parse(message) {
      const args = matchCommand(message, "/故事");
      return args === null ? null : { args };
    },
    async execute(context, payload) {
      const { request, errors } = parseStoryArgs(payload.args, context.analyzer.lexicon.labels);
      if (errors.length > 0 || request.fragments.length === 0) {
        context.print([...errors, STORY_USAGE].join("\n"));
        return;
      }
      context.print("正在创作故事...");
      const result = await context.generator.generateStory(withLatestTone(context, request));
      if (!result.success) {
        context.print(`故事生成失败：${result.error}`);
        return;
      }
      context.session.stories.append(result);
      context.print(formatStoryOutput(result));
    },
  }),
  defineCommand({
    name: "versions",
    help: "/多版本 [数量] [选项] <碎片>  顺序生成多个版本",
    requiresLlm: true,
    parse(message) {
      const args = matchCommand(message, "/多版本");
      if (args === null) return null;
      const [first = "", ...others] = splitParts(args);
      const count = Number(first);
      if (Number.isSafeInteger(count) && count > 0) {
        return { count, args: others.join(" ") };
      }
      return { count: undefined, args };
    },
    async execute(context, payload) {
      const { request, errors } = parseStoryArgs(payload.args, context.analyzer.lexicon.labels);
      if (errors.length > 0 || request.fragments.length === 0) {
        context.print([...errors, "用法：/多版本 [数量] [选项] 碎片1，碎片2"].join("\n"));
        return;
      }
      const count = payload.count ?? context.appConfig.story.defaultVersions;
      context.print(`正在生成 ${count} 个版本...`);
      const versions = await context.generator.generateVersions(withLatestTone(context, request), count);
      if (versions.length === 0) {
        context.print("所有版本均生成失败，请稍后重试");
        return;
      }
      for (const version of versions) {
        context.session.stories.append(version);
        context.print(formatStoryOutput(version));
      }
    },
  }),
  defineCommand({
    name: "enhance",
    help: `/增强 [${ENHANCEMENT_KEYS.map((key) => ENHANCEMENT_TYPES[key].label).join("|")}]  增强最近一篇故事`,
    requiresLlm: true,
    parse(message) {
      const args = matchCommand(message, "/增强");
      if (args === null) return null;
      if (!args) return { type: "details" as const };
      const type = parseEnhancementType(args);
      return type ? { type } : null;
    },
    async execute(context, payload) {
      const latest = context.session.stories.latest();
      if (!latest) {
        context.print("还没有可增强的故事，请先使用 /故事");
        return;
      }
      const result = await context.generator.enhanceStory(latest.story, payload.type);
      if (!result.success) {
        context.print(`故事增强失败：${result.error}`);
        return;
      }
      const enhanced = {
        ...latest,
        story: result.enhancedStory,
        metadata: {
          ...latest.metadata,
          characterCount: result.enhancedLength,
          generatedAt: context.now(),
        },
      };
      context.session.stories.append(enhanced);
      context.print(
        `${formatStoryOutput(enhanced)}\n${ENHANCEMENT_TYPES[result.enhancementType].label}：${result.originalLength}字 → ${result.enhancedLength}字`,
      );
    },
  }),
  defineCommand({
    name: "history",
    help: "/历史  查看分析记录",
    parse(message) {
      return matchCommand(message, "/历史") === "" ? emptyPayload : null;
    },
    async execute(context) {
      const lexicon = context.analyzer.lexicon;
      context.print(formatHistoryOutput(context.session.emotions.list(), lexicon));
      context.print(`故事记录 ${context.session.stories.size} 篇`);
    },
  }),
  defineCommand({
    name: "chart",
    help: "/图表  最近一次分析的分布与词频",
    parse(message) {
      return matchCommand(message, "/图表") === "" ? emptyPayload : null;
    },
    async execute(context) {
      const latest = context.session.emotions.latest();
      if (!latest) {
        context.print("暂无分析记录");
        return;
      }
      context.print(formatChartOutput(latest.result, context.analyzer.lexicon));
    },
  }),
  defineCommand({
    name: "export",
    help: "/导出 [markdown|text|json]  导出最近一次分析报告",
    parse(message) {
      const args = matchCommand(message, "/导出");
      if (args === null) return null;
      if (!args) return { format: "markdown" as const };
      return isReportFormat(args) ? { format: args } : null;
    },
    async execute(context, payload) {
      const latest = context.session.emotions.latest();
      if (!latest) {
        context.print("暂无分析记录，无法导出");
        return;
      }
      const now = new Date(context.now());
      const content = exportAnalysisReport(latest.result, payload.format, {
        labels: context.analyzer.lexicon.labels,
        order: context.analyzer.lexicon.categories,
        text: latest.text,
        now,
      });
      const filePath = await saveReport(content, payload.format, {
        outputDir: context.appConfig.report.outputDir,
        now,
      });
      context.print(`报告已导出：${filePath}`);
    },
  }),
  defineCommand({
    name: "clear",
    help: "/清空  清空分析与故事记录",
    parse(message) {
      return matchCommand(message, "/清空") === "" ? emptyPayload : null;
    },
    async execute(context) {
      clearSession(context.session);
      context.print("已清空所有记录");
    },
  }),
  defineCommand({
    name: "status",
    help: "/状态  查看服务状态",
    parse(message) {
      return matchCommand(message, "/状态") === "" ? emptyPayload : null;
    },
    async execute(context) {
      const lexicon = context.analyzer.lexicon;
      context.print(
        [
          getLlmSetupSummary(context.generator.client),
          `lexicon categories=${lexicon.categories.length} keywords=${lexicon.keywordIndex.size} stopwords=${lexicon.stopwords.size}`,
          `history emotions=${context.session.emotions.size} stories=${context.session.stories.size}`,
        ].join("\n"),
      );
    },
  }),
  // 非命令文本直接分析
  defineCommand({
    name: "analyze_plain",
    parse(message) {
      const text = message.trim();
      if (!text || text.startsWith("/")) return null;
      return { text };
    },
    async execute(context, payload) {
      await analyzeText(context, payload.text);
    },
  }),
];

async function analyzeText(context: CommandExecutionContext, text: string): Promise<void> {
  if (!text.trim()) {
    context.print("用法：/分析 <文本>");
    return;
  }
  const result = context.analyzer.analyze(text);
  context.session.emotions.append({ text, result, analyzedAt: context.now() });
  context.print(formatAnalysisOutput(result, context.analyzer.summarize(result), context.analyzer.lexicon));
}

const commandRegistry: readonly RegisteredCommand[] = builtInCommands;

export function getCommandRegistry(): readonly RegisteredCommand[] {
  return commandRegistry;
}

export function parseCommand(message: string): ParsedCommand | null {
  for (const definition of commandRegistry) {
    const parsed = definition.match(message);
    if (parsed) return parsed;
  }
  return null;
}

/** 解析并执行一行输入；无法识别时返回 false */
export async function executeCommand(
  message: string,
  context: CommandExecutionContext,
  middlewares: readonly CommandMiddleware[] = defaultCommandMiddlewares,
): Promise<boolean> {
  const command = parseCommand(message);
  if (!command) return false;
  await runMiddlewares({ ...context, command }, middlewares, () => command.run(context));
  return true;
}
