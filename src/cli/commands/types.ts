import type { AppConfig } from "../../config";
import type { EmotionAnalyzer } from "../../emotion/analyzer";
import type { Session } from "../../session/history_store";
import type { StoryGenerator } from "../../story/generator";

export type CommandExecutionContext = {
  analyzer: EmotionAnalyzer;
  generator: StoryGenerator;
  session: Session;
  appConfig: AppConfig;
  print: (text: string) => void;
  now: () => number;
};

export type CommandDefinition<Payload> = {
  name: string;
  help?: string;
  /** 需要可用的文本生成服务 */
  requiresLlm?: boolean;
  parse: (message: string) => Payload | null;
  execute: (context: CommandExecutionContext, payload: Payload) => Promise<void>;
};

/** 已解析的命令，payload 封在 run 闭包里 */
export type ParsedCommand = {
  name: string;
  requiresLlm: boolean;
  run: (context: CommandExecutionContext) => Promise<void>;
};

export type RegisteredCommand = {
  name: string;
  help?: string;
  match: (message: string) => ParsedCommand | null;
};

export type CommandMiddlewareContext = CommandExecutionContext & {
  command: ParsedCommand;
};

export type CommandMiddleware = (
  context: CommandMiddlewareContext,
  next: () => Promise<void>,
) => Promise<void>;
