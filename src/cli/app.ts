import { config, type AppConfig } from "../config";
import { EmotionAnalyzer } from "../emotion/analyzer";
import { createSession } from "../session/history_store";
import { createStoryGeneratorFromConfig, type StoryGenerator } from "../story/generator";
import type { CommandExecutionContext } from "./commands/types";

export type AppContextOverrides = {
  analyzer?: EmotionAnalyzer;
  generator?: StoryGenerator;
  print?: (text: string) => void;
  now?: () => number;
};

export function createAppContext(
  appConfig: AppConfig = config,
  overrides: AppContextOverrides = {},
): CommandExecutionContext {
  return {
    analyzer: overrides.analyzer ?? new EmotionAnalyzer(),
    generator: overrides.generator ?? createStoryGeneratorFromConfig(undefined, appConfig),
    session: createSession(appConfig.history.maxEntries),
    appConfig,
    print: overrides.print ?? ((text) => console.log(text)),
    now: overrides.now ?? Date.now,
  };
}
