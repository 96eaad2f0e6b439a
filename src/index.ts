import readline from "node:readline";

import { createAppContext } from "./cli/app";
import { executeCommand } from "./cli/commands/registry";
import { config } from "./config";
import { getLlmSetupSummary } from "./llm/factory";
import { logger } from "./utils/logger";

const UNKNOWN_COMMAND = "未知命令，输入 /帮助 查看可用命令";

async function runOnce(text: string): Promise<void> {
  const context = createAppContext(config);
  const handled = await executeCommand(text, context);
  if (!handled) context.print(UNKNOWN_COMMAND);
}

function runInteractive(): void {
  const context = createAppContext(config);
  logger.info("[app] 情感光谱分析已启动", getLlmSetupSummary(context.generator.client));
  context.print("输入文本直接分析情感，/帮助 查看命令，/退出 结束");

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: "> " });
  let queue = Promise.resolve();

  rl.on("line", (line) => {
    const message = line.trim();
    if (!message) {
      rl.prompt();
      return;
    }
    if (message === "/退出" || message === "/exit") {
      rl.close();
      return;
    }
    // 逐行串行执行
    queue = queue
      .then(async () => {
        const handled = await executeCommand(message, context);
        if (!handled) context.print(UNKNOWN_COMMAND);
      })
      .catch((error: unknown) => {
        logger.error("[app] 处理输入失败:", error);
      })
      .finally(() => rl.prompt());
  });

  rl.on("close", () => {
    logger.info("[app] 已退出");
  });

  rl.prompt();
}

const argvText = process.argv.slice(2).join(" ").trim();
if (argvText) {
  runOnce(argvText).catch((error: unknown) => {
    logger.error("[app] 执行失败:", error);
    process.exitCode = 1;
  });
} else {
  runInteractive();
}

const onShutdown = () => {
  logger.info("接收到退出信号，安全关闭中...");
  process.exit(0);
};

process.on("SIGINT", onShutdown);
process.on("SIGTERM", onShutdown);
