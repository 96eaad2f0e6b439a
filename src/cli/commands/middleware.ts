import { normalizeError } from "../../utils/helpers";
import { logger } from "../../utils/logger";
import type { CommandMiddleware, CommandMiddlewareContext } from "./types";

export const errorBoundaryMiddleware: CommandMiddleware = async (context, next) => {
  try {
    await next();
  } catch (error) {
    logger.error(`[cli] 命令 ${context.command.name} 执行失败:`, normalizeError(error));
    context.print(`命令执行失败：${normalizeError(error).message}`);
  }
};

export const llmAvailabilityMiddleware: CommandMiddleware = async (context, next) => {
  if (context.command.requiresLlm && !context.generator.available) {
    context.print("未配置文本生成服务，请检查 LLM_PROVIDER 及对应密钥");
    return;
  }
  await next();
};

export const timingMiddleware: CommandMiddleware = async (context, next) => {
  const startedAt = Date.now();
  await next();
  logger.debug(`[cli] ${context.command.name} 耗时 ${Date.now() - startedAt}ms`);
};

export const defaultCommandMiddlewares: CommandMiddleware[] = [
  errorBoundaryMiddleware,
  llmAvailabilityMiddleware,
  timingMiddleware,
];

export async function runMiddlewares(
  context: CommandMiddlewareContext,
  middlewares: readonly CommandMiddleware[],
  execute: () => Promise<void>,
): Promise<void> {
  let index = -1;

  const dispatch = async (current: number): Promise<void> => {
    if (current <= index) {
      throw new Error("middleware next() 调用顺序错误");
    }
    index = current;

    if (current >= middlewares.length) {
      await execute();
      return;
    }

    const middleware = middlewares[current];
    await middleware(context, () => dispatch(current + 1));
  };

  await dispatch(0);
}
