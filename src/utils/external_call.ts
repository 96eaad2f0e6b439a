import { isAbortError, normalizeError, normalizePositiveInt } from "./helpers";
import { logger } from "./logger";

/**
 * 外部调用包装：超时、瞬时错误重试、按 key 熔断、可选降级。
 *
 * 调用失败统一包装为 ExternalCallError；提供 fallback 时改为返回降级值。
 */

export type ExternalCallContext = {
  signal: AbortSignal;
  attempt: number;
};

export type ExternalCallErrorReason = "call_failed" | "circuit_open";

export type CircuitBreakerOptions = {
  enabled?: boolean;
  key?: string;
  failureThreshold?: number;
  openMs?: number;
};

export type ExternalCallOptions<T> = {
  service: string;
  operation: string;
  timeoutMs: number;
  signal?: AbortSignal;
  retries?: number;
  retryDelayMs?: number;
  isRetryable?: (error: Error) => boolean;
  circuitBreaker?: CircuitBreakerOptions;
  fallback?: (error: ExternalCallError) => Promise<T> | T;
};

export class ExternalCallError extends Error {
  readonly service: string;
  readonly operation: string;
  readonly attempts: number;
  readonly retryable: boolean;
  readonly reason: ExternalCallErrorReason;

  constructor(params: {
    service: string;
    operation: string;
    attempts: number;
    retryable: boolean;
    reason: ExternalCallErrorReason;
    cause: Error;
  }) {
    super(
      `[external] ${params.service}.${params.operation} ${params.reason} after ${params.attempts} attempt(s): ${params.cause.message}`,
      { cause: params.cause },
    );
    this.name = "ExternalCallError";
    this.service = params.service;
    this.operation = params.operation;
    this.attempts = params.attempts;
    this.retryable = params.retryable;
    this.reason = params.reason;
  }
}

type CircuitState = {
  failures: number;
  openUntil: number;
};

const circuits = new Map<string, CircuitState>();

function getCircuitState(key: string): CircuitState {
  const existing = circuits.get(key);
  if (existing) return existing;
  const next: CircuitState = { failures: 0, openUntil: 0 };
  circuits.set(key, next);
  return next;
}

/** 清空熔断状态（测试或手动恢复用） */
export function resetCircuits(): void {
  circuits.clear();
}

export function isRetryableByDefault(error: Error): boolean {
  const message = `${error.name} ${error.message}`.toLowerCase();
  if (message.includes("timeout")) return true;
  if (/econnreset|econnrefused|enotfound|eai_again|etimedout/.test(message)) return true;
  if (message.includes("fetch failed")) return true;
  if (message.includes("status=429")) return true;
  return /status=5\d{2}/.test(message);
}

function createAbortError(service: string, operation: string): Error {
  const error = new Error(`[external] aborted service=${service} operation=${operation}`);
  error.name = "AbortError";
  return error;
}

function createTimeoutError(service: string, operation: string, timeoutMs: number): Error {
  const error = new Error(
    `[external] timeout service=${service} operation=${operation} timeout=${timeoutMs}ms`,
  );
  error.name = "ExternalTimeoutError";
  return error;
}

function waitForRetry(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

async function attemptOnce<T>(
  options: ExternalCallOptions<T>,
  timeoutMs: number,
  attempt: number,
  runner: (context: ExternalCallContext) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const parentSignal = options.signal;
  const onParentAbort = () => controller.abort();
  parentSignal?.addEventListener("abort", onParentAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const guard = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // 先以超时错误结束，再中止 runner
      reject(createTimeoutError(options.service, options.operation, timeoutMs));
      controller.abort();
    }, timeoutMs);
    controller.signal.addEventListener(
      "abort",
      () => reject(createAbortError(options.service, options.operation)),
      { once: true },
    );
  });

  try {
    return await Promise.race([runner({ signal: controller.signal, attempt }), guard]);
  } finally {
    clearTimeout(timer);
    parentSignal?.removeEventListener("abort", onParentAbort);
  }
}

async function settle<T>(
  fallback: ExternalCallOptions<T>["fallback"],
  error: ExternalCallError,
): Promise<T> {
  if (!fallback) throw error;
  logger.warn(
    `[external] fallback service=${error.service} operation=${error.operation} reason=${error.reason}`,
  );
  return fallback(error);
}

export async function runExternalCall<T>(
  options: ExternalCallOptions<T>,
  runner: (context: ExternalCallContext) => Promise<T>,
): Promise<T> {
  const retries = Math.max(0, Math.floor(options.retries ?? 0));
  const retryDelayMs = Math.max(0, Math.floor(options.retryDelayMs ?? 150));
  const timeoutMs = Math.max(1, Math.floor(options.timeoutMs));
  const shouldRetry = options.isRetryable ?? isRetryableByDefault;

  const breaker = options.circuitBreaker;
  const circuit = breaker?.enabled
    ? getCircuitState(breaker.key?.trim() || `${options.service}:${options.operation}`)
    : null;
  const failureThreshold = normalizePositiveInt(breaker?.failureThreshold, 3);
  const openMs = normalizePositiveInt(breaker?.openMs, 30000);

  const fail = (
    attempts: number,
    retryable: boolean,
    cause: Error,
    reason: ExternalCallErrorReason = "call_failed",
  ) =>
    new ExternalCallError({
      service: options.service,
      operation: options.operation,
      attempts,
      retryable,
      reason,
      cause,
    });

  if (options.signal?.aborted) {
    const aborted = createAbortError(options.service, options.operation);
    return settle(options.fallback, fail(0, false, aborted));
  }

  if (circuit) {
    const remaining = circuit.openUntil - Date.now();
    if (remaining > 0) {
      const cause = new Error(
        `[external] circuit open service=${options.service} operation=${options.operation} reopen_in_ms=${remaining}`,
      );
      return settle(options.fallback, fail(0, false, cause, "circuit_open"));
    }
  }

  let attempt = 0;
  for (;;) {
    attempt += 1;
    try {
      const result = await attemptOnce(options, timeoutMs, attempt, runner);
      if (circuit) {
        circuit.failures = 0;
        circuit.openUntil = 0;
      }
      return result;
    } catch (error) {
      const normalized = normalizeError(error);
      const abortedByCaller = options.signal?.aborted === true;
      if (abortedByCaller || isAbortError(normalized)) {
        return settle(options.fallback, fail(attempt, false, normalized));
      }

      const retryable = shouldRetry(normalized);
      if (circuit) {
        circuit.failures += 1;
        if (circuit.failures >= failureThreshold) {
          circuit.failures = 0;
          circuit.openUntil = Date.now() + openMs;
        }
      }

      if (!retryable || attempt > retries) {
        return settle(options.fallback, fail(attempt, retryable, normalized));
      }

      logger.warn(
        `[external] retry service=${options.service} operation=${options.operation} attempt=${attempt} reason=${normalized.message}`,
      );
      const proceed =
        retryDelayMs > 0 ? await waitForRetry(retryDelayMs * attempt, options.signal) : true;
      if (!proceed) {
        return settle(
          options.fallback,
          fail(attempt, false, createAbortError(options.service, options.operation)),
        );
      }
    }
  }
}
