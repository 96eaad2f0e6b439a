type RequestOptions = {
  headers?: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
};

type PostJsonOptions = RequestOptions & {
  body: unknown;
};

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function parseBody(text: string): unknown {
  if (!text.trim()) return {};
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

async function send(url: string, init: RequestInit, options: RequestOptions): Promise<string> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), Math.max(1000, options.timeoutMs));
  const parentSignal = options.signal;
  const onParentAbort = () => controller.abort();
  parentSignal?.addEventListener("abort", onParentAbort, { once: true });

  try {
    const response = await fetch(url, { ...init, signal: controller.signal });
    const text = await response.text();
    if (!response.ok) {
      throw new Error(
        `[llm] request failed status=${response.status} provider_response=${safeStringify(parseBody(text))}`,
      );
    }
    return text;
  } finally {
    clearTimeout(timer);
    parentSignal?.removeEventListener("abort", onParentAbort);
  }
}

export async function postJson(url: string, options: PostJsonOptions): Promise<unknown> {
  const text = await send(
    url,
    {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        ...(options.headers ?? {}),
      },
      body: JSON.stringify(options.body),
    },
    options,
  );
  return parseBody(text);
}

/** GET 请求，返回纯文本响应体 */
export async function getText(url: string, options: RequestOptions): Promise<string> {
  return send(url, { method: "GET", headers: options.headers }, options);
}

export function trimTrailingSlash(input: string): string {
  return input.replace(/\/+$/, "");
}
