// ─── 数值工具 ───

/** 将 value 规范化为正整数，无效时返回 fallback。 */
export function normalizePositiveInt(value: number | undefined, fallback: number): number {
  if (typeof value !== "number" || !Number.isFinite(value)) return fallback;
  const normalized = Math.floor(value);
  return normalized > 0 ? normalized : fallback;
}

/** 将 value 限制在 [min, max] 区间内，NaN → min。 */
export function clamp(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) return min;
  if (value < min) return min;
  if (value > max) return max;
  return value;
}

export function clamp01(value: number): number {
  return clamp(value, 0, 1);
}

// ─── 文本工具 ───

/** 将连续空白折叠为单个空格并 trim。 */
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** 截断到 maxLength，超出时以 suffix 结尾（suffix 计入长度）。 */
export function clipText(value: string, maxLength: number, suffix = "…"): string {
  const normalized = normalizeText(value);
  if (normalized.length <= maxLength) return normalized;
  return `${normalized.slice(0, Math.max(1, maxLength - suffix.length))}${suffix}`;
}

// ─── 错误工具 ───

export function normalizeError(error: unknown): Error {
  if (error instanceof Error) return error;
  return new Error(String(error));
}

/** 名称为 AbortError 或 message 含 abort 的错误。 */
export function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (error.name === "AbortError") return true;
  return /abort/i.test(error.message);
}
