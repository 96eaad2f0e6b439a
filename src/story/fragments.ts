import { clipText, normalizeText } from "../utils/helpers";

export const DEFAULT_FRAGMENT_SEPARATORS = [",", "，", "\n", ";", "；", "、"];

export const FRAGMENT_MIN_LENGTH = 2;
export const FRAGMENT_WARN_LENGTH = 50;

export type FragmentValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
  cleanedFragments: string[];
};

const FRAGMENT_DISALLOWED_CHARS = /[^\u4e00-\u9fa5a-zA-Z0-9\s，。！？；：“”‘’（）【】《》、]/g;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** 折叠空白，只保留中英文、数字与常用中文标点 */
export function cleanFragmentText(text: string): string {
  return normalizeText(text.replace(FRAGMENT_DISALLOWED_CHARS, ""));
}

export function splitFragments(
  text: string,
  separators: readonly string[] = DEFAULT_FRAGMENT_SEPARATORS,
): string[] {
  const trimmed = text.trim();
  if (!trimmed) return [];
  if (separators.length === 0) return [trimmed];
  const pattern = new RegExp(separators.map(escapeRegExp).join("|"));
  return text
    .split(pattern)
    .map((item) => item.trim())
    .filter(Boolean);
}

export function validateFragments(fragments: readonly string[]): FragmentValidation {
  const result: FragmentValidation = {
    valid: true,
    errors: [],
    warnings: [],
    cleanedFragments: [],
  };

  if (fragments.length === 0) {
    result.valid = false;
    result.errors.push("记忆碎片列表为空");
    return result;
  }

  fragments.forEach((fragment, index) => {
    const cleaned = cleanFragmentText(fragment);
    const position = index + 1;
    if (!cleaned) {
      result.warnings.push(`第${position}个碎片为空或无效`);
      return;
    }
    if (cleaned.length < FRAGMENT_MIN_LENGTH) {
      result.warnings.push(`第${position}个碎片过短: '${cleaned}'`);
      return;
    }
    if (cleaned.length > FRAGMENT_WARN_LENGTH) {
      result.warnings.push(`第${position}个碎片过长，建议缩短: '${clipText(cleaned, 30, "...")}'`);
    }
    result.cleanedFragments.push(cleaned);
  });

  if (result.cleanedFragments.length === 0) {
    result.valid = false;
    result.errors.push("没有有效的记忆碎片");
  }
  return result;
}
