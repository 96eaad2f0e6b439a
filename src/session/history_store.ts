import type { AnalysisResult } from "../emotion/types";
import type { StorySuccess } from "../story/generator";
import { normalizePositiveInt } from "../utils/helpers";

export interface HistoryStore<T> {
  list(): T[];
  latest(): T | undefined;
  append(entry: T): void;
  clear(): void;
  readonly size: number;
}

/** 有上限的内存历史，超出时丢弃最旧的条目 */
export class BoundedHistoryStore<T> implements HistoryStore<T> {
  private entries: T[] = [];
  private readonly maxEntries: number;

  constructor(maxEntries: number) {
    this.maxEntries = normalizePositiveInt(maxEntries, 50);
  }

  get size(): number {
    return this.entries.length;
  }

  list(): T[] {
    return this.entries.slice();
  }

  latest(): T | undefined {
    return this.entries[this.entries.length - 1];
  }

  append(entry: T): void {
    const next = [...this.entries, entry];
    if (next.length > this.maxEntries) {
      this.entries = next.slice(next.length - this.maxEntries);
      return;
    }
    this.entries = next;
  }

  clear(): void {
    this.entries = [];
  }
}

export type EmotionHistoryEntry = {
  text: string;
  result: AnalysisResult;
  analyzedAt: number;
};

export type StoryHistoryEntry = StorySuccess;

export type Session = {
  emotions: HistoryStore<EmotionHistoryEntry>;
  stories: HistoryStore<StoryHistoryEntry>;
};

export function createSession(maxEntries: number): Session {
  return {
    emotions: new BoundedHistoryStore<EmotionHistoryEntry>(maxEntries),
    stories: new BoundedHistoryStore<StoryHistoryEntry>(maxEntries),
  };
}

export function clearSession(session: Session): void {
  session.emotions.clear();
  session.stories.clear();
}
