import type { JournalEntry } from '../types.js';

const startOfDay = (date: Date): Date => {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
};

const dayKey = (date: Date): string => {
  const day = startOfDay(date);
  return `${day.getFullYear()}-${day.getMonth() + 1}-${day.getDate()}`;
};

const previousDay = (date: Date): Date => {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() - 1);
};

/**
 * `YYYY-MM-DD` をローカル時刻のその日の 0 時として解釈する。形式が違えば null。
 */
export const parseLocalDay = (value: string): Date | null => {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/u.exec(value);
  if (!match) {
    return null;
  }
  const [, year, month, day] = match;
  const date = new Date(Number(year), Number(month) - 1, Number(day));
  return date.getMonth() === Number(month) - 1 ? date : null;
};

/**
 * 指定日（ローカル時刻）に作成されたエントリを、更新が新しい順に返す。
 */
export const entriesOnDay = (
  entries: readonly JournalEntry[],
  day: Date,
): JournalEntry[] => {
  const key = dayKey(day);
  return entries
    .filter((entry) => dayKey(entry.createdAt) === key)
    .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime());
};

export const hasEntryOn = (entries: readonly JournalEntry[], day: Date): boolean => {
  const key = dayKey(day);
  return entries.some((entry) => dayKey(entry.createdAt) === key);
};

/**
 * 今日（今日が未記入なら昨日）から遡って、エントリのある日が何日続いているか。
 */
export const currentStreak = (entries: readonly JournalEntry[], today: Date): number => {
  const days = new Set(entries.map((entry) => dayKey(entry.createdAt)));
  if (days.size === 0) {
    return 0;
  }

  let day = startOfDay(today);
  if (!days.has(dayKey(day))) {
    day = previousDay(day);
  }

  let streak = 0;
  while (days.has(dayKey(day))) {
    streak += 1;
    day = previousDay(day);
  }

  return streak;
};

export interface JournalStats {
  readonly totalEntries: number;
  readonly hasEntryToday: boolean;
  readonly currentStreak: number;
}

export const journalStats = (
  entries: readonly JournalEntry[],
  today: Date,
): JournalStats => ({
  totalEntries: entries.length,
  hasEntryToday: hasEntryOn(entries, today),
  currentStreak: currentStreak(entries, today),
});
