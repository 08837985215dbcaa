import os from 'node:os';
import path from 'node:path';

export const DOODLE_JOURNAL_HOME_ENV = 'DOODLE_JOURNAL_HOME';

const DEFAULT_HOME_DIR = '.doodle-journal';

/**
 * ジャーナルのデータを保存するルートディレクトリを解決する。
 * `DOODLE_JOURNAL_HOME` が設定されていればそれを優先する。
 */
export const resolveBaseDir = (): string => {
  const override = process.env[DOODLE_JOURNAL_HOME_ENV];
  if (override && override.trim().length > 0) {
    return path.resolve(override);
  }

  return path.join(os.homedir(), DEFAULT_HOME_DIR);
};

/**
 * ジャーナル全体のスナップショット JSON のパスを解決する。
 */
export const resolveJournalFile = (): string => {
  return path.join(resolveBaseDir(), 'journal.json');
};

/**
 * 書き出したサムネイル PNG を置くディレクトリを解決する。
 */
export const resolveExportsDir = (): string => {
  return path.join(resolveBaseDir(), 'exports');
};
