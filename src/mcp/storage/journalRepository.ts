import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import {
  decodeSnapshot,
  emptySnapshot,
  encodeSnapshot,
} from '../../journal/store/journalSnapshot.js';
import type { JournalSnapshot } from '../../journal/types.js';
import { resolveExportsDir, resolveJournalFile } from './paths.js';

const writeFileAtomic = async (
  filePath: string,
  content: string | Uint8Array,
): Promise<void> => {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  // 一時ファイル名は書き込みごとに一意
  const tempPath = `${filePath}.${randomUUID()}.tmp`;
  await fs.writeFile(tempPath, content);
  try {
    await fs.rename(tempPath, filePath);
  } catch (error: unknown) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
};

/**
 * journal.json を読み込む。ファイルが無ければ空のジャーナルを返す。
 */
export const loadJournalSnapshot = async (): Promise<JournalSnapshot> => {
  const filePath = resolveJournalFile();

  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error: unknown) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return emptySnapshot();
    }
    throw error;
  }

  return decodeSnapshot(JSON.parse(raw) as unknown);
};

/**
 * ジャーナル全体を一時ファイル経由で journal.json に書き込む。
 */
export const saveJournalSnapshot = async (
  snapshot: JournalSnapshot,
): Promise<void> => {
  const data = JSON.stringify(encodeSnapshot(snapshot), null, 2);
  await writeFileAtomic(resolveJournalFile(), `${data}\n`);
};

/**
 * PNG を exports ディレクトリへ書き出し、書き込んだパスを返す。
 */
export const exportImage = async (
  fileName: string,
  bytes: Uint8Array,
  targetPath?: string,
): Promise<string> => {
  const filePath = targetPath
    ? path.resolve(targetPath)
    : path.join(resolveExportsDir(), fileName);
  await writeFileAtomic(filePath, bytes);
  return filePath;
};
