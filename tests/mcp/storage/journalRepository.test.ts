import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  exportImage,
  loadJournalSnapshot,
  saveJournalSnapshot,
} from '../../../src/mcp/storage/journalRepository.js';
import { DOODLE_JOURNAL_HOME_ENV } from '../../../src/mcp/storage/paths.js';
import type { JournalSnapshot } from '../../../src/journal/types.js';

const snapshot: JournalSnapshot = {
  entries: [
    {
      id: 'a',
      createdAt: new Date('2024-05-01T09:00:00.000Z'),
      updatedAt: new Date('2024-05-01T09:00:00.000Z'),
      caption: 'morning',
      backgroundImageData: null,
      thumbnailData: new Uint8Array([4, 5]),
    },
  ],
  drawings: {},
};

describe('journalRepository', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'doodle-journal-repo-'));
    process.env[DOODLE_JOURNAL_HOME_ENV] = tempDir;
  });

  afterEach(async () => {
    delete process.env[DOODLE_JOURNAL_HOME_ENV];
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('journal.json が無ければ空のジャーナルを返す', async () => {
    await expect(loadJournalSnapshot()).resolves.toEqual({ entries: [], drawings: {} });
  });

  it('保存したスナップショットを読み戻せる', async () => {
    await saveJournalSnapshot(snapshot);

    await expect(loadJournalSnapshot()).resolves.toEqual(snapshot);
    const files = await fs.readdir(tempDir);
    expect(files).toEqual(['journal.json']);
  });

  it('同時に保存しても全て成功し、一時ファイルを残さない', async () => {
    const many: JournalSnapshot = {
      entries: Array.from({ length: 20 }, (_, index) => ({
        id: `entry-${index}`,
        createdAt: new Date('2024-05-01T09:00:00.000Z'),
        updatedAt: new Date('2024-05-01T09:00:00.000Z'),
        caption: `caption ${index}`,
        backgroundImageData: null,
        thumbnailData: null,
      })),
      drawings: {},
    };

    const results = await Promise.allSettled([
      saveJournalSnapshot(many),
      saveJournalSnapshot(many),
      saveJournalSnapshot(many),
    ]);

    expect(results.map(({ status }) => status)).toEqual([
      'fulfilled',
      'fulfilled',
      'fulfilled',
    ]);
    await expect(loadJournalSnapshot()).resolves.toEqual(many);
    expect(await fs.readdir(tempDir)).toEqual(['journal.json']);
  });

  it('壊れた journal.json は読み込みエラーにする', async () => {
    await fs.writeFile(path.join(tempDir, 'journal.json'), '{"version":1}', 'utf8');

    await expect(loadJournalSnapshot()).rejects.toThrow();
  });

  it('exportImage は exports ディレクトリか指定パスへ書き出す', async () => {
    const bytes = new Uint8Array([137, 80, 78, 71]);

    const defaultPath = await exportImage('a.png', bytes);
    const customPath = await exportImage('a.png', bytes, path.join(tempDir, 'out', 'b.png'));

    expect(defaultPath).toBe(path.join(tempDir, 'exports', 'a.png'));
    expect(customPath).toBe(path.join(tempDir, 'out', 'b.png'));
    expect(new Uint8Array(await fs.readFile(customPath))).toEqual(bytes);
  });
});
