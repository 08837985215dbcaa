import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DOODLE_JOURNAL_HOME_ENV } from '../../src/mcp/storage/paths.js';
import { JournalWorkspace } from '../../src/mcp/workspace.js';

describe('JournalWorkspace', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'doodle-journal-workspace-'));
    process.env[DOODLE_JOURNAL_HOME_ENV] = tempDir;
  });

  afterEach(async () => {
    delete process.env[DOODLE_JOURNAL_HOME_ENV];
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('同じジャーナルを使い回し、read では保存しない', async () => {
    const workspace = new JournalWorkspace();

    const first = await workspace.open();
    const count = await workspace.read((journal) => journal.entries.entries.length);

    expect(await workspace.open()).toBe(first);
    expect(count).toBe(0);
    await expect(fs.readdir(tempDir)).resolves.toEqual([]);
  });

  it('mutate の後に journal.json へ書き戻す', async () => {
    const workspace = new JournalWorkspace();

    await workspace.mutate((journal) => journal.entries.createEntry({ id: 'a' }));

    const reopened = new JournalWorkspace();
    const ids = await reopened.read((journal) => journal.entries.entries.map(({ id }) => id));
    expect(ids).toEqual(['a']);
  });

  it('読み込みに失敗しても次の呼び出しで読み直す', async () => {
    const filePath = path.join(tempDir, 'journal.json');
    await fs.writeFile(filePath, 'not json', 'utf8');
    const workspace = new JournalWorkspace();

    await expect(workspace.open()).rejects.toThrow();

    await fs.writeFile(filePath, JSON.stringify({ version: 1, entries: [], drawings: {} }), 'utf8');
    await expect(workspace.read((journal) => journal.entries.entries.length)).resolves.toBe(0);
  });
});
