import { describe, expect, it } from 'vitest';
import {
  decodeSnapshot,
  emptySnapshot,
  encodeSnapshot,
} from '../../../src/journal/store/journalSnapshot.js';
import type { JournalSnapshot } from '../../../src/journal/types.js';

const snapshot: JournalSnapshot = {
  entries: [
    {
      id: 'a',
      createdAt: new Date('2024-05-01T09:00:00.000Z'),
      updatedAt: new Date('2024-05-01T10:30:00.000Z'),
      caption: 'park',
      backgroundImageData: new Uint8Array([1, 2, 3]),
      thumbnailData: null,
    },
  ],
  drawings: {
    a: { strokes: [{ points: [{ x: 1, y: 2 }], color: '#ff0000', width: 3 }] },
  },
};

describe('journal snapshot codec', () => {
  it('日時は ISO 8601、画像は base64 で書き出す', () => {
    const file = encodeSnapshot(snapshot);

    expect(file.version).toBe(1);
    expect(file.entries[0]).toEqual({
      id: 'a',
      createdAt: '2024-05-01T09:00:00.000Z',
      updatedAt: '2024-05-01T10:30:00.000Z',
      caption: 'park',
      backgroundImage: 'AQID',
      thumbnail: null,
    });
  });

  it('JSON を経由しても同じスナップショットに戻る', () => {
    const restored = decodeSnapshot(JSON.parse(JSON.stringify(encodeSnapshot(snapshot))));

    expect(restored).toEqual(snapshot);
  });

  it('バージョンが異なるファイルは拒否する', () => {
    expect(() => decodeSnapshot({ version: 2, entries: [], drawings: {} })).toThrow();
  });

  it('不正な色のストロークは拒否する', () => {
    const file = {
      ...encodeSnapshot(emptySnapshot()),
      drawings: { a: { strokes: [{ points: [], color: 'red', width: 2 }] } },
    };

    expect(() => decodeSnapshot(file)).toThrow();
  });

  it('同じ ID のエントリが重複したファイルは拒否する', () => {
    const file = encodeSnapshot(snapshot);
    const duplicated = { ...file, entries: [...file.entries, ...file.entries] };

    expect(() => decodeSnapshot(duplicated)).toThrow('duplicate entry id: a');
  });

  it('updatedAt が createdAt より前のエントリは拒否する', () => {
    const file = encodeSnapshot(snapshot);
    const [record] = file.entries;
    const broken = {
      ...file,
      entries: [{ ...record, updatedAt: '2024-05-01T08:00:00.000Z' }],
    };

    expect(() => decodeSnapshot(broken)).toThrow(
      'updatedAt must not be earlier than createdAt',
    );
  });
});
