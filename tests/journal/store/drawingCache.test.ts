import { describe, expect, it, vi } from 'vitest';
import { DrawingCache } from '../../../src/journal/store/drawingCache.js';
import { EntryStore } from '../../../src/journal/store/entryStore.js';
import { EMPTY_DRAWING } from '../../../src/journal/types.js';
import { lineDrawing } from '../../helpers/fixtures.js';

const at = (iso: string): Date => new Date(iso);

const setup = () => {
  let now = at('2024-05-01T00:00:00Z');
  const entries = new EntryStore({ now: () => now });
  const renderThumbnail = vi.fn(() => new Uint8Array([42]));
  const drawings = new DrawingCache({ entries, renderThumbnail });
  return {
    entries,
    drawings,
    renderThumbnail,
    advance: (iso: string) => {
      now = at(iso);
    },
  };
};

describe('DrawingCache', () => {
  it('未保存のエントリは空の描画を返す', () => {
    const { drawings } = setup();
    expect(drawings.loadDrawing('missing')).toBe(EMPTY_DRAWING);
  });

  it('サムネイル指定なしの保存は描画を保持し updatedAt だけ進める', () => {
    const { entries, drawings, renderThumbnail, advance } = setup();
    entries.createEntry({ id: 'a' });
    const drawing = lineDrawing([{ x: 0, y: 0 }, { x: 10, y: 10 }]);

    advance('2024-05-01T01:00:00Z');
    drawings.saveDrawing(drawing, 'a');

    expect(drawings.loadDrawing('a')).toBe(drawing);
    expect(renderThumbnail).not.toHaveBeenCalled();
    expect(entries.entry('a')?.thumbnailData).toBeNull();
    expect(entries.entry('a')?.updatedAt).toEqual(at('2024-05-01T01:00:00Z'));
  });

  it('generateThumbnail を指定すると背景と一緒にサムネイルを作り直す', () => {
    const { entries, drawings, renderThumbnail } = setup();
    entries.createEntry({ id: 'a' });
    const background = new Uint8Array([5, 5]);
    entries.updateBackgroundImageData(background, 'a');
    const drawing = lineDrawing([{ x: 1, y: 1 }]);

    drawings.saveDrawing(drawing, 'a', { generateThumbnail: true });

    expect(renderThumbnail).toHaveBeenCalledWith(drawing, background);
    expect(entries.entry('a')?.thumbnailData).toEqual(new Uint8Array([42]));
  });

  it('エントリが無くても描画はキャッシュされ、例外は出ない', () => {
    const { entries, drawings, renderThumbnail } = setup();
    const drawing = lineDrawing([{ x: 1, y: 1 }]);

    drawings.saveDrawing(drawing, 'orphan', { generateThumbnail: true });

    expect(drawings.loadDrawing('orphan')).toBe(drawing);
    expect(renderThumbnail).not.toHaveBeenCalled();
    expect(entries.entries).toHaveLength(0);
  });

  it('removeDrawing で描画を削除する', () => {
    const { drawings } = setup();
    drawings.saveDrawing(lineDrawing([{ x: 1, y: 1 }]), 'a');

    expect(drawings.removeDrawing('a')).toBe(true);
    expect(drawings.removeDrawing('a')).toBe(false);
    expect(drawings.loadDrawing('a')).toBe(EMPTY_DRAWING);
  });

  it('snapshot は保存済みの描画を ID ごとに返す', () => {
    const { drawings } = setup();
    const drawing = lineDrawing([{ x: 2, y: 3 }]);
    drawings.saveDrawing(drawing, 'a');

    expect(drawings.snapshot()).toEqual({ a: drawing });
  });
});
