import { describe, expect, it } from 'vitest';
import { Raster, WHITE } from '../../../src/journal/raster/raster.js';
import { StrokeSurface } from '../../../src/journal/raster/strokeSurface.js';
import {
  createThumbnailRenderer,
  renderThumbnail,
} from '../../../src/journal/raster/thumbnailRenderer.js';
import { EMPTY_DRAWING } from '../../../src/journal/types.js';
import { BLACK, RED, lineDrawing, solidPng } from '../../helpers/fixtures.js';

const surface = new StrokeSurface();

describe('renderThumbnail', () => {
  it('描画も背景も無ければ null', () => {
    expect(renderThumbnail(EMPTY_DRAWING, null, { surface, scale: 2 })).toBeNull();
  });

  it('背景が無い小さな描画は余白付きで最小 240×240 に広げる', () => {
    const drawing = lineDrawing([
      { x: 12, y: 12 },
      { x: 48, y: 48 },
    ]);

    const png = renderThumbnail(drawing, null, { surface, scale: 1 });
    expect(png).not.toBeNull();
    const raster = Raster.decode(png ?? new Uint8Array());

    expect(raster.size).toEqual({ width: 240, height: 240 });
    // 描画範囲は (-14, -14) 起点なので (44, 44) はキャンバス座標 (30.5, 30.5)
    expect(raster.getPixel(44, 44)).toEqual(BLACK);
    expect(raster.getPixel(0, 0)).toEqual(WHITE);
  });

  it('背景がある場合は背景全体の大きさで描く', () => {
    const background = solidPng(30, 20, RED);
    const drawing = lineDrawing([{ x: 2, y: 2 }], 2);

    const png = createThumbnailRenderer({ surface, scale: 2 })(drawing, background);
    const raster = Raster.decode(png ?? new Uint8Array());

    expect(raster.size).toEqual({ width: 30, height: 20 });
    expect(raster.getPixel(4, 4)).toEqual(BLACK);
    expect(raster.getPixel(20, 15)).toEqual(RED);
  });

  it('描画が空でも背景だけでサムネイルを作る', () => {
    const png = renderThumbnail(EMPTY_DRAWING, solidPng(8, 8, RED), { surface, scale: 1 });
    const raster = Raster.decode(png ?? new Uint8Array());

    expect(raster.getPixel(3, 3)).toEqual(RED);
  });
});
