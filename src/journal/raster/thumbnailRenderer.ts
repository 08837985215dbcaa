import { expandRect } from '../geometry.js';
import type { Drawing, Rect } from '../types.js';
import { Raster, WHITE } from './raster.js';
import { pixelSizeOf, type DrawingSurface } from './strokeSurface.js';

export const THUMBNAIL_PADDING = 24;
export const THUMBNAIL_MIN_SIZE = 240;

export type ThumbnailRenderer = (
  drawing: Drawing,
  backgroundImageData: Uint8Array | null,
) => Uint8Array | null;

export interface ThumbnailRendererOptions {
  readonly surface: DrawingSurface;
  readonly scale: number;
}

/**
 * 描画と背景画像からサムネイル PNG を作る。どちらも無ければ null。
 * 背景があれば背景全体、無ければ描画の外接矩形に余白を付けた範囲（最小 240×240）を描く。
 */
export const renderThumbnail = (
  drawing: Drawing,
  backgroundImageData: Uint8Array | null,
  { surface, scale }: ThumbnailRendererOptions,
): Uint8Array | null => {
  const contentBounds = surface.contentBounds(drawing);
  const background = backgroundImageData ? Raster.decode(backgroundImageData) : null;

  let rect: Rect | null = null;
  if (background) {
    rect = {
      x: 0,
      y: 0,
      width: background.width / scale,
      height: background.height / scale,
    };
  } else if (contentBounds) {
    const padded = expandRect(contentBounds, THUMBNAIL_PADDING);
    rect = {
      x: padded.x,
      y: padded.y,
      width: Math.max(padded.width, THUMBNAIL_MIN_SIZE),
      height: Math.max(padded.height, THUMBNAIL_MIN_SIZE),
    };
  }

  if (!rect) {
    return null;
  }

  const canvas = Raster.create(
    pixelSizeOf(rect.width, scale),
    pixelSizeOf(rect.height, scale),
    WHITE,
  );
  const fullFrame: Rect = { x: 0, y: 0, width: canvas.width, height: canvas.height };

  if (background) {
    canvas.drawImage(background, fullFrame);
  }

  if (contentBounds) {
    const strokes = Raster.decode(surface.rasterize(drawing, rect, scale));
    canvas.drawImage(strokes, fullFrame);
  }

  return canvas.encode();
};

export const createThumbnailRenderer = (
  options: ThumbnailRendererOptions,
): ThumbnailRenderer => {
  return (drawing, backgroundImageData) =>
    renderThumbnail(drawing, backgroundImageData, options);
};
