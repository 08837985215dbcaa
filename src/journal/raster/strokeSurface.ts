import {
  boundsOfPoints,
  distanceToSegment,
  expandRect,
  unionRects,
} from '../geometry.js';
import type { Drawing, Point, Rect, Stroke } from '../types.js';
import { Raster, parseHexColor } from './raster.js';

/**
 * ベクター描画をラスタ化する描画面。ストロークの描画品質は実装側の責務。
 */
export interface DrawingSurface {
  /**
   * `region`（キャンバス座標）を `scale` 倍の解像度で透明背景の PNG にする。
   */
  rasterize(drawing: Drawing, region: Rect, scale: number): Uint8Array;
  /**
   * 描画内容の外接矩形。何も描かれていなければ null。
   */
  contentBounds(drawing: Drawing): Rect | null;
}

export const pixelSizeOf = (length: number, scale: number): number => {
  return Math.max(1, Math.round(length * scale));
};

const strokeBounds = (stroke: Stroke): Rect | null => {
  const bounds = boundsOfPoints(stroke.points);
  return bounds ? expandRect(bounds, stroke.width / 2) : null;
};

const segmentsOf = (points: readonly Point[]): Array<readonly [Point, Point]> => {
  const [first, ...rest] = points;
  if (first === undefined) {
    return [];
  }
  if (rest.length === 0) {
    return [[first, first]];
  }

  const segments: Array<readonly [Point, Point]> = [];
  let previous = first;
  for (const point of rest) {
    segments.push([previous, point]);
    previous = point;
  }
  return segments;
};

/**
 * 丸キャップの折れ線としてストロークを塗る既定の描画面。
 */
export class StrokeSurface implements DrawingSurface {
  contentBounds(drawing: Drawing): Rect | null {
    let bounds: Rect | null = null;

    for (const stroke of drawing.strokes) {
      const current = strokeBounds(stroke);
      if (current) {
        bounds = bounds ? unionRects(bounds, current) : current;
      }
    }

    return bounds;
  }

  rasterize(drawing: Drawing, region: Rect, scale: number): Uint8Array {
    const raster = Raster.create(
      pixelSizeOf(region.width, scale),
      pixelSizeOf(region.height, scale),
    );

    for (const stroke of drawing.strokes) {
      this.paintStroke(raster, stroke, region, scale);
    }

    return raster.encode();
  }

  private paintStroke(raster: Raster, stroke: Stroke, region: Rect, scale: number): void {
    const bounds = strokeBounds(stroke);
    if (!bounds) {
      return;
    }

    const color = parseHexColor(stroke.color);
    const radius = stroke.width / 2;
    const segments = segmentsOf(stroke.points);

    const left = Math.max(0, Math.floor((bounds.x - region.x) * scale));
    const top = Math.max(0, Math.floor((bounds.y - region.y) * scale));
    const right = Math.min(raster.width, Math.ceil((bounds.x + bounds.width - region.x) * scale));
    const bottom = Math.min(raster.height, Math.ceil((bounds.y + bounds.height - region.y) * scale));

    // 1 ストロークは 1 回だけ合成する（半透明色の継ぎ目で濃くならないように）
    for (let y = top; y < bottom; y += 1) {
      for (let x = left; x < right; x += 1) {
        const center: Point = {
          x: region.x + (x + 0.5) / scale,
          y: region.y + (y + 0.5) / scale,
        };
        const covered = segments.some(
          ([start, end]) => distanceToSegment(center, start, end) <= radius,
        );
        if (covered) {
          raster.blendPixel(x, y, color);
        }
      }
    }
  }
}
