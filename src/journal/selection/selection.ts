import {
  boundsOfPoints,
  distanceToSegment,
  expandRect,
  intersectRects,
  isEmptyRect,
  polygonContains,
  rectFromSize,
} from '../geometry.js';
import type { Point, Rect, Size } from '../types.js';

export const MIN_LASSO_POINTS = 3;

export interface FullCanvasSelection {
  readonly kind: 'fullCanvas';
}

export interface LassoSelection {
  readonly kind: 'lasso';
  readonly points: readonly Point[];
  readonly closed: boolean;
}

export type Selection = FullCanvasSelection | LassoSelection;

export const FULL_CANVAS: FullCanvasSelection = { kind: 'fullCanvas' };

export const lassoSelection = (points: readonly Point[]): LassoSelection => ({
  kind: 'lasso',
  points: [...points],
  closed: points.length >= MIN_LASSO_POINTS,
});

export const hasSelection = (selection: Selection, canvasSize: Size): boolean => {
  if (selection.kind === 'fullCanvas') {
    return !isEmptyRect(rectFromSize(canvasSize));
  }
  return selection.points.length >= MIN_LASSO_POINTS;
};

/**
 * 選択範囲の外接矩形を `padding` だけ広げ、キャンバスと交差させた矩形。
 * 閉じていない投げ縄、退化した多角形、キャンバス外の選択では null。
 */
export const selectionBounds = (
  selection: Selection,
  canvasSize: Size,
  padding = 0,
): Rect | null => {
  const canvas = rectFromSize(canvasSize);
  if (isEmptyRect(canvas)) {
    return null;
  }

  if (selection.kind === 'fullCanvas') {
    return canvas;
  }

  if (!selection.closed || selection.points.length < MIN_LASSO_POINTS) {
    return null;
  }

  const bounds = boundsOfPoints(selection.points);
  if (!bounds || isEmptyRect(bounds)) {
    return null;
  }

  return intersectRects(expandRect(bounds, padding), canvas);
};

/**
 * 点の集合として扱える選択領域。
 * `bounds` は contains が true になり得る点をすべて含む矩形で、空の領域なら null。
 */
export interface SelectionRegion {
  readonly bounds: Rect | null;
  contains(point: Point): boolean;
}

const withinRect = (rect: Rect, point: Point): boolean => {
  return (
    point.x >= rect.x &&
    point.x <= rect.x + rect.width &&
    point.y >= rect.y &&
    point.y <= rect.y + rect.height
  );
};

/**
 * 多角形の塗りと、輪郭を `strokeWidth` で描いた線の和集合。
 * 生成画像を戻すときの縁が髪の毛ほどの細さにならないようにする。
 */
export const expandedBoundary = (
  polygon: readonly Point[],
  strokeWidth: number,
): SelectionRegion => {
  const halfWidth = strokeWidth / 2;
  const edges = polygon.map((point, index) => {
    const next = polygon[(index + 1) % polygon.length] ?? point;
    return [point, next] as const;
  });
  const outline = boundsOfPoints(polygon);
  const bounds = outline ? expandRect(outline, halfWidth) : null;

  return {
    bounds,
    contains: (point) =>
      bounds !== null &&
      withinRect(bounds, point) &&
      (polygonContains(polygon, point) ||
        edges.some(([start, end]) => distanceToSegment(point, start, end) <= halfWidth)),
  };
};

export const polygonRegion = (polygon: readonly Point[]): SelectionRegion => {
  const bounds = boundsOfPoints(polygon);
  return {
    bounds,
    contains: (point) =>
      bounds !== null && withinRect(bounds, point) && polygonContains(polygon, point),
  };
};
