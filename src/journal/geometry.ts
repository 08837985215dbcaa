import type { Point, Rect, Size } from './types.js';

export const rectFromSize = (size: Size): Rect => ({
  x: 0,
  y: 0,
  width: size.width,
  height: size.height,
});

export const isEmptyRect = (rect: Rect): boolean => {
  return !(rect.width > 0 && rect.height > 0);
};

/**
 * 四辺を `amount` だけ外側へ広げる。負の値なら内側へ縮める。
 */
export const expandRect = (rect: Rect, amount: number): Rect => ({
  x: rect.x - amount,
  y: rect.y - amount,
  width: rect.width + amount * 2,
  height: rect.height + amount * 2,
});

export const intersectRects = (a: Rect, b: Rect): Rect | null => {
  const left = Math.max(a.x, b.x);
  const top = Math.max(a.y, b.y);
  const right = Math.min(a.x + a.width, b.x + b.width);
  const bottom = Math.min(a.y + a.height, b.y + b.height);

  if (right <= left || bottom <= top) {
    return null;
  }

  return { x: left, y: top, width: right - left, height: bottom - top };
};

export const unionRects = (a: Rect, b: Rect): Rect => {
  const left = Math.min(a.x, b.x);
  const top = Math.min(a.y, b.y);
  const right = Math.max(a.x + a.width, b.x + b.width);
  const bottom = Math.max(a.y + a.height, b.y + b.height);
  return { x: left, y: top, width: right - left, height: bottom - top };
};

export const boundsOfPoints = (points: readonly Point[]): Rect | null => {
  const [first, ...rest] = points;
  if (first === undefined) {
    return null;
  }

  let minX = first.x;
  let minY = first.y;
  let maxX = first.x;
  let maxY = first.y;

  for (const point of rest) {
    minX = Math.min(minX, point.x);
    minY = Math.min(minY, point.y);
    maxX = Math.max(maxX, point.x);
    maxY = Math.max(maxY, point.y);
  }

  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
};

export const distanceToSegment = (point: Point, start: Point, end: Point): number => {
  const dx = end.x - start.x;
  const dy = end.y - start.y;
  const lengthSquared = dx * dx + dy * dy;

  if (lengthSquared === 0) {
    return Math.hypot(point.x - start.x, point.y - start.y);
  }

  const t = Math.max(
    0,
    Math.min(1, ((point.x - start.x) * dx + (point.y - start.y) * dy) / lengthSquared),
  );
  return Math.hypot(point.x - (start.x + t * dx), point.y - (start.y + t * dy));
};

/**
 * 偶奇規則による多角形の内外判定。辺は暗黙に閉じているものとして扱う。
 */
export const polygonContains = (polygon: readonly Point[], point: Point): boolean => {
  let inside = false;

  for (let index = 0, previous = polygon.length - 1; index < polygon.length; previous = index, index += 1) {
    const current = polygon[index];
    const prior = polygon[previous];
    if (current === undefined || prior === undefined) {
      continue;
    }

    const crosses =
      current.y > point.y !== prior.y > point.y &&
      point.x < ((prior.x - current.x) * (point.y - current.y)) / (prior.y - current.y) + current.x;

    if (crosses) {
      inside = !inside;
    }
  }

  return inside;
};

/**
 * `target` を覆い尽くすようにアスペクト比を保って拡大した配置矩形を返す（中央寄せ）。
 */
export const coverRect = (source: Size, target: Rect): Rect => {
  const scale = Math.max(target.width / source.width, target.height / source.height);
  const width = source.width * scale;
  const height = source.height * scale;

  return {
    x: target.x + (target.width - width) / 2,
    y: target.y + (target.height - height) / 2,
    width,
    height,
  };
};

export const scaleRect = (rect: Rect, scale: number): Rect => ({
  x: rect.x * scale,
  y: rect.y * scale,
  width: rect.width * scale,
  height: rect.height * scale,
});

/**
 * 小数座標の矩形を、それを含む整数ピクセル矩形へ丸める。
 */
export const snapRectOutward = (rect: Rect): Rect => {
  const left = Math.floor(rect.x);
  const top = Math.floor(rect.y);
  const right = Math.ceil(rect.x + rect.width);
  const bottom = Math.ceil(rect.y + rect.height);
  return { x: left, y: top, width: right - left, height: bottom - top };
};
