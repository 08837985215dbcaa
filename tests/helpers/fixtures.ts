import { Raster, type Rgba } from '../../src/journal/raster/raster.js';
import type { Drawing, Point } from '../../src/journal/types.js';

export const RED: Rgba = { r: 255, g: 0, b: 0, a: 255 };
export const BLUE: Rgba = { r: 0, g: 0, b: 255, a: 255 };
export const BLACK: Rgba = { r: 0, g: 0, b: 0, a: 255 };

export const solidPng = (width: number, height: number, color: Rgba): Uint8Array => {
  return Raster.create(width, height, color).encode();
};

export const lineDrawing = (points: Point[], width = 4, color = '#000000'): Drawing => ({
  strokes: [{ points, color, width }],
});

/**
 * 外から resolve / reject できる Promise。生成中の状態を観察するために使う。
 */
export const deferred = <T>() => {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((onResolve, onReject) => {
    resolve = onResolve;
    reject = onReject;
  });
  return { promise, resolve, reject };
};
