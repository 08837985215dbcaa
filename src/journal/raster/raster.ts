import { PNG } from 'pngjs';
import type { Rect, Size } from '../types.js';

export interface Rgba {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

export const WHITE: Rgba = { r: 255, g: 255, b: 255, a: 255 };
export const TRANSPARENT: Rgba = { r: 0, g: 0, b: 0, a: 0 };

/**
 * ピクセル単位のクリップ判定。(x, y) は整数のピクセル座標。
 */
export type PixelClip = (x: number, y: number) => boolean;

const HEX_COLOR = /^#(?:[0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/iu;

export const isHexColor = (value: string): boolean => HEX_COLOR.test(value);

/**
 * `#rgb` / `#rrggbb` / `#rrggbbaa` を RGBA に変換する。
 */
export const parseHexColor = (value: string): Rgba => {
  if (!isHexColor(value)) {
    throw new Error(`invalid color: ${value}`);
  }

  const hex = value.slice(1);
  const expanded =
    hex.length === 3
      ? hex
          .split('')
          .map((digit) => `${digit}${digit}`)
          .join('')
      : hex;

  const channel = (offset: number): number =>
    Number.parseInt(expanded.slice(offset, offset + 2), 16);

  return {
    r: channel(0),
    g: channel(2),
    b: channel(4),
    a: expanded.length === 8 ? channel(6) : 255,
  };
};

/**
 * RGBA 8bit のピクセルバッファ。PNG との相互変換は pngjs に任せる。
 */
export class Raster {
  private constructor(
    readonly width: number,
    readonly height: number,
    private readonly data: Buffer,
  ) {}

  static create(width: number, height: number, color: Rgba = TRANSPARENT): Raster {
    const raster = new Raster(width, height, Buffer.alloc(width * height * 4));
    if (color.a > 0) {
      raster.fill(color);
    }
    return raster;
  }

  static decode(bytes: Uint8Array): Raster {
    const png = PNG.sync.read(Buffer.from(bytes));
    return new Raster(png.width, png.height, Buffer.from(png.data));
  }

  get size(): Size {
    return { width: this.width, height: this.height };
  }

  encode(): Uint8Array {
    const png = new PNG({ width: this.width, height: this.height });
    this.data.copy(png.data);
    return PNG.sync.write(png);
  }

  clone(): Raster {
    return new Raster(this.width, this.height, Buffer.from(this.data));
  }

  getPixel(x: number, y: number): Rgba {
    const offset = this.offsetOf(x, y);
    return {
      r: this.data[offset] ?? 0,
      g: this.data[offset + 1] ?? 0,
      b: this.data[offset + 2] ?? 0,
      a: this.data[offset + 3] ?? 0,
    };
  }

  setPixel(x: number, y: number, color: Rgba): void {
    const offset = this.offsetOf(x, y);
    this.data[offset] = color.r;
    this.data[offset + 1] = color.g;
    this.data[offset + 2] = color.b;
    this.data[offset + 3] = color.a;
  }

  /**
   * source-over で 1 ピクセルを合成する。
   */
  blendPixel(x: number, y: number, color: Rgba): void {
    if (color.a === 0) {
      return;
    }
    if (color.a === 255) {
      this.setPixel(x, y, color);
      return;
    }

    const below = this.getPixel(x, y);
    const sourceAlpha = color.a / 255;
    const belowAlpha = below.a / 255;
    const outAlpha = sourceAlpha + belowAlpha * (1 - sourceAlpha);
    const mix = (source: number, target: number): number =>
      Math.round((source * sourceAlpha + target * belowAlpha * (1 - sourceAlpha)) / outAlpha);

    this.setPixel(x, y, {
      r: mix(color.r, below.r),
      g: mix(color.g, below.g),
      b: mix(color.b, below.b),
      a: Math.round(outAlpha * 255),
    });
  }

  /**
   * 色で塗りつぶす（置き換え）。clip があれば該当ピクセルのみ。
   * area（ピクセル座標）を渡すと、その矩形の外は走査しない。
   */
  fill(color: Rgba, clip?: PixelClip, area?: Rect): void {
    const left = area ? Math.max(0, Math.floor(area.x)) : 0;
    const top = area ? Math.max(0, Math.floor(area.y)) : 0;
    const right = area ? Math.min(this.width, Math.ceil(area.x + area.width)) : this.width;
    const bottom = area ? Math.min(this.height, Math.ceil(area.y + area.height)) : this.height;

    for (let y = top; y < bottom; y += 1) {
      for (let x = left; x < right; x += 1) {
        if (!clip || clip(x, y)) {
          this.setPixel(x, y, color);
        }
      }
    }
  }

  /**
   * `source` を `dest`（ピクセル座標、小数可）へ引き伸ばして最近傍補間で描画する。
   * ピクセル中心が dest の内側にあるピクセルだけが対象。
   */
  drawImage(source: Raster, dest: Rect, clip?: PixelClip): void {
    if (!(dest.width > 0 && dest.height > 0) || source.width === 0 || source.height === 0) {
      return;
    }

    const left = Math.max(0, Math.floor(dest.x));
    const top = Math.max(0, Math.floor(dest.y));
    const right = Math.min(this.width, Math.ceil(dest.x + dest.width));
    const bottom = Math.min(this.height, Math.ceil(dest.y + dest.height));

    for (let y = top; y < bottom; y += 1) {
      const centerY = y + 0.5;
      if (centerY < dest.y || centerY >= dest.y + dest.height) {
        continue;
      }
      const sourceY = Math.min(
        source.height - 1,
        Math.floor(((centerY - dest.y) / dest.height) * source.height),
      );

      for (let x = left; x < right; x += 1) {
        const centerX = x + 0.5;
        if (centerX < dest.x || centerX >= dest.x + dest.width) {
          continue;
        }
        if (clip && !clip(x, y)) {
          continue;
        }
        const sourceX = Math.min(
          source.width - 1,
          Math.floor(((centerX - dest.x) / dest.width) * source.width),
        );
        this.blendPixel(x, y, source.getPixel(sourceX, sourceY));
      }
    }
  }

  /**
   * 整数ピクセル矩形で切り出す。範囲外は透明になる。
   */
  crop(rect: Rect): Raster {
    const width = Math.max(0, Math.round(rect.width));
    const height = Math.max(0, Math.round(rect.height));
    const originX = Math.round(rect.x);
    const originY = Math.round(rect.y);
    const cropped = Raster.create(width, height);

    for (let y = 0; y < height; y += 1) {
      for (let x = 0; x < width; x += 1) {
        const sourceX = originX + x;
        const sourceY = originY + y;
        if (sourceX >= 0 && sourceY >= 0 && sourceX < this.width && sourceY < this.height) {
          cropped.setPixel(x, y, this.getPixel(sourceX, sourceY));
        }
      }
    }

    return cropped;
  }

  private offsetOf(x: number, y: number): number {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      throw new RangeError(`pixel out of bounds: (${x}, ${y})`);
    }
    return (y * this.width + x) * 4;
  }
}
