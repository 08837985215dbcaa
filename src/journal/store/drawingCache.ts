import { EMPTY_DRAWING, type Drawing } from '../types.js';
import type { ThumbnailRenderer } from '../raster/thumbnailRenderer.js';
import type { EntryStore } from './entryStore.js';

export interface SaveDrawingOptions {
  readonly generateThumbnail?: boolean | undefined;
  readonly date?: Date | undefined;
}

export interface DrawingCacheOptions {
  readonly entries: EntryStore;
  readonly renderThumbnail: ThumbnailRenderer;
  readonly drawings?: Readonly<Record<string, Drawing>> | undefined;
}

/**
 * エントリ ID ごとの描画データ。重い描画をエントリ本体から切り離して保持する。
 */
export class DrawingCache {
  private readonly drawings = new Map<string, Drawing>();
  private readonly entries: EntryStore;
  private readonly renderThumbnail: ThumbnailRenderer;

  constructor(options: DrawingCacheOptions) {
    this.entries = options.entries;
    this.renderThumbnail = options.renderThumbnail;
    this.restore(options.drawings ?? {});
  }

  loadDrawing(id: string): Drawing {
    return this.drawings.get(id) ?? EMPTY_DRAWING;
  }

  /**
   * 描画を保存し、対応するエントリがあれば updatedAt を進める。
   * サムネイルの再生成は generateThumbnail を指定したときだけ行う。
   */
  saveDrawing(drawing: Drawing, id: string, options: SaveDrawingOptions = {}): void {
    this.drawings.set(id, drawing);

    const entry = this.entries.entry(id);
    if (!entry) {
      return;
    }

    if (options.generateThumbnail === true) {
      this.entries.updateEntry(id, {
        date: options.date,
        thumbnailData: this.renderThumbnail(drawing, entry.backgroundImageData),
        updateThumbnail: true,
      });
      return;
    }

    this.entries.updateEntry(id, { date: options.date, updateThumbnail: false });
  }

  removeDrawing(id: string): boolean {
    return this.drawings.delete(id);
  }

  snapshot(): Record<string, Drawing> {
    return Object.fromEntries(this.drawings);
  }

  restore(drawings: Readonly<Record<string, Drawing>>): void {
    this.drawings.clear();
    for (const [id, drawing] of Object.entries(drawings)) {
      this.drawings.set(id, drawing);
    }
  }
}
