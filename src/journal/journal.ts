import { GenerationPipeline } from './generation/pipeline.js';
import {
  OpenAIImageService,
  type ImageGenerationService,
} from './generation/imageGenerationService.js';
import { StrokeSurface, type DrawingSurface } from './raster/strokeSurface.js';
import {
  createThumbnailRenderer,
  type ThumbnailRenderer,
} from './raster/thumbnailRenderer.js';
import { DrawingCache } from './store/drawingCache.js';
import { EntryStore } from './store/entryStore.js';
import type { JournalSnapshot } from './types.js';

export const DEFAULT_RENDER_SCALE = 2;

export interface DoodleJournalOptions {
  readonly snapshot?: JournalSnapshot | undefined;
  readonly surface?: DrawingSurface | undefined;
  readonly imageService?: ImageGenerationService | undefined;
  readonly renderScale?: number | undefined;
  readonly now?: (() => Date) | undefined;
}

/**
 * エントリ・描画・サムネイル・生成パイプラインをまとめたジャーナル本体。
 */
export class DoodleJournal {
  readonly entries: EntryStore;
  readonly drawings: DrawingCache;
  readonly generation: GenerationPipeline;
  readonly renderThumbnail: ThumbnailRenderer;

  constructor(options: DoodleJournalOptions = {}) {
    const surface = options.surface ?? new StrokeSurface();
    const scale = options.renderScale ?? DEFAULT_RENDER_SCALE;

    this.renderThumbnail = createThumbnailRenderer({ surface, scale });
    this.entries = new EntryStore({
      entries: options.snapshot?.entries,
      now: options.now,
    });
    this.drawings = new DrawingCache({
      entries: this.entries,
      renderThumbnail: this.renderThumbnail,
      drawings: options.snapshot?.drawings,
    });
    this.generation = new GenerationPipeline({
      entries: this.entries,
      drawings: this.drawings,
      surface,
      service: options.imageService ?? new OpenAIImageService(),
      renderThumbnail: this.renderThumbnail,
      scale,
    });
  }

  /**
   * エントリと、そのエントリの描画をまとめて削除する。
   */
  deleteEntry(id: string): boolean {
    const removedDrawing = this.drawings.removeDrawing(id);
    const removedEntry = this.entries.deleteEntry(id);
    return removedEntry || removedDrawing;
  }

  snapshot(): JournalSnapshot {
    return {
      entries: this.entries.snapshot(),
      drawings: this.drawings.snapshot(),
    };
  }

  restore(snapshot: JournalSnapshot): void {
    this.entries.restore(snapshot.entries);
    this.drawings.restore(snapshot.drawings);
  }
}
