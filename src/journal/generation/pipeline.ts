import { createStore, type StoreApi } from 'zustand/vanilla';
import {
  coverRect,
  intersectRects,
  rectFromSize,
  scaleRect,
  snapRectOutward,
} from '../geometry.js';
import { Raster, WHITE, type PixelClip } from '../raster/raster.js';
import { pixelSizeOf, type DrawingSurface } from '../raster/strokeSurface.js';
import type { ThumbnailRenderer } from '../raster/thumbnailRenderer.js';
import {
  expandedBoundary,
  polygonRegion,
  selectionBounds,
  type Selection,
  type SelectionRegion,
} from '../selection/selection.js';
import type { DrawingCache } from '../store/drawingCache.js';
import type { EntryStore } from '../store/entryStore.js';
import { EMPTY_DRAWING, type JournalEntry, type Rect, type Size } from '../types.js';
import { GenerationError, generationError, toGenerationError } from './errors.js';
import type { ImageGenerationService, ImageSize } from './imageGenerationService.js';
import { buildPrompt, type GenerationStyle } from './prompt.js';

export const SELECTION_PADDING = 8;
export const EDGE_STROKE_WIDTH = 6;

const WIDE_RATIO = 1.2;
const TALL_RATIO = 0.83;

export type GenerationPhase =
  | 'idle'
  | 'rendering'
  | 'requesting'
  | 'composing'
  | 'failed';

export interface GenerationNotice {
  readonly entryId: string;
  readonly kind: GenerationError['kind'];
  readonly message: string;
}

export interface GenerationStatus {
  readonly phases: Readonly<Record<string, GenerationPhase>>;
  readonly notice: GenerationNotice | null;
}

export interface GenerationRequest {
  readonly entryId: string;
  readonly selection: Selection;
  readonly canvasSize: Size;
  readonly style: GenerationStyle;
  readonly apiKey: string;
  readonly signal?: AbortSignal | undefined;
}

export type GenerationOutcome =
  | { readonly status: 'completed'; readonly entry: JournalEntry }
  | { readonly status: 'failed'; readonly error: GenerationError }
  | { readonly status: 'busy' }
  | { readonly status: 'unconfigured' }
  | { readonly status: 'discarded' };

export interface GenerationPipelineOptions {
  readonly entries: EntryStore;
  readonly drawings: DrawingCache;
  readonly surface: DrawingSurface;
  readonly service: ImageGenerationService;
  readonly renderThumbnail: ThumbnailRenderer;
  readonly scale: number;
}

/**
 * 切り出し範囲の縦横比から、サービスが受け付ける 3 種類の固定サイズを選ぶ。
 */
export const chooseImageSize = (width: number, height: number): ImageSize => {
  const ratio = width / height;
  if (ratio > WIDE_RATIO) {
    return '1536x1024';
  }
  if (ratio < TALL_RATIO) {
    return '1024x1536';
  }
  return '1024x1024';
};

const decodeGenerated = (bytes: Uint8Array): Raster => {
  try {
    return Raster.decode(bytes);
  } catch (error: unknown) {
    throw generationError(
      'missingImage',
      'The image API returned data that is not a PNG image.',
      error,
    );
  }
};

/**
 * 選択範囲を切り出して画像生成サービスへ送り、結果をエントリの背景へ合成し直す。
 * 同じエントリに対する生成は同時に 1 つまでで、実行中の要求は busy として即座に断る。
 */
export class GenerationPipeline {
  private readonly entries: EntryStore;
  private readonly drawings: DrawingCache;
  private readonly surface: DrawingSurface;
  private readonly service: ImageGenerationService;
  private readonly renderThumbnail: ThumbnailRenderer;
  private readonly scale: number;
  private readonly status: StoreApi<GenerationStatus>;

  constructor(options: GenerationPipelineOptions) {
    this.entries = options.entries;
    this.drawings = options.drawings;
    this.surface = options.surface;
    this.service = options.service;
    this.renderThumbnail = options.renderThumbnail;
    this.scale = options.scale;
    this.status = createStore<GenerationStatus>()(() => ({
      phases: {},
      notice: null,
    }));
  }

  phaseOf(entryId: string): GenerationPhase {
    return this.status.getState().phases[entryId] ?? 'idle';
  }

  get notice(): GenerationNotice | null {
    return this.status.getState().notice;
  }

  dismissNotice(): void {
    this.status.setState({ notice: null });
  }

  subscribe(listener: (status: GenerationStatus, previous: GenerationStatus) => void): () => void {
    return this.status.subscribe(listener);
  }

  async generate(request: GenerationRequest): Promise<GenerationOutcome> {
    const apiKey = request.apiKey.trim();
    if (apiKey.length === 0) {
      return { status: 'unconfigured' };
    }

    const { entryId } = request;
    if (this.phaseOf(entryId) !== 'idle') {
      return { status: 'busy' };
    }
    this.setPhase(entryId, 'rendering');

    try {
      const prepared = this.prepare(request);

      this.setPhase(entryId, 'requesting');
      const generated = await this.service.editImage(
        {
          image: prepared.payload.encode(),
          mask: null,
          prompt: buildPrompt(request.style),
          size: chooseImageSize(prepared.payload.width, prepared.payload.height),
        },
        { apiKey, signal: request.signal },
      );

      this.setPhase(entryId, 'composing');
      const background = this.compose(request.selection, prepared, generated);

      if (!this.entries.entry(entryId)) {
        return { status: 'discarded' };
      }

      // 書き込みはサムネイルまで作り終えてからまとめて行う
      const thumbnail = this.renderThumbnail(EMPTY_DRAWING, background);
      this.entries.updateBackgroundImageData(background, entryId);
      this.drawings.saveDrawing(EMPTY_DRAWING, entryId);
      const entry = this.entries.updateEntry(entryId, {
        thumbnailData: thumbnail,
        updateThumbnail: true,
      });
      return entry ? { status: 'completed', entry } : { status: 'discarded' };
    } catch (error: unknown) {
      const failure = toGenerationError(error);
      this.setPhase(entryId, 'failed');
      this.status.setState({
        notice: { entryId, kind: failure.kind, message: failure.message },
      });
      console.warn(`[doodle-journal] generation failed for ${entryId}: ${failure.message}`);
      return { status: 'failed', error: failure };
    } finally {
      this.setPhase(entryId, 'idle');
    }
  }

  private prepare(request: GenerationRequest): PreparedGeneration {
    const entry = this.entries.entry(request.entryId);
    const drawing = this.drawings.loadDrawing(request.entryId);
    const backgroundData = entry?.backgroundImageData ?? null;
    const hasDrawing = this.surface.contentBounds(drawing) !== null;

    if (!hasDrawing && !backgroundData) {
      throw generationError('noContent');
    }

    const bounds = selectionBounds(request.selection, request.canvasSize, SELECTION_PADDING);
    if (!bounds) {
      throw generationError('noSelection');
    }

    const canvasRect = rectFromSize(request.canvasSize);
    const width = pixelSizeOf(canvasRect.width, this.scale);
    const height = pixelSizeOf(canvasRect.height, this.scale);
    const frame: Rect = { x: 0, y: 0, width, height };

    const strokes = hasDrawing
      ? Raster.decode(this.surface.rasterize(drawing, canvasRect, this.scale))
      : null;

    const base = Raster.create(width, height, WHITE);
    if (backgroundData) {
      base.drawImage(Raster.decode(backgroundData), frame);
    }
    if (strokes) {
      base.drawImage(strokes, frame);
    }

    let lineArt = base;
    if (strokes) {
      lineArt = Raster.create(width, height, WHITE);
      lineArt.drawImage(strokes, frame);
    }

    const cropRect = intersectRects(snapRectOutward(scaleRect(bounds, this.scale)), frame);
    if (!cropRect) {
      throw generationError('noSelection');
    }

    const payload = lineArt.crop(cropRect);
    if (request.selection.kind === 'lasso') {
      const inside = this.pixelClip(polygonRegion(request.selection.points), cropRect);
      payload.fill(WHITE, (x, y) => !inside(x, y));
    }

    return { base, bounds, payload };
  }

  private compose(
    selection: Selection,
    prepared: PreparedGeneration,
    generatedBytes: Uint8Array,
  ): Uint8Array {
    const generated = decodeGenerated(generatedBytes);
    if (selection.kind === 'fullCanvas') {
      return generatedBytes;
    }

    const merged = prepared.base.clone();
    const frame: Rect = { x: 0, y: 0, width: merged.width, height: merged.height };
    const region = expandedBoundary(selection.points, EDGE_STROKE_WIDTH);
    const area = region.bounds
      ? intersectRects(snapRectOutward(scaleRect(region.bounds, this.scale)), frame)
      : null;
    if (!area) {
      return merged.encode();
    }

    const inRegion = this.pixelClip(region, frame);
    merged.fill(WHITE, inRegion, area);
    const target = scaleRect(prepared.bounds, this.scale);
    merged.drawImage(generated, coverRect(generated.size, target), (x, y) => {
      const centerX = x + 0.5;
      const centerY = y + 0.5;
      return (
        centerX >= target.x &&
        centerX < target.x + target.width &&
        centerY >= target.y &&
        centerY < target.y + target.height &&
        inRegion(x, y)
      );
    });

    return merged.encode();
  }

  /**
   * ピクセル座標（`origin` からの相対）をキャンバス座標に戻して領域判定する。
   */
  private pixelClip(region: SelectionRegion, origin: Rect): PixelClip {
    return (x, y) =>
      region.contains({
        x: (origin.x + x + 0.5) / this.scale,
        y: (origin.y + y + 0.5) / this.scale,
      });
  }

  private setPhase(entryId: string, phase: GenerationPhase): void {
    this.status.setState(({ phases }) => {
      const next = { ...phases };
      if (phase === 'idle') {
        delete next[entryId];
      } else {
        next[entryId] = phase;
      }
      return { phases: next };
    });
  }
}

interface PreparedGeneration {
  readonly base: Raster;
  readonly bounds: Rect;
  readonly payload: Raster;
}
