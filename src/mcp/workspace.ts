import { OpenAIImageService, type ImageGenerationService } from '../journal/generation/imageGenerationService.js';
import { DoodleJournal } from '../journal/journal.js';
import type { DrawingSurface } from '../journal/raster/strokeSurface.js';
import { resolveJournalConfig } from './config.js';
import { loadJournalSnapshot, saveJournalSnapshot } from './storage/journalRepository.js';

export interface JournalWorkspaceOptions {
  readonly imageService?: ImageGenerationService | undefined;
  readonly surface?: DrawingSurface | undefined;
  readonly now?: (() => Date) | undefined;
}

/**
 * journal.json を初回アクセス時に読み込み、変更のたびに書き戻すホスト側の入れ物。
 */
export class JournalWorkspace {
  private opening: Promise<DoodleJournal> | null = null;

  constructor(private readonly options: JournalWorkspaceOptions = {}) {}

  open(): Promise<DoodleJournal> {
    this.opening ??= this.load().catch((error: unknown) => {
      this.opening = null;
      throw error;
    });
    return this.opening;
  }

  async read<T>(action: (journal: DoodleJournal) => T | Promise<T>): Promise<T> {
    const journal = await this.open();
    return action(journal);
  }

  async mutate<T>(action: (journal: DoodleJournal) => T | Promise<T>): Promise<T> {
    const journal = await this.open();
    const result = await action(journal);
    await saveJournalSnapshot(journal.snapshot());
    return result;
  }

  private async load(): Promise<DoodleJournal> {
    const config = resolveJournalConfig();
    const snapshot = await loadJournalSnapshot();

    return new DoodleJournal({
      snapshot,
      renderScale: config.renderScale,
      surface: this.options.surface,
      now: this.options.now,
      imageService:
        this.options.imageService ?? new OpenAIImageService({ model: config.imageModel }),
    });
  }
}
