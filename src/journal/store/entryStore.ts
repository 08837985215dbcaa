import { randomUUID } from 'node:crypto';
import { createStore, type StoreApi } from 'zustand/vanilla';
import type { JournalEntry } from '../types.js';

/**
 * エントリ作成時のオプション。id と date はテストや復元用の上書き。
 */
export interface CreateEntryOptions {
  readonly id?: string | undefined;
  readonly date?: Date | undefined;
}

export interface UpdateEntryOptions {
  readonly date?: Date | undefined;
  readonly thumbnailData?: Uint8Array | null | undefined;
  /**
   * true のときだけ thumbnailData を書き込む。null を渡せばサムネイルを消去できる。
   */
  readonly updateThumbnail?: boolean | undefined;
}

export interface EntryStoreOptions {
  readonly entries?: readonly JournalEntry[] | undefined;
  readonly now?: (() => Date) | undefined;
}

export type EntriesListener = (
  entries: readonly JournalEntry[],
  previous: readonly JournalEntry[],
) => void;

interface EntryStoreState {
  readonly entries: readonly JournalEntry[];
}

const latestOf = (createdAt: Date, candidate: Date): Date => {
  return candidate.getTime() < createdAt.getTime() ? createdAt : candidate;
};

/**
 * ジャーナルエントリの順序付きコレクション。
 * 新規作成は常に先頭に挿入し、作成後に日時で並べ替えることはない。
 * 存在しない ID への操作は例外を投げず null を返す。
 */
export class EntryStore {
  private readonly state: StoreApi<EntryStoreState>;
  private readonly now: () => Date;

  constructor(options: EntryStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.state = createStore<EntryStoreState>()(() => ({
      entries: [...(options.entries ?? [])],
    }));
  }

  get entries(): readonly JournalEntry[] {
    return this.state.getState().entries;
  }

  createEntry(options: CreateEntryOptions = {}): JournalEntry {
    if (options.id !== undefined) {
      const existing = this.entry(options.id);
      if (existing) {
        return existing;
      }
    }

    const timestamp = options.date ?? this.now();
    const entry: JournalEntry = {
      id: options.id ?? randomUUID(),
      createdAt: timestamp,
      updatedAt: timestamp,
      caption: '',
      backgroundImageData: null,
      thumbnailData: null,
    };

    this.state.setState(({ entries }) => ({ entries: [entry, ...entries] }));
    return entry;
  }

  entry(id: string): JournalEntry | null {
    return this.entries.find((entry) => entry.id === id) ?? null;
  }

  updateEntry(id: string, options: UpdateEntryOptions = {}): JournalEntry | null {
    return this.replace(id, (current) => ({
      ...current,
      updatedAt: latestOf(current.createdAt, options.date ?? this.now()),
      thumbnailData:
        options.updateThumbnail === true
          ? options.thumbnailData ?? null
          : current.thumbnailData,
    }));
  }

  updateCaption(caption: string, id: string): JournalEntry | null {
    const current = this.entry(id);
    if (!current || current.caption === caption) {
      return current;
    }

    return this.replace(id, (entry) => ({
      ...entry,
      caption,
      updatedAt: latestOf(entry.createdAt, this.now()),
    }));
  }

  updateBackgroundImageData(
    data: Uint8Array | null,
    id: string,
  ): JournalEntry | null {
    return this.replace(id, (entry) => ({
      ...entry,
      backgroundImageData: data,
      updatedAt: latestOf(entry.createdAt, this.now()),
    }));
  }

  deleteEntry(id: string): boolean {
    if (!this.entry(id)) {
      return false;
    }

    this.state.setState(({ entries }) => ({
      entries: entries.filter((entry) => entry.id !== id),
    }));
    return true;
  }

  /**
   * エントリ一覧の変化を購読する。戻り値を呼ぶと購読を解除する。
   */
  subscribe(listener: EntriesListener): () => void {
    return this.state.subscribe((state, previous) => {
      if (state.entries !== previous.entries) {
        listener(state.entries, previous.entries);
      }
    });
  }

  snapshot(): JournalEntry[] {
    return [...this.entries];
  }

  restore(entries: readonly JournalEntry[]): void {
    this.state.setState({ entries: [...entries] });
  }

  private replace(
    id: string,
    update: (entry: JournalEntry) => JournalEntry,
  ): JournalEntry | null {
    const index = this.entries.findIndex((entry) => entry.id === id);
    const current = this.entries[index];
    if (index < 0 || current === undefined) {
      return null;
    }

    const next = update(current);
    this.state.setState(({ entries }) => ({
      entries: entries.map((entry, position) => (position === index ? next : entry)),
    }));
    return next;
  }
}
