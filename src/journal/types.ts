export interface Point {
  readonly x: number;
  readonly y: number;
}

export interface Size {
  readonly width: number;
  readonly height: number;
}

export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/**
 * 1 本のストローク。色と太さは描き始めの時点で確定する。
 */
export interface Stroke {
  readonly points: readonly Point[];
  readonly color: string;
  readonly width: number;
}

export interface Drawing {
  readonly strokes: readonly Stroke[];
}

export const EMPTY_DRAWING: Drawing = { strokes: [] };

export interface JournalEntry {
  readonly id: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly caption: string;
  readonly backgroundImageData: Uint8Array | null;
  readonly thumbnailData: Uint8Array | null;
}

/**
 * 永続化レイヤーとの受け渡しに使うジャーナル全体のスナップショット。
 */
export interface JournalSnapshot {
  readonly entries: readonly JournalEntry[];
  readonly drawings: Readonly<Record<string, Drawing>>;
}
