import { z } from 'zod';
import { isHexColor } from '../raster/raster.js';
import type { Drawing, JournalEntry, JournalSnapshot } from '../types.js';

export const SNAPSHOT_VERSION = 1;

const pointSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
});

export const strokeSchema = z.object({
  points: z.array(pointSchema),
  color: z.string().refine(isHexColor, { message: 'color must be #rgb, #rrggbb or #rrggbbaa' }),
  width: z.number().positive(),
});

export const drawingSchema = z.object({
  strokes: z.array(strokeSchema),
});

const isoDate = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'invalid date' });

const entryRecordSchema = z
  .object({
    id: z.string().min(1),
    createdAt: isoDate,
    updatedAt: isoDate,
    caption: z.string(),
    backgroundImage: z.string().nullable(),
    thumbnail: z.string().nullable(),
  })
  .refine((record) => Date.parse(record.updatedAt) >= Date.parse(record.createdAt), {
    message: 'updatedAt must not be earlier than createdAt',
    path: ['updatedAt'],
  });

const entryListSchema = z.array(entryRecordSchema).superRefine((records, context) => {
  const seen = new Set<string>();
  records.forEach((record, index) => {
    if (seen.has(record.id)) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: `duplicate entry id: ${record.id}`,
        path: [index, 'id'],
      });
    }
    seen.add(record.id);
  });
});

const snapshotFileSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  entries: entryListSchema,
  drawings: z.record(drawingSchema),
});

export type JournalSnapshotFile = z.infer<typeof snapshotFileSchema>;

const encodeBytes = (bytes: Uint8Array | null): string | null => {
  return bytes ? Buffer.from(bytes).toString('base64') : null;
};

const decodeBytes = (encoded: string | null): Uint8Array | null => {
  return encoded === null ? null : new Uint8Array(Buffer.from(encoded, 'base64'));
};

/**
 * スナップショットを JSON 化できる形にする。日時は ISO 8601、画像は base64。
 */
export const encodeSnapshot = (snapshot: JournalSnapshot): JournalSnapshotFile => ({
  version: SNAPSHOT_VERSION,
  entries: snapshot.entries.map((entry) => ({
    id: entry.id,
    createdAt: entry.createdAt.toISOString(),
    updatedAt: entry.updatedAt.toISOString(),
    caption: entry.caption,
    backgroundImage: encodeBytes(entry.backgroundImageData),
    thumbnail: encodeBytes(entry.thumbnailData),
  })),
  drawings: Object.fromEntries(
    Object.entries(snapshot.drawings).map(([id, drawing]) => [
      id,
      {
        strokes: drawing.strokes.map((stroke) => ({
          points: stroke.points.map(({ x, y }) => ({ x, y })),
          color: stroke.color,
          width: stroke.width,
        })),
      },
    ]),
  ),
});

/**
 * JSON から読み込んだ値を検証してスナップショットに戻す。
 * 形式が不正なとき、ID が重複するとき、updatedAt が createdAt より前のときは ZodError を投げる。
 */
export const decodeSnapshot = (value: unknown): JournalSnapshot => {
  const file = snapshotFileSchema.parse(value);

  const entries: JournalEntry[] = file.entries.map((record) => ({
    id: record.id,
    createdAt: new Date(record.createdAt),
    updatedAt: new Date(record.updatedAt),
    caption: record.caption,
    backgroundImageData: decodeBytes(record.backgroundImage),
    thumbnailData: decodeBytes(record.thumbnail),
  }));

  const drawings: Record<string, Drawing> = file.drawings;

  return { entries, drawings };
};

export const emptySnapshot = (): JournalSnapshot => ({ entries: [], drawings: {} });
