import {
  imageContent,
  UserError,
  type Tool,
  type ToolParameters,
} from 'fastmcp';
import { z } from 'zod';
import { GENERATION_STYLES, DEFAULT_GENERATION_STYLE } from '../journal/generation/prompt.js';
import type { DoodleJournal } from '../journal/journal.js';
import { Raster } from '../journal/raster/raster.js';
import { FULL_CANVAS, lassoSelection, type Selection } from '../journal/selection/selection.js';
import { entriesOnDay, journalStats, parseLocalDay } from '../journal/store/entryQueries.js';
import { strokeSchema } from '../journal/store/journalSnapshot.js';
import type { JournalEntry } from '../journal/types.js';
import { resolveJournalConfig } from './config.js';
import { JournalWorkspace, type JournalWorkspaceOptions } from './workspace.js';

type MCPAuth = Record<string, unknown> | undefined;
type MCPTool = Tool<MCPAuth>;

const castSchema = <Schema extends z.ZodTypeAny>(
  schema: Schema,
): ToolParameters => {
  return schema as unknown as ToolParameters;
};

const entryIdParameters = z.object({
  entryId: z.string().min(1),
});

const createEntryParameters = z
  .object({
    caption: z.string().optional(),
  })
  .optional();

const listEntriesParameters = z
  .object({
    day: z
      .string()
      .refine((value) => parseLocalDay(value) !== null, {
        message: 'day は YYYY-MM-DD 形式で指定してください。',
      })
      .optional(),
  })
  .optional();

const updateCaptionParameters = z.object({
  entryId: z.string().min(1),
  caption: z.string(),
});

const updateBackgroundParameters = z.object({
  entryId: z.string().min(1),
  imageBase64: z.union([z.string().min(1), z.null()]),
});

const saveDrawingParameters = z.object({
  entryId: z.string().min(1),
  strokes: z.array(strokeSchema),
  generateThumbnail: z.boolean().optional(),
});

const pointParameters = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
});

const generateImageParameters = z.object({
  entryId: z.string().min(1),
  style: z.enum(GENERATION_STYLES).optional(),
  canvas: z.object({
    width: z.number().positive(),
    height: z.number().positive(),
  }),
  selection: z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('fullCanvas') }),
    z.object({ kind: z.literal('lasso'), points: z.array(pointParameters) }),
  ]),
});

export interface EntryView {
  readonly id: string;
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly caption: string;
  readonly hasBackground: boolean;
  readonly hasThumbnail: boolean;
}

export const toEntryView = (entry: JournalEntry): EntryView => ({
  id: entry.id,
  createdAt: entry.createdAt.toISOString(),
  updatedAt: entry.updatedAt.toISOString(),
  caption: entry.caption,
  hasBackground: entry.backgroundImageData !== null,
  hasThumbnail: entry.thumbnailData !== null,
});

const requireEntry = (journal: DoodleJournal, entryId: string): JournalEntry => {
  const entry = journal.entries.entry(entryId);
  if (!entry) {
    throw new UserError('指定したエントリが存在しません。');
  }
  return entry;
};

const decodeBackground = (imageBase64: string | null): Uint8Array | null => {
  if (imageBase64 === null) {
    return null;
  }

  const bytes = new Uint8Array(Buffer.from(imageBase64, 'base64'));
  try {
    Raster.decode(bytes);
  } catch {
    throw new UserError('imageBase64 は PNG 画像を base64 で指定してください。');
  }
  return bytes;
};

export interface BuildJournalToolsOptions extends JournalWorkspaceOptions {
  readonly workspace?: JournalWorkspace | undefined;
}

/**
 * ドゥードゥルジャーナルを操作する MCP ツール群を組み立てる。
 * ジャーナルは初回呼び出し時に journal.json から読み込まれ、変更のたびに保存される。
 */
export const buildJournalTools = (
  options: BuildJournalToolsOptions = {},
): MCPTool[] => {
  const workspace = options.workspace ?? new JournalWorkspace(options);
  const now = options.now ?? (() => new Date());

  const createEntryTool: MCPTool = {
    name: 'createEntry',
    description: `新しいドゥードゥルエントリを作成して一覧の先頭に追加する。
caption を指定するとキャプションも設定する。
作成したエントリを { id, createdAt, updatedAt, caption, hasBackground, hasThumbnail } 形式で返す。`,
    parameters: castSchema(createEntryParameters),
    execute: async (args) => {
      const parsed = createEntryParameters.parse(args) ?? {};

      const entry = await workspace.mutate((journal) => {
        const created = journal.entries.createEntry();
        if (parsed.caption !== undefined) {
          return journal.entries.updateCaption(parsed.caption, created.id) ?? created;
        }
        return created;
      });

      return JSON.stringify(toEntryView(entry));
    },
  };

  const listEntriesTool: MCPTool = {
    name: 'listEntries',
    description: `エントリ一覧を新しく作成した順に返す。
day (YYYY-MM-DD) を指定するとその日に作成したエントリだけを、更新が新しい順に返す。`,
    parameters: castSchema(listEntriesParameters),
    execute: async (args) => {
      const parsed = listEntriesParameters.parse(args) ?? {};
      const day = parsed.day === undefined ? null : parseLocalDay(parsed.day);

      const entries = await workspace.read((journal) =>
        day === null ? [...journal.entries.entries] : entriesOnDay(journal.entries.entries, day),
      );

      return JSON.stringify(entries.map(toEntryView));
    },
  };

  const getEntryTool: MCPTool = {
    name: 'getEntry',
    description: `entryId のエントリを取得する。存在しない場合は UserError を返す。`,
    parameters: castSchema(entryIdParameters),
    execute: async (args) => {
      const parsed = entryIdParameters.parse(args);
      const entry = await workspace.read((journal) => requireEntry(journal, parsed.entryId));
      return JSON.stringify(toEntryView(entry));
    },
  };

  const updateCaptionTool: MCPTool = {
    name: 'updateCaption',
    description: `エントリのキャプションを更新する。
同じ文字列を渡した場合は updatedAt を変更しない。`,
    parameters: castSchema(updateCaptionParameters),
    execute: async (args) => {
      const parsed = updateCaptionParameters.parse(args);

      const entry = await workspace.mutate((journal) => {
        requireEntry(journal, parsed.entryId);
        return journal.entries.updateCaption(parsed.caption, parsed.entryId);
      });

      if (!entry) {
        throw new UserError('指定したエントリが存在しません。');
      }
      return JSON.stringify(toEntryView(entry));
    },
  };

  const updateBackgroundTool: MCPTool = {
    name: 'updateBackground',
    description: `エントリの背景画像を差し替える。
imageBase64 に PNG を base64 で渡す。null を渡すと背景を消去する。`,
    parameters: castSchema(updateBackgroundParameters),
    execute: async (args) => {
      const parsed = updateBackgroundParameters.parse(args);
      const background = decodeBackground(parsed.imageBase64);

      const entry = await workspace.mutate((journal) => {
        requireEntry(journal, parsed.entryId);
        return journal.entries.updateBackgroundImageData(background, parsed.entryId);
      });

      if (!entry) {
        throw new UserError('指定したエントリが存在しません。');
      }
      return JSON.stringify(toEntryView(entry));
    },
  };

  const saveDrawingTool: MCPTool = {
    name: 'saveDrawing',
    description: `エントリの描画を保存する。
strokes は { points: {x, y}[], color: "#rrggbb", width } の配列。
generateThumbnail を true にするとサムネイルも作り直す（既定は作り直さない）。`,
    parameters: castSchema(saveDrawingParameters),
    execute: async (args) => {
      const parsed = saveDrawingParameters.parse(args);

      const entry = await workspace.mutate((journal) => {
        requireEntry(journal, parsed.entryId);
        journal.drawings.saveDrawing({ strokes: parsed.strokes }, parsed.entryId, {
          generateThumbnail: parsed.generateThumbnail === true,
        });
        return requireEntry(journal, parsed.entryId);
      });

      return JSON.stringify(toEntryView(entry));
    },
  };

  const loadDrawingTool: MCPTool = {
    name: 'loadDrawing',
    description: `エントリの描画を { strokes } 形式で返す。未保存なら空の描画を返す。`,
    parameters: castSchema(entryIdParameters),
    execute: async (args) => {
      const parsed = entryIdParameters.parse(args);
      const drawing = await workspace.read((journal) => {
        requireEntry(journal, parsed.entryId);
        return journal.drawings.loadDrawing(parsed.entryId);
      });
      return JSON.stringify(drawing);
    },
  };

  const deleteEntryTool: MCPTool = {
    name: 'deleteEntry',
    description: `エントリとその描画を削除する。存在しない ID は UserError を返す。`,
    parameters: castSchema(entryIdParameters),
    execute: async (args) => {
      const parsed = entryIdParameters.parse(args);

      await workspace.mutate((journal) => {
        requireEntry(journal, parsed.entryId);
        journal.deleteEntry(parsed.entryId);
      });

      return JSON.stringify({ deletedEntryId: parsed.entryId });
    },
  };

  const getThumbnailTool: MCPTool = {
    name: 'getThumbnail',
    description: `エントリのサムネイル PNG を画像コンテンツとして返す。
サムネイルが未生成の場合は UserError を返す。`,
    parameters: castSchema(entryIdParameters),
    execute: async (args) => {
      const parsed = entryIdParameters.parse(args);
      const entry = await workspace.read((journal) => requireEntry(journal, parsed.entryId));

      if (!entry.thumbnailData) {
        throw new UserError('サムネイルがまだ生成されていません。');
      }
      return imageContent({ buffer: Buffer.from(entry.thumbnailData) });
    },
  };

  const generateImageTool: MCPTool = {
    name: 'generateImage',
    description: `選択範囲の描画を画像生成 API に送り、結果をエントリの背景に合成する。
selection は { kind: "fullCanvas" } か { kind: "lasso", points: {x, y}[] }。
canvas はキャンバスの大きさ、style は ${GENERATION_STYLES.join(' / ')} のいずれか（既定は ${DEFAULT_GENERATION_STYLE}）。
成功すると描画は背景に焼き込まれて消去され、サムネイルが作り直される。`,
    parameters: castSchema(generateImageParameters),
    execute: async (args, context) => {
      const parsed = generateImageParameters.parse(args);
      const selection: Selection =
        parsed.selection.kind === 'lasso' ? lassoSelection(parsed.selection.points) : FULL_CANVAS;
      const { apiKey } = resolveJournalConfig();

      const outcome = await workspace.mutate((journal) => {
        requireEntry(journal, parsed.entryId);
        return journal.generation.generate({
          entryId: parsed.entryId,
          selection,
          canvasSize: parsed.canvas,
          style: parsed.style ?? DEFAULT_GENERATION_STYLE,
          apiKey: apiKey ?? '',
        });
      });

      switch (outcome.status) {
        case 'completed':
          context.log.info(`generated background for ${outcome.entry.id}`);
          return JSON.stringify(toEntryView(outcome.entry));
        case 'discarded':
          return JSON.stringify({ status: 'discarded' });
        case 'busy':
          throw new UserError('このエントリは画像を生成中です。完了してから再実行してください。');
        case 'unconfigured':
          throw new UserError('OPENAI_API_KEY が設定されていません。');
        case 'failed':
          context.log.warn(`generation failed (${outcome.error.kind})`);
          throw new UserError(outcome.error.message);
        default:
          throw new UserError('未対応の生成結果です。');
      }
    },
  };

  const journalStatsTool: MCPTool = {
    name: 'journalStats',
    description: `エントリ総数、今日のエントリの有無、連続記録日数を返す。`,
    execute: async () => {
      const stats = await workspace.read((journal) =>
        journalStats(journal.entries.entries, now()),
      );
      return JSON.stringify(stats);
    },
  };

  return [
    createEntryTool,
    listEntriesTool,
    getEntryTool,
    updateCaptionTool,
    updateBackgroundTool,
    saveDrawingTool,
    loadDrawingTool,
    deleteEntryTool,
    getThumbnailTool,
    generateImageTool,
    journalStatsTool,
  ];
};
