#!/usr/bin/env node
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { UserError } from 'fastmcp';
import { runDoodleJournalServer } from '../mcp/cli.js';
import { DOODLE_JOURNAL_HOME_ENV } from '../mcp/storage/paths.js';
import { exportImage } from '../mcp/storage/journalRepository.js';
import { toEntryView, type EntryView } from '../mcp/tools.js';
import { JournalWorkspace } from '../mcp/workspace.js';
import { entriesOnDay, journalStats, parseLocalDay } from '../journal/store/entryQueries.js';

type TransportType = 'stdio' | 'httpStream';

interface RunCliOptions {
  readonly argv?: string[];
  readonly now?: () => Date;
}

interface GlobalOptions {
  homePath?: string;
  json: boolean;
}

type CommandName =
  | 'server'
  | 'create'
  | 'list'
  | 'show'
  | 'caption'
  | 'delete'
  | 'export'
  | 'stats'
  | 'help';

const COMMANDS: readonly CommandName[] = [
  'server',
  'create',
  'list',
  'show',
  'caption',
  'delete',
  'export',
  'stats',
  'help',
];

interface ParsedArguments {
  readonly command: CommandName;
  readonly global: GlobalOptions;
  readonly args: string[];
}

interface CommandContext {
  readonly args: string[];
  readonly global: GlobalOptions;
  readonly workspace: JournalWorkspace;
  readonly now: () => Date;
}

class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliError';
  }
}

const isCommandName = (value: string): value is CommandName => {
  return COMMANDS.some((command) => command === value);
};

const parseArguments = (argv: string[]): ParsedArguments => {
  const global: GlobalOptions = { json: false };
  const rest: string[] = [];

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (token === undefined) {
      throw new CliError('引数の解析に失敗しました。');
    }

    if (token === '--home') {
      const value = argv[index + 1];
      if (!value) {
        throw new CliError('--home の引数が不足しています。');
      }
      global.homePath = value;
      index += 1;
      continue;
    }

    if (token === '--json') {
      global.json = true;
      continue;
    }

    if (token === '--help' || token === '-h') {
      return { command: 'help', global, args: [] };
    }

    rest.push(token);
  }

  const [command, ...commandArgs] = rest;
  if (command === undefined) {
    return { command: 'server', global, args: [] };
  }

  if (isCommandName(command)) {
    return { command, global, args: commandArgs };
  }

  throw new CliError(`不明なコマンドです: ${command}`);
};

const applyGlobalOptions = (global: GlobalOptions): void => {
  if (global.homePath !== undefined) {
    process.env[DOODLE_JOURNAL_HOME_ENV] = global.homePath;
  }
};

const logJson = (value: unknown): void => {
  console.log(JSON.stringify(value, null, 2));
};

const requireValue = (args: string[], index: number, option: string): string => {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new CliError(`${option} の引数が不足しています。`);
  }
  return value;
};

const parseDay = (value: string): Date => {
  const day = parseLocalDay(value);
  if (!day) {
    throw new CliError('--day は YYYY-MM-DD 形式で指定してください。');
  }
  return day;
};

const handleServerCommand = async ({ args }: CommandContext): Promise<void> => {
  let transport: TransportType = 'stdio';

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (token === '--transport') {
      const value = args[index + 1];
      if (value !== 'stdio' && value !== 'httpStream') {
        throw new CliError('transport は "stdio" または "httpStream" を指定してください。');
      }
      transport = value;
      index += 1;
      continue;
    }

    throw new CliError(`server コマンドで不明なオプションです: ${token}`);
  }

  await runDoodleJournalServer({ transportType: transport });
};

const handleCreateCommand = async ({
  args,
  global,
  workspace,
}: CommandContext): Promise<void> => {
  let caption: string | undefined;

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (token === '--caption') {
      caption = requireValue(args, index, '--caption');
      index += 1;
      continue;
    }

    throw new CliError(`create コマンドで不明なオプションです: ${token}`);
  }

  const entry = await workspace.mutate((journal) => {
    const created = journal.entries.createEntry();
    if (caption === undefined) {
      return created;
    }
    return journal.entries.updateCaption(caption, created.id) ?? created;
  });

  if (global.json) {
    logJson(toEntryView(entry));
  } else {
    console.log(`作成したエントリ: ${entry.id}`);
  }
};

const formatTable = (rows: string[][]): string => {
  const header = rows[0];
  if (header === undefined || rows.length === 1) {
    return '（エントリがありません）';
  }

  const widths = header.map((_, column) =>
    Math.max(...rows.map((row) => row[column]?.length ?? 0)),
  );

  return rows
    .map((row) => row.map((cell, index) => cell.padEnd(widths[index] ?? 0)).join(' | ').trimEnd())
    .join('\n');
};

const handleListCommand = async ({
  args,
  global,
  workspace,
}: CommandContext): Promise<void> => {
  let day: Date | undefined;

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (token === '--day') {
      day = parseDay(requireValue(args, index, '--day'));
      index += 1;
      continue;
    }

    throw new CliError(`list コマンドで不明なオプションです: ${token}`);
  }

  const views = await workspace.read((journal) => {
    const entries =
      day === undefined ? journal.entries.entries : entriesOnDay(journal.entries.entries, day);
    return entries.map(toEntryView);
  });

  if (global.json) {
    logJson(views);
    return;
  }

  const rows = [
    ['id', 'caption', 'updatedAt'],
    ...views.map(({ id, caption, updatedAt }) => [id, caption, updatedAt]),
  ];
  console.log(formatTable(rows));
};

const requireEntryId = (args: string[], command: string): string => {
  const entryId = args[0];
  if (!entryId) {
    throw new CliError(`${command} には entryId を指定してください。`);
  }
  return entryId;
};

const formatEntry = (view: EntryView): string => {
  return [
    `Entry: ${view.id}`,
    `Caption: ${view.caption.length > 0 ? view.caption : '(none)'}`,
    `Created: ${view.createdAt}`,
    `Updated: ${view.updatedAt}`,
    `Background: ${view.hasBackground ? 'yes' : 'no'}`,
    `Thumbnail: ${view.hasThumbnail ? 'yes' : 'no'}`,
  ].join('\n');
};

const handleShowCommand = async ({
  args,
  global,
  workspace,
}: CommandContext): Promise<void> => {
  const entryId = requireEntryId(args, 'show');
  const entry = await workspace.read((journal) => journal.entries.entry(entryId));
  if (!entry) {
    throw new CliError(`エントリが見つかりません: ${entryId}`);
  }

  if (global.json) {
    logJson(toEntryView(entry));
  } else {
    console.log(formatEntry(toEntryView(entry)));
  }
};

const handleCaptionCommand = async ({
  args,
  global,
  workspace,
}: CommandContext): Promise<void> => {
  const [entryId, caption, ...rest] = args;
  if (!entryId || caption === undefined) {
    throw new CliError('caption には entryId とキャプションを指定してください。');
  }
  if (rest.length > 0) {
    throw new CliError(`caption コマンドで不明な引数です: ${rest.join(' ')}`);
  }

  const entry = await workspace.mutate((journal) =>
    journal.entries.updateCaption(caption, entryId),
  );
  if (!entry) {
    throw new CliError(`エントリが見つかりません: ${entryId}`);
  }

  if (global.json) {
    logJson(toEntryView(entry));
  } else {
    console.log(`更新しました: ${entry.id}`);
  }
};

const handleDeleteCommand = async ({
  args,
  global,
  workspace,
}: CommandContext): Promise<void> => {
  const entryIds = args.filter((token) => !token.startsWith('--'));
  const unknownOption = args.find((token) => token.startsWith('--'));
  if (unknownOption !== undefined) {
    throw new CliError(`delete コマンドで不明なオプションです: ${unknownOption}`);
  }
  if (entryIds.length === 0) {
    throw new CliError('削除対象の entryId を 1 件以上指定してください。');
  }

  const deleted = await workspace.mutate((journal) =>
    entryIds.filter((entryId) => journal.deleteEntry(entryId)),
  );

  if (global.json) {
    logJson({ deletedEntryIds: deleted });
  } else {
    console.log(`削除したエントリ: ${deleted.length > 0 ? deleted.join(', ') : '(なし)'}`);
  }
};

const handleExportCommand = async ({
  args,
  global,
  workspace,
}: CommandContext): Promise<void> => {
  const entryId = requireEntryId(args, 'export');
  let outPath: string | undefined;

  for (let index = 1; index < args.length; index += 1) {
    const token = args[index];
    if (token === '--out') {
      outPath = requireValue(args, index, '--out');
      index += 1;
      continue;
    }

    throw new CliError(`export コマンドで不明なオプションです: ${token}`);
  }

  const entry = await workspace.read((journal) => journal.entries.entry(entryId));
  if (!entry) {
    throw new CliError(`エントリが見つかりません: ${entryId}`);
  }
  if (!entry.thumbnailData) {
    throw new CliError(`サムネイルがまだ生成されていません: ${entryId}`);
  }

  const written = await exportImage(`${entry.id}.png`, entry.thumbnailData, outPath);

  if (global.json) {
    logJson({ entryId: entry.id, path: written });
  } else {
    console.log(`書き出しました: ${written}`);
  }
};

const handleStatsCommand = async ({
  global,
  workspace,
  now,
}: CommandContext): Promise<void> => {
  const stats = await workspace.read((journal) => journalStats(journal.entries.entries, now()));

  if (global.json) {
    logJson(stats);
    return;
  }

  console.log(
    [
      `Entries: ${stats.totalEntries}`,
      `Today: ${stats.hasEntryToday ? 'yes' : 'no'}`,
      `Streak: ${stats.currentStreak}`,
    ].join('\n'),
  );
};

const printHelp = (): void => {
  console.log(`Usage: doodle-journal [command] [options]\n\nCommands:\n  server [--transport <stdio|httpStream>]   MCP サーバーを起動します。\n  create [--caption <text>]               エントリを作成します。\n  list [--day <YYYY-MM-DD>]               エントリを一覧表示します。\n  show <id>                               エントリの詳細を表示します。\n  caption <id> <text>                     キャプションを更新します。\n  delete <id...>                          エントリを削除します。\n  export <id> [--out <path>]              サムネイル PNG を書き出します。\n  stats                                   記録の統計を表示します。\n\nGlobal options:\n  --home <path>   データディレクトリを上書きします。\n  --json          出力を JSON 形式に固定します。\n`);
};

const handleError = (error: unknown): void => {
  if (error instanceof CliError || error instanceof UserError) {
    console.error(error.message);
    process.exitCode = 1;
    return;
  }

  if (error instanceof Error) {
    console.error('[doodle-journal] 予期しないエラーが発生しました:', error.message);
    process.exitCode = 1;
    return;
  }

  console.error('[doodle-journal] 予期しないエラーが発生しました。');
  process.exitCode = 1;
};

const HANDLERS: Record<Exclude<CommandName, 'help'>, (context: CommandContext) => Promise<void>> = {
  server: handleServerCommand,
  create: handleCreateCommand,
  list: handleListCommand,
  show: handleShowCommand,
  caption: handleCaptionCommand,
  delete: handleDeleteCommand,
  export: handleExportCommand,
  stats: handleStatsCommand,
};

export const runCli = async (options: RunCliOptions = {}): Promise<void> => {
  const argv = options.argv ?? process.argv.slice(2);

  let parsed: ParsedArguments;
  try {
    parsed = parseArguments(argv);
  } catch (error: unknown) {
    handleError(error);
    return;
  }

  applyGlobalOptions(parsed.global);

  if (parsed.command === 'help') {
    printHelp();
    return;
  }

  const now = options.now ?? (() => new Date());
  const context: CommandContext = {
    args: parsed.args,
    global: parsed.global,
    workspace: new JournalWorkspace({ now }),
    now,
  };

  try {
    await HANDLERS[parsed.command](context);
  } catch (error: unknown) {
    handleError(error);
  }
};

const isExecutedDirectly = (): boolean => {
  const currentFile = fileURLToPath(import.meta.url);
  const invokedFile = process.argv[1] ? path.resolve(process.argv[1]) : undefined;
  return invokedFile !== undefined && currentFile === invokedFile;
};

if (isExecutedDirectly()) {
  runCli().catch((error: unknown) => {
    handleError(error);
  });
}
