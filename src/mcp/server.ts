import { FastMCP } from 'fastmcp';
import { buildJournalTools, type BuildJournalToolsOptions } from './tools.js';

const SERVER_NAME = 'doodle-journal-mcp';
const SERVER_VERSION = '0.1.0';
const SERVER_INSTRUCTIONS =
  'doodle-journal MCP server providing doodle entries, thumbnails and AI background generation.';

/**
 * ドゥードゥルジャーナルのツールを公開する FastMCP サーバーを生成する。
 */
export const createDoodleJournalServer = (options: BuildJournalToolsOptions = {}) => {
  const server = new FastMCP({
    name: SERVER_NAME,
    version: SERVER_VERSION,
    instructions: SERVER_INSTRUCTIONS,
  });

  server.addTools(buildJournalTools(options));

  return server;
};

/**
 * 公開しているサーバーのメタデータ。
 */
export const serverMetadata = {
  name: SERVER_NAME,
  version: SERVER_VERSION,
  instructions: SERVER_INSTRUCTIONS,
};
