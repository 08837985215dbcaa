export * from './journal/types.js';
export * from './journal/geometry.js';
export { DoodleJournal, DEFAULT_RENDER_SCALE, type DoodleJournalOptions } from './journal/journal.js';
export * from './journal/store/entryStore.js';
export * from './journal/store/drawingCache.js';
export * from './journal/store/entryQueries.js';
export {
  SNAPSHOT_VERSION,
  decodeSnapshot,
  emptySnapshot,
  encodeSnapshot,
  type JournalSnapshotFile,
} from './journal/store/journalSnapshot.js';
export * from './journal/raster/raster.js';
export * from './journal/raster/strokeSurface.js';
export * from './journal/raster/thumbnailRenderer.js';
export * from './journal/selection/selection.js';
export * from './journal/selection/lassoRecorder.js';
export * from './journal/generation/errors.js';
export * from './journal/generation/prompt.js';
export * from './journal/generation/imageGenerationService.js';
export * from './journal/generation/pipeline.js';
export { createDoodleJournalServer, serverMetadata } from './mcp/server.js';
export { runDoodleJournalServer } from './mcp/cli.js';
