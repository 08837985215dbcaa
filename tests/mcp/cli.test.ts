import { beforeEach, describe, expect, it, vi } from 'vitest';

const createDoodleJournalServerMock = vi.fn();
const startMock = vi.fn();

vi.mock('../../src/mcp/server.js', () => ({
  createDoodleJournalServer: createDoodleJournalServerMock,
  serverMetadata: {
    name: 'doodle-journal-mcp',
    version: '0.1.0',
    instructions: 'test instructions',
  },
}));

describe('runDoodleJournalServer', () => {
  beforeEach(() => {
    startMock.mockReset();
    createDoodleJournalServerMock.mockReset();
    createDoodleJournalServerMock.mockReturnValue({
      start: startMock,
    });
    vi.spyOn(console, 'info').mockImplementation(() => {});
  });

  it('FastMCP サーバーを stdio トランスポートで起動する', async () => {
    const { runDoodleJournalServer } = await import('../../src/mcp/cli.js');

    await runDoodleJournalServer();

    expect(createDoodleJournalServerMock).toHaveBeenCalledTimes(1);
    expect(startMock).toHaveBeenCalledWith({ transportType: 'stdio' });
    expect(console.info).toHaveBeenCalledWith(
      '[doodle-journal-mcp] starting (version=0.1.0, transport=stdio)',
    );
  });
});
