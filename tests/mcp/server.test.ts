import { beforeEach, describe, expect, it, vi } from 'vitest';

const addToolsMock = vi.fn();
const startMock = vi.fn();
const stopMock = vi.fn();

vi.mock('fastmcp', () => {
  const FastMCP = vi.fn(function FastMCPMock(this: unknown, options: unknown) {
    void options;
    return {
      addTools: addToolsMock,
      start: startMock,
      stop: stopMock,
    };
  });

  class MockUserError extends Error {}

  return {
    FastMCP,
    UserError: MockUserError,
    imageContent: vi.fn(),
  };
});

const buildJournalToolsMock = vi.fn();

vi.mock('../../src/mcp/tools.js', () => ({
  buildJournalTools: buildJournalToolsMock,
}));

describe('createDoodleJournalServer', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    buildJournalToolsMock.mockReturnValue([
      { name: 'mock', description: '', execute: vi.fn(), parameters: undefined },
    ]);
  });

  it('FastMCP サーバー生成時にジャーナルのツール群が登録される', async () => {
    const { createDoodleJournalServer } = await import('../../src/mcp/server.js');

    const server = createDoodleJournalServer();

    const { FastMCP } = await import('fastmcp');

    expect(FastMCP).toHaveBeenCalledWith({
      name: 'doodle-journal-mcp',
      version: '0.1.0',
      instructions: expect.stringMatching(/doodle-journal/i),
    });

    expect(buildJournalToolsMock).toHaveBeenCalledTimes(1);
    expect(buildJournalToolsMock).toHaveBeenCalledWith({});
    expect(addToolsMock).toHaveBeenCalledWith([
      { name: 'mock', description: '', execute: expect.any(Function), parameters: undefined },
    ]);
    expect(server).toMatchObject({
      start: expect.any(Function),
      stop: expect.any(Function),
    });
  });
});
