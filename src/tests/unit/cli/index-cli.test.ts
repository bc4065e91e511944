import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { VERSION } from '../../../version.js';

const state = vi.hoisted(() => ({
  parseArgs: vi.fn(),
  serverInitialize: vi.fn(async () => undefined),
  serverStart: vi.fn(async () => undefined),
  receivedServerConfigs: new Array<unknown>(),
}));

vi.mock('../../../config/ServerConfig.js', () => ({
  parseArgs: state.parseArgs
}));

vi.mock('../../../server.js', () => ({
  TimeMcpServer: class MockTimeMcpServer {
    constructor(config: unknown) {
      state.receivedServerConfigs.push(config);
    }
    initialize = state.serverInitialize;
    start = state.serverStart;
  }
}));

const originalArgv = process.argv.slice();

async function importIndexModule(args: string[] = ['version']) {
  vi.resetModules();
  process.argv = ['node', 'index.js', ...args];
  return import('../../../index.js');
}

function mockProcessExit() {
  return vi.spyOn(process, 'exit').mockImplementation((code) => {
    throw new Error(`EXIT:${code ?? 0}`);
  });
}

describe('CLI Entry (index.ts)', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    state.receivedServerConfigs.length = 0;
    state.parseArgs.mockReturnValue({ transport: { type: 'stdio' }, debug: false });
    state.serverInitialize.mockResolvedValue(undefined);
    state.serverStart.mockResolvedValue(undefined);
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    process.argv = originalArgv.slice();
    vi.restoreAllMocks();
  });

  it('prints the version', async () => {
    await importIndexModule(['--version']);

    expect(process.stdout.write).toHaveBeenCalledWith(`MCP Time Server v${VERSION}\n`);
    expect(state.parseArgs).not.toHaveBeenCalled();
  });

  it('prints usage for help', async () => {
    await importIndexModule(['help']);

    expect(process.stdout.write).toHaveBeenCalledWith(expect.stringContaining('Usage:\n  mcp-time-server [command] [options]'));
  });

  it('exits with code 1 on an unknown command', async () => {
    const exitSpy = mockProcessExit();

    await expect(importIndexModule(['rewind'])).rejects.toThrow('EXIT:1');
    expect(process.stderr.write).toHaveBeenCalledWith('Unknown command: rewind\n');
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('skips option values when looking for the command', async () => {
    await importIndexModule(['--port', '3000', '--log-level', 'debug']);

    await vi.waitFor(() => expect(state.serverStart).toHaveBeenCalledTimes(1));
    expect(state.parseArgs).toHaveBeenCalledWith(['--port', '3000', '--log-level', 'debug']);
  });

  it('runs main successfully with parsed config', async () => {
    const mod = await importIndexModule();

    await mod.main();

    expect(state.parseArgs).toHaveBeenCalledTimes(1);
    expect(state.serverInitialize).toHaveBeenCalledTimes(1);
    expect(state.serverStart).toHaveBeenCalledTimes(1);
    expect(state.receivedServerConfigs).toEqual([{ transport: { type: 'stdio' }, debug: false }]);
  });

  it('exits with code 1 when main throws', async () => {
    state.parseArgs.mockImplementation(() => {
      throw new Error('bad args');
    });
    const mod = await importIndexModule();
    mockProcessExit();

    await expect(mod.main()).rejects.toThrow('EXIT:1');
    expect(process.stderr.write).toHaveBeenCalledWith('Failed to start server: bad args\n');
  });
});
