/**
 * Tests for shared CLI utilities.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../src/workspace/factory.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../src/workspace/factory.js')>()),
  openWorkspace: vi.fn(),
}));

vi.mock('../../src/config/loader.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../src/config/loader.js')>()),
  loadWorkspaceConfig: vi.fn(),
}));

import {
  flagValue,
  intFlag,
  numberFlag,
  positionalArgs,
  resolveWorkspaceId,
  usageError,
  withWorkspace,
} from '../../src/cli/utils.js';
import { loadWorkspaceConfig } from '../../src/config/loader.js';
import { openWorkspace } from '../../src/workspace/factory.js';
import { createTestConfig, openTestWorkspace } from '../fakes.js';

const mockOpenWorkspace = vi.mocked(openWorkspace);
const mockLoadWorkspaceConfig = vi.mocked(loadWorkspaceConfig);

beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
});

const savedWorkspaceEnv = process.env.CHUNKVAULT_WORKSPACE;

afterEach(() => {
  if (savedWorkspaceEnv === undefined) delete process.env.CHUNKVAULT_WORKSPACE;
  else process.env.CHUNKVAULT_WORKSPACE = savedWorkspaceEnv;
});

describe('flagValue', () => {
  it('returns the argument after the flag', () => {
    expect(flagValue(['--limit', '5', 'query'], '--limit')).toBe('5');
  });

  it('returns undefined when the flag is absent or last', () => {
    expect(flagValue(['query'], '--limit')).toBeUndefined();
    expect(flagValue(['query', '--limit'], '--limit')).toBeUndefined();
  });
});

describe('positionalArgs', () => {
  it('skips flags and the values of value flags', () => {
    expect(positionalArgs(['hello', '--limit', '5', '--json', 'world', '--workspace', 'ws'])).toEqual([
      'hello',
      'world',
    ]);
  });
});

describe('usageError', () => {
  it('prints the message and usage and exits with status 2', () => {
    usageError('File required', 'chunkvault add <file>');

    expect(console.error).toHaveBeenCalledWith('Error: File required');
    expect(console.log).toHaveBeenCalledWith('Usage: chunkvault add <file>');
    expect(process.exit).toHaveBeenCalledWith(2);
  });
});

describe('intFlag', () => {
  it('parses integers', () => {
    expect(intFlag(['--limit', '7'], '--limit', 'usage')).toBe(7);
    expect(intFlag([], '--limit', 'usage')).toBeUndefined();
  });

  it('exits on malformed or out-of-range values', () => {
    intFlag(['--limit', '2.5'], '--limit', 'usage');
    expect(console.error).toHaveBeenCalledWith('Error: --limit must be an integer >= 0');

    intFlag(['--limit', '0'], '--limit', 'usage', 1);
    expect(console.error).toHaveBeenCalledWith('Error: --limit must be an integer >= 1');
    expect(process.exit).toHaveBeenCalledTimes(2);
  });
});

describe('numberFlag', () => {
  it('parses numbers', () => {
    expect(numberFlag(['--threshold', '0.7'], '--threshold', 'usage')).toBe(0.7);
  });

  it('exits on non-numeric values', () => {
    numberFlag(['--threshold', 'high'], '--threshold', 'usage');
    expect(console.error).toHaveBeenCalledWith('Error: --threshold must be a number');
    expect(process.exit).toHaveBeenCalledWith(2);
  });
});

describe('resolveWorkspaceId', () => {
  it('prefers the flag, then the environment, then the default', () => {
    process.env.CHUNKVAULT_WORKSPACE = 'from-env';
    expect(resolveWorkspaceId(['--workspace', 'from-flag'])).toBe('from-flag');
    expect(resolveWorkspaceId([])).toBe('from-env');

    delete process.env.CHUNKVAULT_WORKSPACE;
    expect(resolveWorkspaceId([])).toBe('default');
  });
});

describe('withWorkspace', () => {
  it('opens the named workspace and closes it after the callback', async () => {
    const env = await openTestWorkspace();
    const config = createTestConfig();
    const close = vi.fn();
    mockLoadWorkspaceConfig.mockReturnValue(config);
    mockOpenWorkspace.mockResolvedValue({ workspace: env.workspace, db: env.db, close });

    const name = await withWorkspace(['--workspace', 'ws', '--config', 'custom.json'], async (ws) => ws.name);

    expect(name).toBe('Test workspace');
    expect(mockLoadWorkspaceConfig).toHaveBeenCalledWith({ projectConfigPath: 'custom.json' });
    expect(mockOpenWorkspace).toHaveBeenCalledWith(config, { workspaceId: 'ws' });
    expect(close).toHaveBeenCalledOnce();
    env.db.close();
  });

  it('closes the workspace when the callback throws', async () => {
    const env = await openTestWorkspace();
    const close = vi.fn();
    mockLoadWorkspaceConfig.mockReturnValue(createTestConfig());
    mockOpenWorkspace.mockResolvedValue({ workspace: env.workspace, db: env.db, close });

    await expect(
      withWorkspace([], async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(close).toHaveBeenCalledOnce();
    env.db.close();
  });
});
