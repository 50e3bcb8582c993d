/**
 * Tests for CLI dispatch.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { VERSION, commands, main } from '../../src/cli/index.js';
import { searchCommand } from '../../src/cli/commands/search.js';
import { loggedLines } from './helpers.js';

beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
});

describe('command registry', () => {
  it('registers every command once', () => {
    const names = commands.map((c) => c.name);
    expect(names).toEqual(['add', 'list', 'search', 'rebuild', 'tree', 'config', 'serve', 'help']);
    expect(new Set(names).size).toBe(names.length);
  });

  it('gives every command a usage line', () => {
    for (const command of commands) {
      expect(command.usage.startsWith(`chunkvault ${command.name}`)).toBe(true);
    }
  });
});

describe('main', () => {
  it('prints the version', async () => {
    await main(['--version']);
    expect(loggedLines()).toEqual([`chunkvault ${VERSION}`]);
  });

  it('shows help without a command', async () => {
    await main([]);
    expect(loggedLines()).toContain('Usage: chunkvault <command> [options]');
  });

  it('exits with status 2 for an unknown command', async () => {
    await main(['bogus']);

    expect(console.error).toHaveBeenCalledWith('Unknown command: bogus');
    expect(process.exit).toHaveBeenCalledWith(2);
  });

  it('prints command usage for --help', async () => {
    await main(['search', '--help']);
    expect(loggedLines()).toEqual([`Usage: ${searchCommand.usage}`]);
  });

  it('prints command help through the help command', async () => {
    await main(['help', 'search']);
    expect(loggedLines()).toEqual(['Search indexed chunks', '', `Usage: ${searchCommand.usage}`]);
  });

  it('reports handler errors and exits with status 1', async () => {
    await main(['add', '/nonexistent/chunkvault-missing.txt']);

    expect(console.error).toHaveBeenCalledWith(
      "Error: ENOENT: no such file or directory, open '/nonexistent/chunkvault-missing.txt'",
    );
    expect(process.exit).toHaveBeenCalledWith(1);
  });
});
