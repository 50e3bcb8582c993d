/**
 * Tests for the config CLI command handler.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../../src/config/loader.js', () => ({
  loadConfig: vi.fn(),
  validateExternalConfig: vi.fn(),
}));

import { configCommand } from '../../../src/cli/commands/config.js';
import { loadConfig, validateExternalConfig } from '../../../src/config/loader.js';
import { loggedLines } from '../helpers.js';

const mockLoadConfig = vi.mocked(loadConfig);
const mockValidateExternalConfig = vi.mocked(validateExternalConfig);

beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
});

describe('configCommand', () => {
  it('has correct name and usage', () => {
    expect(configCommand.name).toBe('config');
    expect(configCommand.usage).toBe('chunkvault config <show|validate> [--config <path>]');
  });

  describe('show subcommand', () => {
    it('prints the loaded config with API keys redacted', async () => {
      mockLoadConfig.mockReturnValue({
        embedding: { provider: 'openai', apiKey: 'test-secret' },
        reranker: { provider: 'bm25', apiKey: '' },
      });

      await configCommand.handler(['show', '--config', 'custom.json']);

      expect(mockLoadConfig).toHaveBeenCalledWith({ projectConfigPath: 'custom.json' });
      const [output] = loggedLines();
      const parsed: unknown = JSON.parse(output ?? '');
      expect(parsed).toEqual({
        embedding: { provider: 'openai', apiKey: '***' },
        reranker: { provider: 'bm25', apiKey: '' },
      });
    });
  });

  describe('validate subcommand', () => {
    it('prints success when config is valid', async () => {
      const config = { hybridSearch: { threshold: 0.8 } };
      mockLoadConfig.mockReturnValue(config);
      mockValidateExternalConfig.mockReturnValue([]);

      await configCommand.handler(['validate']);

      expect(mockValidateExternalConfig).toHaveBeenCalledWith(config);
      expect(console.log).toHaveBeenCalledWith('Configuration is valid.');
      expect(process.exit).not.toHaveBeenCalled();
    });

    it('prints errors and exits with code 3 when config is invalid', async () => {
      mockLoadConfig.mockReturnValue({});
      mockValidateExternalConfig.mockReturnValue([
        'hybridSearch.topK must be at least 1',
        'reranker.b must be between 0 and 1 (inclusive)',
      ]);

      await configCommand.handler(['validate']);

      expect(console.error).toHaveBeenCalledWith('Configuration errors:');
      expect(console.error).toHaveBeenCalledWith('  - hybridSearch.topK must be at least 1');
      expect(console.error).toHaveBeenCalledWith('  - reranker.b must be between 0 and 1 (inclusive)');
      expect(process.exit).toHaveBeenCalledWith(3);
    });
  });

  it('rejects unknown subcommands', async () => {
    mockLoadConfig.mockReturnValue({});

    await configCommand.handler(['reset']);

    expect(console.error).toHaveBeenCalledWith('Error: Unknown subcommand');
    expect(process.exit).toHaveBeenCalledWith(2);
  });
});
