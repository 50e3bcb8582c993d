import type { Command } from '../types.js';
import { loadConfig, validateExternalConfig } from '../../config/loader.js';
import { flagValue, positionalArgs, usageError } from '../utils.js';

const USAGE = 'chunkvault config <show|validate> [--config <path>]';

/** Replace secrets before printing. */
function redact(key: string, value: unknown): unknown {
  return key === 'apiKey' && typeof value === 'string' && value ? '***' : value;
}

export const configCommand: Command = {
  name: 'config',
  description: 'Show or validate configuration',
  usage: USAGE,
  handler: async (args) => {
    const [subcommand] = positionalArgs(args);
    const config = loadConfig({ projectConfigPath: flagValue(args, '--config') });

    switch (subcommand) {
      case 'show': {
        console.log(JSON.stringify(config, redact, 2));
        break;
      }
      case 'validate': {
        const errors = validateExternalConfig(config);
        if (errors.length === 0) {
          console.log('Configuration is valid.');
        } else {
          console.error('Configuration errors:');
          for (const error of errors) {
            console.error(`  - ${error}`);
          }
          process.exit(3);
        }
        break;
      }
      default:
        usageError('Unknown subcommand', USAGE);
    }
  },
};
