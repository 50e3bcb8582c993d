/**
 * chunkvault command-line interface.
 *
 * Usage: chunkvault <command> [options]
 */

import { addCommand } from './commands/add.js';
import { configCommand } from './commands/config.js';
import { listCommand } from './commands/list.js';
import { rebuildCommand } from './commands/rebuild.js';
import { searchCommand } from './commands/search.js';
import { serveCommand } from './commands/serve.js';
import { treeCommand } from './commands/tree.js';
import type { Command } from './types.js';
import { errorMessage } from '../utils/errors.js';

export const VERSION = '0.1.0';

const helpCommand: Command = {
  name: 'help',
  description: 'Show help for a command',
  usage: 'chunkvault help [command]',
  handler: async (args) => {
    const name = args[0];
    const command = name ? commands.find((c) => c.name === name) : undefined;
    if (!command) {
      showHelp();
      return;
    }
    console.log(command.description);
    console.log('');
    console.log(`Usage: ${command.usage}`);
  },
};

export const commands: Command[] = [
  addCommand,
  listCommand,
  searchCommand,
  rebuildCommand,
  treeCommand,
  configCommand,
  serveCommand,
  helpCommand,
];

export function showHelp(): void {
  console.log('chunkvault - chunked artifact storage with hybrid search');
  console.log('');
  console.log('Usage: chunkvault <command> [options]');
  console.log('');
  console.log('Commands:');
  for (const cmd of commands) {
    console.log(`  ${cmd.name.padEnd(16)} ${cmd.description}`);
  }
  console.log('');
  console.log('Options:');
  console.log('  --workspace <id> Workspace to open (default: $CHUNKVAULT_WORKSPACE or "default")');
  console.log('  --config <path>  Project config file (default: ./chunkvault.config.json)');
  console.log('  --version        Show version');
  console.log('  --help           Show help');
  console.log('');
  console.log('Run "chunkvault help <command>" for command-specific help.');
}

export async function main(args: string[]): Promise<void> {
  if (args.includes('--version') || args.includes('-v')) {
    console.log(`chunkvault ${VERSION}`);
    return;
  }

  const commandName = args[0];
  if (commandName === undefined || commandName === '--help' || commandName === '-h') {
    showHelp();
    return;
  }

  const command = commands.find((c) => c.name === commandName);
  if (!command) {
    console.error(`Unknown command: ${commandName}`);
    console.log('Run "chunkvault --help" for available commands.');
    process.exit(2);
    return;
  }

  const rest = args.slice(1);
  if (rest.includes('--help') || rest.includes('-h')) {
    console.log(`Usage: ${command.usage}`);
    return;
  }

  try {
    await command.handler(rest);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(1);
  }
}
