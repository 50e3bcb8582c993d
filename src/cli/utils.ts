/**
 * Shared CLI utilities.
 */

import { loadWorkspaceConfig } from '../config/loader.js';
import type { Workspace } from '../workspace/workspace.js';
import { DEFAULT_WORKSPACE_ID, openWorkspace } from '../workspace/factory.js';

/** Flags that take a value, across all commands. */
const VALUE_FLAGS = new Set([
  '--workspace',
  '--config',
  '--type',
  '--id',
  '--limit',
  '--threshold',
  '--pre',
  '--next',
  '--port',
]);

/**
 * Value following `flag`, or undefined when the flag is absent or last.
 */
export function flagValue(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  if (index < 0) return undefined;
  return args[index + 1];
}

/**
 * Arguments that are neither flags nor flag values.
 */
export function positionalArgs(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg.startsWith('--')) {
      if (VALUE_FLAGS.has(arg)) i++;
      continue;
    }
    out.push(arg);
  }
  return out;
}

/**
 * Print a usage error and exit with status 2.
 */
export function usageError(message: string, usage: string): never {
  console.error(`Error: ${message}`);
  console.log(`Usage: ${usage}`);
  process.exit(2);
}

/**
 * Parse an integer flag. Exits with a usage error on a malformed value.
 */
export function intFlag(args: string[], flag: string, usage: string, min = 0): number | undefined {
  const raw = flagValue(args, flag);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    return usageError(`${flag} must be an integer >= ${min}`, usage);
  }
  return value;
}

/**
 * Parse a numeric flag. Exits with a usage error on a malformed value.
 */
export function numberFlag(args: string[], flag: string, usage: string): number | undefined {
  const raw = flagValue(args, flag);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    return usageError(`${flag} must be a number`, usage);
  }
  return value;
}

/**
 * Workspace id from `--workspace`, then `CHUNKVAULT_WORKSPACE`, then the default.
 */
export function resolveWorkspaceId(args: string[]): string {
  return flagValue(args, '--workspace') ?? process.env.CHUNKVAULT_WORKSPACE ?? DEFAULT_WORKSPACE_ID;
}

/**
 * Open the workspace named by `args`, run `fn`, and close it.
 */
export async function withWorkspace<T>(args: string[], fn: (workspace: Workspace) => Promise<T>): Promise<T> {
  const config = loadWorkspaceConfig({ projectConfigPath: flagValue(args, '--config') });
  const opened = await openWorkspace(config, { workspaceId: resolveWorkspaceId(args) });
  try {
    return await fn(opened.workspace);
  } finally {
    opened.close();
  }
}
