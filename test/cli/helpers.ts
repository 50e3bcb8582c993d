/**
 * Wires mocked config loading and workspace opening to an in-process workspace.
 */

import { vi, type Mock } from 'vitest';
import { loadWorkspaceConfig } from '../../src/config/loader.js';
import type { WorkspaceOptions } from '../../src/workspace/workspace.js';
import { openWorkspace } from '../../src/workspace/factory.js';
import { createTestConfig, openTestWorkspace, type TestWorkspace } from '../fakes.js';

export interface StubbedWorkspace extends TestWorkspace {
  close: Mock<() => void>;
}

/**
 * Callers must `vi.mock` the factory and loader modules first.
 */
export async function stubWorkspace(overrides: Partial<WorkspaceOptions> = {}): Promise<StubbedWorkspace> {
  const env = await openTestWorkspace(overrides);
  const close = vi.fn<() => void>();
  vi.mocked(loadWorkspaceConfig).mockReturnValue(createTestConfig());
  vi.mocked(openWorkspace).mockResolvedValue({ workspace: env.workspace, db: env.db, close });
  return { ...env, close };
}

/**
 * Every line passed to `console.log` so far.
 */
export function loggedLines(): string[] {
  return vi.mocked(console.log).mock.calls.map((args) => args.map(String).join(' '));
}
