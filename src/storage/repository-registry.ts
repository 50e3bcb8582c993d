/**
 * Repository backends by provider id.
 */

import type { StorageConfig } from '../config/workspace-config.js';
import { resolvePath } from '../config/workspace-config.js';
import { ConfigError } from '../utils/errors.js';
import { ProviderRegistry } from '../utils/provider-registry.js';
import { LocalRepository } from './local-repository.js';
import { ObjectStorageRepository } from './object-repository.js';
import { MemoryObjectStore, S3ObjectStore } from './object-store.js';
import { assertSafeSegment } from './paths.js';
import type { Repository } from './repository.js';

export const repositoryRegistry = new ProviderRegistry<StorageConfig, Repository>('repository')
  .register('local', (config) => {
    if (!config.path) {
      throw new ConfigError('storage.path is required for the local repository', 'MISSING_REQUIRED');
    }
    return new LocalRepository(resolvePath(config.path));
  })
  .register('s3', (config) => new ObjectStorageRepository(new S3ObjectStore(config.s3), 's3'))
  .register('memory', () => new ObjectStorageRepository(new MemoryObjectStore(), 'memory'));

/**
 * Build the repository for `config.provider`. Local repositories are rooted
 * at `{path}/{workspaceId}` so workspaces never share files.
 */
export function createRepository(config: StorageConfig, workspaceId?: string): Repository {
  if (workspaceId !== undefined) assertSafeSegment(workspaceId, 'workspace id');
  const scoped: StorageConfig = workspaceId
    ? {
        ...config,
        path: `${config.path}/${workspaceId}`,
        s3: { ...config.s3, prefix: config.s3.prefix ? `${config.s3.prefix}/${workspaceId}` : workspaceId },
      }
    : config;
  return repositoryRegistry.create(config.provider, scoped);
}
