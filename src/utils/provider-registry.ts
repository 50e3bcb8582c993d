/**
 * Registry mapping provider identifiers to factory functions.
 *
 * Backends (repositories, vector stores, embedders, rerankers, chunkers) are
 * resolved once at startup from the configured provider id. Registering the
 * closed set up front keeps the available ids explicit and testable.
 */

import { ConfigError } from './errors.js';

export type ProviderFactory<TOptions, T> = (options: TOptions) => T;

export class ProviderRegistry<TOptions, T> {
  private readonly factories = new Map<string, ProviderFactory<TOptions, T>>();

  /**
   * @param kind - Human-readable kind used in error messages (e.g. 'vector store')
   */
  constructor(private readonly kind: string) {}

  register(id: string, factory: ProviderFactory<TOptions, T>): this {
    this.factories.set(id, factory);
    return this;
  }

  has(id: string): boolean {
    return this.factories.has(id);
  }

  ids(): string[] {
    return [...this.factories.keys()].sort();
  }

  /**
   * Construct the provider registered under `id`.
   *
   * @throws ConfigError when no provider is registered under `id`
   */
  create(id: string, options: TOptions): T {
    const factory = this.factories.get(id);
    if (!factory) {
      throw new ConfigError(
        `Unknown ${this.kind} provider: ${id}. Available: ${this.ids().join(', ')}`,
        'UNKNOWN_PROVIDER',
      );
    }
    return factory(options);
  }
}
