/**
 * Per-workspace change notifications.
 *
 * Listeners run in registration order and are awaited one by one. A
 * listener that throws is logged; the operation that emitted the event and
 * the remaining listeners are unaffected.
 */

import type { Artifact } from '../artifacts/artifact.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { IndexingSummary } from './indexer.js';

const log = createLogger('workspace-events');

export type WorkspaceEventType = 'create' | 'update' | 'delete';

export interface WorkspaceEvent {
  type: WorkspaceEventType;
  workspaceId: string;
  artifact: Artifact;
  /** Present when the change re-indexed the artifact. */
  indexing?: IndexingSummary;
}

export type WorkspaceListener = (event: WorkspaceEvent) => void | Promise<void>;

export class WorkspaceEvents {
  private readonly listeners = new Map<WorkspaceEventType, WorkspaceListener[]>();

  /**
   * Register a listener. Returns a function that removes it.
   */
  on(type: WorkspaceEventType, listener: WorkspaceListener): () => void {
    const list = this.listeners.get(type) ?? [];
    list.push(listener);
    this.listeners.set(type, list);
    return () => this.off(type, listener);
  }

  off(type: WorkspaceEventType, listener: WorkspaceListener): void {
    const list = this.listeners.get(type);
    if (!list) return;
    const index = list.indexOf(listener);
    if (index >= 0) list.splice(index, 1);
  }

  listenerCount(type: WorkspaceEventType): number {
    return this.listeners.get(type)?.length ?? 0;
  }

  async emit(event: WorkspaceEvent): Promise<void> {
    for (const listener of [...(this.listeners.get(event.type) ?? [])]) {
      try {
        await listener(event);
      } catch (error) {
        log.warn('Listener failed', {
          type: event.type,
          artifactId: event.artifact.artifactId,
          error: errorMessage(error),
        });
      }
    }
  }
}
