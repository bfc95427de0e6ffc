/**
 * Cache-backed inbox for front ends
 *
 * Reads come straight from the cache. A dismissal hides its items at once and
 * asks the worker to mark them done; the matching response either confirms it
 * or brings the items back. Order is always recomputed from the cache, so a
 * restored item lands where it was.
 */

import type { DatabaseManager } from './database/index.js';
import type {
  Notification,
  NotificationFilter,
  RequestInput,
  WorkerResponse,
} from './types/index.js';

/**
 * The part of the worker bus the inbox needs; tests substitute a canned feed
 */
export interface InboxBus {
  submit(input: RequestInput): string;
  drain(): WorkerResponse[];
}

export type DismissOutcome = 'confirmed' | 'rolled-back' | 'partial' | 'ignored';

export class InboxView {
  // requestId -> ids hidden by that request
  private readonly pending = new Map<string, Set<string>>();

  constructor(
    private readonly db: DatabaseManager,
    private readonly bus: InboxBus
  ) {}

  get pendingCount(): number {
    return this.pending.size;
  }

  private hiddenIds(): Set<string> {
    const hidden = new Set<string>();
    for (const ids of this.pending.values()) {
      for (const id of ids) hidden.add(id);
    }
    return hidden;
  }

  isHidden(notificationId: string): boolean {
    return this.hiddenIds().has(notificationId);
  }

  /**
   * Notifications in priority order, minus pending dismissals
   */
  list(filter: NotificationFilter = {}): Notification[] {
    const hidden = this.hiddenIds();
    const rows = this.db.listNotifications({ ...filter, limit: undefined });
    const visible = hidden.size === 0 ? rows : rows.filter((row) => !hidden.has(row.notification_id));
    return filter.limit !== undefined ? visible.slice(0, filter.limit) : visible;
  }

  /**
   * Optimistically hide the items and submit mark-done; returns the request id
   */
  dismiss(notificationIds: string | string[]): string {
    const ids = Array.isArray(notificationIds) ? notificationIds : [notificationIds];
    const requestId = this.bus.submit({ type: 'mark-done', notificationIds: ids });
    this.pending.set(requestId, new Set(ids));
    return requestId;
  }

  /**
   * Settle a pending dismissal from its response. Failed ids become visible again.
   */
  applyResponse(response: WorkerResponse): DismissOutcome {
    const ids = this.pending.get(response.requestId);
    if (!ids) return 'ignored';

    if (response.type === 'mark-done-result') {
      this.pending.delete(response.requestId);
      if (response.errors.length === 0) return 'confirmed';
      return response.notificationIds.length === 0 ? 'rolled-back' : 'partial';
    }

    if (response.type === 'error-result') {
      this.pending.delete(response.requestId);
      return 'rolled-back';
    }

    return 'ignored';
  }

  /**
   * Drain the bus and apply every response
   */
  sync(): WorkerResponse[] {
    const responses = this.bus.drain();
    for (const response of responses) {
      this.applyResponse(response);
    }
    return responses;
  }
}
