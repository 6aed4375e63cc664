/**
 * Active shell sessions grouped by (target, owner). One user may hold
 * several terminals on the same target. Used for listing and shutdown only;
 * the relay never depends on an entry being present.
 */

import { createLogger } from '../logger.js';

const log = createLogger('registry');

export interface SessionHandle {
  targetId: string;
  ownerId: string;
  targetName: string;
  host: string;
  startedAt: number;
  close(reason: string): void;
}

export interface SessionSummary {
  targetId: string;
  ownerId: string;
  targetName: string;
  host: string;
  startedAt: number;
}

export class SessionRegistry {
  private sessions: Map<string, Set<SessionHandle>> = new Map();

  static key(targetId: string, ownerId: string): string {
    return `${targetId}:${ownerId}`;
  }

  register(handle: SessionHandle): void {
    const key = SessionRegistry.key(handle.targetId, handle.ownerId);
    let handles = this.sessions.get(key);
    if (!handles) {
      handles = new Set();
      this.sessions.set(key, handles);
    }
    handles.add(handle);
    if (handles.size > 1) {
      log.debug(`${handles.size} sessions open for ${key}`);
    }
  }

  unregister(handle: SessionHandle): boolean {
    const key = SessionRegistry.key(handle.targetId, handle.ownerId);
    const handles = this.sessions.get(key);
    if (!handles?.delete(handle)) return false;
    if (handles.size === 0) this.sessions.delete(key);
    return true;
  }

  /** Sessions for one (target, owner) pair, oldest first. */
  find(targetId: string, ownerId: string): SessionHandle[] {
    return Array.from(this.sessions.get(SessionRegistry.key(targetId, ownerId)) ?? []);
  }

  list(ownerId?: string): SessionSummary[] {
    return this.all()
      .filter(s => ownerId === undefined || s.ownerId === ownerId)
      .map(s => ({
        targetId: s.targetId,
        ownerId: s.ownerId,
        targetName: s.targetName,
        host: s.host,
        startedAt: s.startedAt,
      }));
  }

  get size(): number {
    let total = 0;
    for (const handles of this.sessions.values()) total += handles.size;
    return total;
  }

  closeAll(reason: string): void {
    for (const handle of this.all()) {
      handle.close(reason);
    }
  }

  private all(): SessionHandle[] {
    const handles: SessionHandle[] = [];
    for (const group of this.sessions.values()) handles.push(...group);
    return handles;
  }
}
