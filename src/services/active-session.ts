/**
 * Handle of a detached timer, kept in data/active-session.json between CLI
 * invocations. The file exists exactly while a detached session is open.
 *
 * The file can outlive its session (a restore, a crash between finalizing
 * and clearing), so callers check it against the session table with
 * resolve(), which removes a handle whose row is missing or finished.
 */

import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { PersistenceError } from '../errors.js';
import { timerHandleSchema, type TimerHandle } from '../lib/timer.js';
import type { SessionState } from './sessions.js';

export interface SessionLookup {
  sessionState(id: number): SessionState;
}

export type ActiveSession =
  | { kind: 'none' }
  | { kind: 'open'; handle: TimerHandle }
  | { kind: 'stale'; handle: TimerHandle; state: Exclude<SessionState, 'open'> };

export function staleHandleMessage(active: { handle: TimerHandle; state: Exclude<SessionState, 'open'> }): string {
  const why = active.state === 'finished' ? 'is already finished' : 'no longer exists';
  return `Discarded the background timer: session ${active.handle.sessionId} ${why}`;
}

export class ActiveSessionFile {
  readonly file: string;

  constructor(file: string) {
    this.file = file;
  }

  exists(): boolean {
    return existsSync(this.file);
  }

  load(): TimerHandle | null {
    if (!this.exists()) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.file, 'utf-8'));
    } catch (error) {
      throw new PersistenceError(`Active session file is unreadable: ${this.file}`, error);
    }
    const result = timerHandleSchema.safeParse(raw);
    if (!result.success) {
      throw new PersistenceError(`Active session file is corrupt: ${this.file}`, result.error);
    }
    return result.data;
  }

  /** The handle if its session is still open; a stale handle is cleared */
  resolve(sessions: SessionLookup): ActiveSession {
    const handle = this.load();
    if (!handle) return { kind: 'none' };

    const state = sessions.sessionState(handle.sessionId);
    if (state === 'open') return { kind: 'open', handle };

    this.clear();
    return { kind: 'stale', handle, state };
  }

  save(handle: TimerHandle): void {
    mkdirSync(dirname(this.file), { recursive: true });
    writeFileSync(this.file, JSON.stringify(handle, null, 2) + '\n');
  }

  clear(): void {
    rmSync(this.file, { force: true });
  }
}
