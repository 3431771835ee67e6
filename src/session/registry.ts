import type { SessionConfig, SessionRecord } from '../types/session.js';
import { DuplicateSessionNameError, UnknownSessionError } from '../utils/errors.js';

/**
 * In-memory table of configured sessions, keyed by name.
 * Records are created by register() and never removed.
 */
export class SessionRegistry {
  private sessions: Map<string, SessionRecord> = new Map();

  /**
   * Add one record per configuration entry. Names are checked against each
   * other and against already registered sessions before anything is stored.
   */
  register(configs: readonly SessionConfig[]): void {
    const seen = new Set<string>();
    for (const config of configs) {
      if (seen.has(config.name) || this.sessions.has(config.name)) {
        throw new DuplicateSessionNameError(config.name);
      }
      seen.add(config.name);
    }

    for (const config of configs) {
      this.sessions.set(config.name, {
        name: config.name,
        launchSpec: config.launchSpec,
        viewTag: config.viewTag,
        viewHandle: null,
        windowHandle: null,
        savedLayout: null,
        exited: false,
        onExit: config.onExit,
        onBeforeLaunch: config.onBeforeLaunch,
      });
    }
  }

  get(name: string): SessionRecord {
    const session = this.sessions.get(name);
    if (!session) {
      throw new UnknownSessionError(name);
    }
    return session;
  }

  forEach(visitor: (session: SessionRecord) => void): void {
    for (const session of this.sessions.values()) {
      visitor(session);
    }
  }

  names(): string[] {
    return Array.from(this.sessions.keys());
  }
}
