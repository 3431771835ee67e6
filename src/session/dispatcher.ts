import type { SessionRecord } from '../types/session.js';
import type { Logger } from '../utils/logger.js';

/**
 * Delivers a session's captured output to its onExit callback after the
 * process exits on its own. Callback errors are logged, not rethrown.
 */
export class ExitCallbackDispatcher {
  constructor(private logger: Logger) {}

  dispatch(session: SessionRecord, lines: string[]): void {
    if (!session.onExit) {
      return;
    }

    try {
      session.onExit(lines);
      this.logger.debug({ session: session.name, lines: lines.length }, 'Exit callback delivered');
    } catch (error) {
      this.logger.error({ error, session: session.name }, 'Exit callback failed');
    }
  }
}
