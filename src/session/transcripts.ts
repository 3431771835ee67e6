export interface ExitTranscript {
  lines: string[];
  recordedAt: Date;
}

/**
 * Output captured from each session's most recent natural exit.
 * In-memory only; a later exit of the same session replaces the entry.
 */
export class ExitTranscriptStore {
  private transcripts: Map<string, ExitTranscript> = new Map();

  record(name: string, lines: string[]): void {
    this.transcripts.set(name, { lines: [...lines], recordedAt: new Date() });
  }

  get(name: string): ExitTranscript | undefined {
    return this.transcripts.get(name);
  }
}
