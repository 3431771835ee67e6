// CSI, OSC (ended by BEL, ST or the next line break), charset designation and two-byte escapes
const ANSI_PATTERN = /\x1b\[[0-?]*[ -/]*[@-~]|\x1b\][^\x07\x1b\n]*(?:\x07|\x1b\\|(?=\n))|\x1b[()*+][0-9A-Za-z]|\x1b[0-?@-Z\\^-~]/g;
const CONTROL_PATTERN = /[\x00-\x07\x0B\x0C\x0E-\x1F\x7F]/g;
const ERASE_IN_LINE = /^\x1b\[([0-2]?)K$/;

/** Longest unterminated escape held back waiting for the rest of it */
const MAX_PENDING_ESCAPE = 256;

/**
 * Accumulates raw pseudo-terminal output as display lines.
 *
 * The line being written keeps a cursor column: a bare carriage return moves
 * it back to column 0 and later text overwrites in place, backspace moves it
 * left, and erase-in-line (`ESC [ K`) truncates or blanks the line. Other
 * escape sequences are dropped. A sequence split across two chunks is held
 * back until the rest arrives, up to MAX_PENDING_ESCAPE characters.
 */
export class TerminalLineBuffer {
  private lines: string[] = [];
  private current = '';
  private column = 0;
  private pendingEscape = '';

  constructor(private readonly scrollback: number = 5000) {}

  write(data: string): void {
    let chunk = this.pendingEscape + data;
    this.pendingEscape = '';

    const lastEsc = chunk.lastIndexOf('\x1b');
    if (lastEsc !== -1) {
      const tail = chunk.slice(lastEsc);
      if (!isCompleteEscape(tail) && tail.length < MAX_PENDING_ESCAPE) {
        this.pendingEscape = tail;
        chunk = chunk.slice(0, lastEsc);
      }
    }

    const text = chunk.replace(/\r\n/g, '\n');
    ANSI_PATTERN.lastIndex = 0;
    let printed = 0;
    let match: RegExpExecArray | null;
    while ((match = ANSI_PATTERN.exec(text)) !== null) {
      this.print(text.slice(printed, match.index));
      this.applyEscape(match[0]);
      printed = match.index + match[0].length;
    }
    this.print(text.slice(printed));
  }

  /**
   * All complete lines plus the line being written, if it has content
   */
  getLines(): string[] {
    return this.current.length > 0 ? [...this.lines, this.current] : [...this.lines];
  }

  private print(segment: string): void {
    for (const char of segment.replace(CONTROL_PATTERN, '')) {
      if (char === '\n') {
        this.pushLine(this.current);
        this.current = '';
        this.column = 0;
      } else if (char === '\r') {
        this.column = 0;
      } else if (char === '\b') {
        this.column = Math.max(0, this.column - 1);
      } else {
        const line = this.current.padEnd(this.column, ' ');
        this.current = line.slice(0, this.column) + char + line.slice(this.column + 1);
        this.column++;
      }
    }
  }

  private applyEscape(sequence: string): void {
    const erase = ERASE_IN_LINE.exec(sequence);
    if (!erase) {
      return;
    }

    switch (erase[1]) {
      case '1':
        this.current = ' '.repeat(Math.min(this.column + 1, this.current.length)) + this.current.slice(this.column + 1);
        break;
      case '2':
        this.current = '';
        break;
      default:
        this.current = this.current.slice(0, this.column);
    }
  }

  private pushLine(line: string): void {
    this.lines.push(line.trimEnd());
    if (this.lines.length > this.scrollback) {
      this.lines.splice(0, this.lines.length - this.scrollback);
    }
  }
}

function isCompleteEscape(sequence: string): boolean {
  if (sequence.length < 2) return false;
  const kind = sequence[1];
  if (kind === '[') return /^\x1b\[[0-?]*[ -/]*[@-~]/.test(sequence);
  if (kind === ']') return /[\x07\n]|\x1b\\/.test(sequence.slice(2));
  if ('()*+'.includes(kind)) return sequence.length >= 3;
  return true;
}
