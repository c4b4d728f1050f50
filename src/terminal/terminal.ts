/**
 * Terminal output and mode control.
 *
 * Output is queued and only reaches the stream on flush(). All rendering goes
 * to stderr so stdout stays free for a wrapping shell.
 */

export interface TerminalSize {
  columns: number;
  rows: number;
}

export interface Terminal {
  size(): TerminalSize;
  /** Clear the whole screen and put the cursor at the origin. */
  clear(): void;
  /** Zero-based column/row. */
  moveTo(x: number, y: number): void;
  write(text: string): void;
  flush(): Promise<void>;
  enterRawMode(): void;
  exitRawMode(): void;
  hideCursor(): void;
  showCursor(): void;
}

const CSI = '\x1b[';

export const ESCAPES = {
  clearScreen: `${CSI}2J`,
  home: `${CSI}H`,
  hideCursor: `${CSI}?25l`,
  showCursor: `${CSI}?25h`,
  moveTo: (x: number, y: number): string => `${CSI}${y + 1};${x + 1}H`,
} as const;

const FALLBACK_SIZE: TerminalSize = { columns: 80, rows: 24 };

export class TtyTerminal implements Terminal {
  private buffer: string[] = [];

  constructor(
    private readonly input: NodeJS.ReadStream = process.stdin,
    private readonly output: NodeJS.WriteStream = process.stderr,
  ) {}

  size(): TerminalSize {
    return {
      columns: this.output.columns ?? FALLBACK_SIZE.columns,
      rows: this.output.rows ?? FALLBACK_SIZE.rows,
    };
  }

  clear(): void {
    this.buffer.push(ESCAPES.clearScreen, ESCAPES.home);
  }

  moveTo(x: number, y: number): void {
    this.buffer.push(ESCAPES.moveTo(x, y));
  }

  write(text: string): void {
    this.buffer.push(text);
  }

  flush(): Promise<void> {
    if (this.buffer.length === 0) {
      return Promise.resolve();
    }
    const chunk = this.buffer.join('');
    this.buffer = [];
    return new Promise((resolve, reject) => {
      this.output.write(chunk, (err) => {
        if (err) reject(new Error(`Terminal write failed: ${err.message}`, { cause: err }));
        else resolve();
      });
    });
  }

  enterRawMode(): void {
    if (this.input.isTTY) this.input.setRawMode(true);
  }

  exitRawMode(): void {
    if (this.input.isTTY) this.input.setRawMode(false);
  }

  hideCursor(): void {
    this.buffer.push(ESCAPES.hideCursor);
  }

  showCursor(): void {
    this.buffer.push(ESCAPES.showCursor);
  }
}

/**
 * Hand the terminal back in cooked mode for the duration of `fn` (an external
 * viewer, for instance). Raw mode is restored whether or not `fn` throws.
 */
export async function suspendRawMode<T>(terminal: Terminal, fn: () => Promise<T>): Promise<T> {
  await terminal.flush();
  terminal.exitRawMode();
  try {
    return await fn();
  } finally {
    terminal.enterRawMode();
  }
}

/**
 * Take over the terminal for the duration of `fn`: raw mode on, cursor
 * hidden. Teardown (cursor shown, raw mode off) runs on every exit path.
 */
export async function withTerminal<T>(terminal: Terminal, fn: () => Promise<T>): Promise<T> {
  terminal.enterRawMode();
  terminal.hideCursor();
  try {
    await terminal.flush();
    return await fn();
  } finally {
    terminal.clear();
    terminal.showCursor();
    try {
      await terminal.flush();
    } finally {
      terminal.exitRawMode();
    }
  }
}
