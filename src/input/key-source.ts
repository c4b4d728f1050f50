/**
 * Keyboard and resize events from the controlling TTY.
 *
 * stdin only flows while someone is waiting on next(); between reads it is
 * paused so a child process that inherits the terminal gets its input.
 */

import { emitKeypressEvents, type Key } from 'readline';
import type { InputEvent, KeyEvent, KeySource } from './types.js';

/** Where terminal size changes are announced (a TTY write stream). */
export interface ResizeSource {
  readonly columns: number;
  readonly rows: number;
  on(event: 'resize', listener: () => void): unknown;
  off(event: 'resize', listener: () => void): unknown;
}

interface PendingRead {
  resolve: (event: InputEvent) => void;
  reject: (error: Error) => void;
}

export function toKeyEvent(str: string | undefined, key: Key | undefined): KeyEvent {
  const name = key?.name ?? key?.sequence ?? str ?? '';
  return {
    name: name === 'return' ? 'enter' : name,
    ctrl: key?.ctrl ?? false,
    meta: key?.meta ?? false,
    shift: key?.shift ?? false,
  };
}

export class TtyKeySource implements KeySource {
  private queue: InputEvent[] = [];
  private pending: PendingRead | null = null;
  private ended = false;

  private readonly onKeypress = (str: string | undefined, key: Key | undefined): void => {
    this.push({ type: 'key', key: toKeyEvent(str, key) });
  };

  private readonly onResize = (): void => {
    this.push({ type: 'resize', columns: this.output.columns, rows: this.output.rows });
  };

  private readonly onEnd = (): void => {
    this.ended = true;
    if (this.pending) {
      const { reject } = this.pending;
      this.pending = null;
      reject(new Error('Input stream closed'));
    }
  };

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: ResizeSource = process.stderr,
  ) {
    emitKeypressEvents(input);
    input.on('keypress', this.onKeypress);
    input.on('end', this.onEnd);
    output.on('resize', this.onResize);
    input.pause();
  }

  next(): Promise<InputEvent> {
    const queued = this.queue.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.ended) {
      return Promise.reject(new Error('Input stream closed'));
    }

    return new Promise<InputEvent>((resolve, reject) => {
      this.pending = { resolve, reject };
      this.input.resume();
    });
  }

  close(): void {
    this.input.off('keypress', this.onKeypress);
    this.input.off('end', this.onEnd);
    this.output.off('resize', this.onResize);
    this.input.pause();
    this.queue = [];
  }

  private push(event: InputEvent): void {
    if (!this.pending) {
      this.queue.push(event);
      return;
    }
    const { resolve } = this.pending;
    this.pending = null;
    this.input.pause();
    resolve(event);
  }
}
