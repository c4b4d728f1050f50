/**
 * Input events and the abstract commands they classify into.
 */

export interface KeyEvent {
  /** Named key ('up', 'down', 'enter', 'escape', ...) or the single character typed. */
  name: string;
  ctrl: boolean;
  meta: boolean;
  shift: boolean;
}

export type InputEvent =
  | { type: 'key'; key: KeyEvent }
  | { type: 'resize'; columns: number; rows: number };

export const COMMANDS = [
  'next',
  'previous',
  'increase-margin',
  'decrease-margin',
  'activate',
  'quit',
  'noop',
] as const;

export type Command = (typeof COMMANDS)[number];

/** Blocks until exactly one input event is available. */
export interface KeySource {
  next(): Promise<InputEvent>;
  close(): void;
}
