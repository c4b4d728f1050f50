/**
 * Argument lists for the whole-screen image viewer (viu-compatible flags).
 */

import type { TerminalSize } from '../terminal/index.js';

export const DEFAULT_VIEWER = 'viu';

/** Static image sized to the full terminal. */
export function imageViewerArgs(path: string, size: TerminalSize): string[] {
  return [`-w${size.columns}`, `-h${size.rows}`, path];
}

/** First frame only; used while the animation slide is on screen. */
export function animationStillArgs(path: string): string[] {
  return ['-s', path];
}

/** Play the animation through once; used on activate. */
export function animationPlayArgs(path: string): string[] {
  return ['-1', path];
}
