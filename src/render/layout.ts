/**
 * Screen geometry. Pure functions over terminal size and text; nothing here
 * touches the terminal.
 */

import type { TerminalSize } from '../terminal/index.js';

export interface Point {
  x: number;
  y: number;
}

export interface Area extends Point {
  width: number;
  height: number;
}

export interface PlacedLine extends Point {
  text: string;
}

/**
 * Split on line breaks. A trailing newline does not start an extra line and
 * a CR before the LF is dropped.
 */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

/** Display length in code points. */
export function lineLength(line: string): number {
  return Array.from(line).length;
}

/** Width is one more than the longest line; height is the line count. */
export function textSize(text: string): { width: number; height: number } {
  const lines = splitLines(text);
  const longest = lines.reduce((max, line) => Math.max(max, lineLength(line)), 0);
  return { width: longest + 1, height: lines.length };
}

// CSI (colors, cursor) and OSC (hyperlinks) sequences occupy no columns.
const ESCAPE_SEQUENCE = /\x1b\[[0-?]*[ -/]*[@-~]|\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)/y;
const RESET = '\x1b[0m';

/**
 * Cut a styled line to `width` visible columns. Escape sequences are kept
 * whole; a cut line ends with a style reset.
 */
export function clipLine(line: string, width: number): string {
  let out = '';
  let used = 0;
  let i = 0;
  while (i < line.length) {
    ESCAPE_SEQUENCE.lastIndex = i;
    const escape = ESCAPE_SEQUENCE.exec(line);
    if (escape) {
      out += escape[0];
      i += escape[0].length;
      continue;
    }
    const codePoint = line.codePointAt(i) ?? 0;
    const char = String.fromCodePoint(codePoint);
    if (used === width) {
      return `${out}${RESET}`;
    }
    out += char;
    used += 1;
    i += char.length;
  }
  return out;
}

function half(total: number, used: number): number {
  return Math.floor(Math.max(0, total - used) / 2);
}

export function centeredOrigin(width: number, height: number, size: TerminalSize): Point {
  return { x: half(size.columns, width), y: half(size.rows, height) };
}

/** Each line centered on its own; the block centered vertically. */
export function centerLines(lines: readonly string[], size: TerminalSize): PlacedLine[] {
  const top = half(size.rows, lines.length);
  return lines.map((text, i) => ({ x: half(size.columns, lineLength(text)), y: top + i, text }));
}

/** The block centered as a whole, every line starting in the same column. */
export function centerBlock(lines: readonly string[], size: TerminalSize): PlacedLine[] {
  const widest = lines.reduce((max, line) => Math.max(max, lineLength(line)), 0);
  const origin = centeredOrigin(widest, lines.length, size);
  return lines.map((text, i) => ({ x: origin.x, y: origin.y + i, text }));
}

/**
 * Box for markdown content: as wide as the text needs but no wider than the
 * terminal minus the margin on both sides, as tall as the terminal minus the
 * margin, centered. Collapses to zero area rather than going negative.
 */
export function markdownArea(textWidth: number, size: TerminalSize, margin: number): Area {
  const width = Math.min(textWidth, Math.max(0, size.columns - margin * 2));
  const height = Math.max(0, size.rows - margin * 2);
  return { ...centeredOrigin(width, height, size), width, height };
}
