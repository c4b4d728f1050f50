/**
 * Syntax highlighting for source slides (cli-highlight / highlight.js).
 */

import { readFile } from 'fs/promises';
import { extname } from 'path';
import { highlight, supportsLanguage, parse as parseTheme, DEFAULT_THEME, type Theme } from 'cli-highlight';
import { formatError } from '../utils.js';

export interface SyntaxHighlighter {
  /** highlight.js language for a file, or undefined when none applies. */
  languageFor(path: string): string | undefined;
  highlight(code: string, language: string | undefined): string;
}

export class CliHighlighter implements SyntaxHighlighter {
  constructor(private readonly theme: Theme = DEFAULT_THEME) {}

  languageFor(path: string): string | undefined {
    const ext = extname(path).slice(1).toLowerCase();
    return ext !== '' && supportsLanguage(ext) ? ext : undefined;
  }

  highlight(code: string, language: string | undefined): string {
    if (!language) return code;
    return highlight(code, { language, theme: this.theme, ignoreIllegals: true });
  }
}

/**
 * Resolve a theme setting: a built-in name, or a path to a cli-highlight
 * JSON theme file.
 */
export async function loadCodeTheme(setting: string): Promise<Theme> {
  if (setting === 'default') return DEFAULT_THEME;
  if (setting === 'plain') return {};

  try {
    return parseTheme(await readFile(setting, 'utf-8'));
  } catch (err) {
    throw new Error(`Failed to load code theme ${setting}: ${formatError(err)}`, { cause: err });
  }
}
