/**
 * Markdown to ANSI-styled terminal lines via marked + marked-terminal.
 */

import { Marked, type MarkedExtension } from 'marked';
import { markedTerminal } from 'marked-terminal';
import { splitLines } from './layout.js';

export interface MarkdownRenderer {
  /** Lay out `markdown` to at most `width` columns. */
  render(markdown: string, width: number): Promise<string[]>;
}

export class TerminalMarkdownRenderer implements MarkdownRenderer {
  async render(markdown: string, width: number): Promise<string[]> {
    // @types/marked-terminal types markedTerminal() as the old TerminalRenderer;
    // at runtime it returns a marked extension.
    const extension = markedTerminal({ width, reflowText: true }) as unknown as MarkedExtension;
    // The extension captures width, so a new instance per layout.
    const marked = new Marked(extension);
    const output = await marked.parse(markdown);
    return splitLines(output.trimEnd());
  }
}
