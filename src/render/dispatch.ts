/**
 * Slide dispatch - one render strategy and one activate behavior per slide kind.
 *
 * Errors from reading a slide's file or from an external process are not
 * caught here; they end the presentation.
 */

import { readFile } from 'fs/promises';
import type { Slide } from '../deck/index.js';
import { suspendRawMode, type Terminal } from '../terminal/index.js';
import {
  launchCommand,
  imageViewerArgs,
  animationStillArgs,
  animationPlayArgs,
  DEFAULT_VIEWER,
  type ProcessRunner,
} from '../process/index.js';
import { centerBlock, centerLines, clipLine, centeredOrigin, markdownArea, splitLines, textSize, type PlacedLine } from './layout.js';
import type { MarkdownRenderer } from './markdown.js';
import type { SyntaxHighlighter } from './source.js';
import type { BannerFont } from './banner.js';
import { formatError } from '../utils.js';

export interface SlideRendererDeps {
  terminal: Terminal;
  runner: ProcessRunner;
  markdown: MarkdownRenderer;
  highlighter: SyntaxHighlighter;
  banner: BannerFont;
  /** Image viewer binary (viu-compatible flags). */
  viewer?: string;
  platform?: NodeJS.Platform;
  readText?: (path: string) => Promise<string>;
}

export const OPEN_PROMPT = 'press enter to open';

const readUtf8 = (path: string): Promise<string> => readFile(path, 'utf-8');

export class SlideRenderer {
  private readonly terminal: Terminal;
  private readonly viewer: string;
  private readonly readText: (path: string) => Promise<string>;

  constructor(private readonly deps: SlideRendererDeps) {
    this.terminal = deps.terminal;
    this.viewer = deps.viewer ?? DEFAULT_VIEWER;
    this.readText = deps.readText ?? readUtf8;
  }

  /**
   * Draw one slide. The screen is expected to be cleared already.
   */
  async render(slide: Slide, margin: number): Promise<void> {
    switch (slide.kind) {
      case 'markdown':
        return this.renderMarkdown(slide.path, margin);
      case 'image': {
        const args = imageViewerArgs(slide.path, this.terminal.size());
        return this.runViewer(args);
      }
      case 'animation':
        return this.runViewer(animationStillArgs(slide.path));
      case 'open': {
        const prompt = [`External file: ${slide.label ?? slide.path}`, OPEN_PROMPT];
        this.writeLines(centerLines(prompt, this.terminal.size()));
        return;
      }
      case 'text':
        this.writeLines(centerLines(splitLines(slide.content), this.terminal.size()));
        return;
      case 'banner': {
        const art = splitLines(this.deps.banner.render(slide.content));
        this.writeLines(centerBlock(art, this.terminal.size()));
        return;
      }
      case 'source':
        return this.renderSource(slide.path);
    }
  }

  /**
   * The Enter action. Only file-backed kinds that can be shown outside the
   * terminal do anything.
   */
  async activate(slide: Slide): Promise<void> {
    switch (slide.kind) {
      case 'open':
      case 'image': {
        const { command, args } = launchCommand(slide.path, this.deps.platform);
        return this.deps.runner.run(command, args, { stdio: 'ignore' });
      }
      case 'animation':
        return this.runViewer(animationPlayArgs(slide.path));
      case 'markdown':
      case 'text':
      case 'banner':
      case 'source':
        return;
    }
  }

  private async renderMarkdown(path: string, margin: number): Promise<void> {
    const markdown = await this.read('markdown', path);
    const area = markdownArea(textSize(markdown).width, this.terminal.size(), margin);
    if (area.width === 0 || area.height === 0) return;

    const lines = await this.deps.markdown.render(markdown, area.width);
    this.writeLines(
      lines.slice(0, area.height).map((text, i) => ({ x: area.x, y: area.y + i, text: clipLine(text, area.width) })),
    );
  }

  private async renderSource(path: string): Promise<void> {
    const code = await this.read('source', path);
    const { width, height } = textSize(code);
    const origin = centeredOrigin(width, height, this.terminal.size());

    const highlighted = this.deps.highlighter.highlight(code, this.deps.highlighter.languageFor(path));
    this.writeLines(splitLines(highlighted).map((text, i) => ({ x: origin.x, y: origin.y + i, text })));
    this.terminal.moveTo(0, 0);
  }

  private runViewer(args: string[]): Promise<void> {
    return suspendRawMode(this.terminal, () => this.deps.runner.run(this.viewer, args, { stdio: 'inherit' }));
  }

  private async read(kind: Slide['kind'], path: string): Promise<string> {
    try {
      return await this.readText(path);
    } catch (err) {
      throw new Error(`Failed to read ${kind} slide ${path}: ${formatError(err)}`, { cause: err });
    }
  }

  private writeLines(lines: readonly PlacedLine[]): void {
    for (const line of lines) {
      this.terminal.moveTo(line.x, line.y);
      this.terminal.write(line.text);
    }
  }
}
