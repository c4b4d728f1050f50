/**
 * Presenter lifecycle - config, deck, terminal takeover, teardown, exit code.
 */

import { loadDeck } from './deck/index.js';
import { TtyKeySource, type KeySource } from './input/index.js';
import { TtyTerminal, withTerminal, type Terminal } from './terminal/index.js';
import {
  SlideRenderer,
  TerminalMarkdownRenderer,
  CliHighlighter,
  FigletFont,
  loadCodeTheme,
  type MarkdownRenderer,
  type SyntaxHighlighter,
  type BannerFont,
} from './render/index.js';
import { SpawnRunner, type ProcessRunner } from './process/index.js';
import { present, type PresentationResult } from './presentation/index.js';
import { createSessionLog } from './logging/index.js';
import { parseConfig, USAGE, VERSION, type PresenterConfig } from './config.js';
import { formatError } from './utils.js';

/** Replaceable collaborators; anything left out gets the real implementation. */
export interface PresenterOverrides {
  terminal?: Terminal;
  keys?: KeySource;
  runner?: ProcessRunner;
  markdown?: MarkdownRenderer;
  highlighter?: SyntaxHighlighter;
  banner?: BannerFont;
  platform?: NodeJS.Platform;
}

/**
 * Load everything that can fail on a cooked terminal first (deck, theme, log
 * directory), then take over the terminal and present.
 */
export async function runPresenter(
  config: PresenterConfig,
  overrides: PresenterOverrides = {},
): Promise<PresentationResult> {
  const deck = await loadDeck(config.deckPath);
  const highlighter = overrides.highlighter ?? new CliHighlighter(await loadCodeTheme(config.codeTheme));
  const logger = config.logDir ? await createSessionLog(config.logDir) : null;
  await logger?.logStart(config.deckPath, deck.length);

  const terminal = overrides.terminal ?? new TtyTerminal();
  const keys = overrides.keys ?? new TtyKeySource();
  const slides = new SlideRenderer({
    terminal,
    runner: overrides.runner ?? new SpawnRunner(),
    markdown: overrides.markdown ?? new TerminalMarkdownRenderer(),
    highlighter,
    banner: overrides.banner ?? new FigletFont(),
    viewer: config.viewer,
    platform: overrides.platform,
  });

  try {
    return await withTerminal(terminal, () =>
      present(deck, { terminal, keys, slides, logger }, { initialMargin: config.margin }),
    );
  } catch (err) {
    await logger?.logError(err);
    throw err;
  } finally {
    keys.close();
  }
}

/**
 * CLI entry. Returns the process exit code.
 */
export async function main(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  overrides: PresenterOverrides = {},
): Promise<number> {
  const parsed = parseConfig(argv, env);
  switch (parsed.kind) {
    case 'help':
      console.log(USAGE);
      return 0;
    case 'version':
      console.log(VERSION);
      return 0;
    case 'usage-error':
      console.error(`[termdeck] ${parsed.message}\n\n${USAGE}`);
      return 1;
    case 'run':
      break;
  }

  if (!overrides.keys && !process.stdin.isTTY) {
    console.error('[termdeck] stdin is not a terminal; run termdeck interactively');
    return 1;
  }

  try {
    await runPresenter(parsed.config, overrides);
    return 0;
  } catch (err) {
    console.error(`[termdeck] ${formatError(err)}`);
    return 1;
  }
}
