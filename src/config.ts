/**
 * Presenter configuration - command line flags with environment fallbacks.
 *
 * Flags win over environment variables; both win over the defaults.
 */

import { parseArgs } from 'util';
import { DEFAULT_MARGIN } from './presentation/index.js';
import { DEFAULT_VIEWER } from './process/index.js';
import { formatError } from './utils.js';

export const VERSION = '0.1.0';

export interface PresenterConfig {
  deckPath: string;
  /** Margin the session starts with. */
  margin: number;
  viewer: string;
  /** 'default', 'plain', or a path to a cli-highlight JSON theme. */
  codeTheme: string;
  /** JSONL session log directory; no log when unset. */
  logDir?: string;
}

export type ConfigResult =
  | { kind: 'run'; config: PresenterConfig }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'usage-error'; message: string };

export const USAGE = `Usage: termdeck -f <deck.yaml> [options]

Present a slide deck full-screen in the terminal.

Options:
  -f, --file <path>       deck file (YAML or JSON)
  -m, --margin <n>        initial margin around markdown slides (default: ${DEFAULT_MARGIN})
      --viewer <cmd>      image viewer binary (default: ${DEFAULT_VIEWER})
      --theme <name|file> source highlighting theme: default, plain, or a JSON theme file
      --log-dir <dir>     write a JSONL session log to this directory
  -h, --help              show this help
  -v, --version           show the version

Environment:
  TERMDECK_MARGIN, TERMDECK_VIEWER, TERMDECK_CODE_THEME, TERMDECK_LOG_DIR

Keys:
  Down/Up  next/previous slide    +/-  margin    Enter  open    Esc  quit`;

function parseMargin(value: string, source: string): number | string {
  const margin = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(margin)) {
    return `Invalid ${source} "${value}": expected a non-negative integer`;
  }
  return margin;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

function readFlags(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: {
      file: { type: 'string', short: 'f' },
      margin: { type: 'string', short: 'm' },
      viewer: { type: 'string' },
      theme: { type: 'string' },
      'log-dir': { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
    },
    strict: true,
    allowPositionals: false,
  }).values;
}

export function parseConfig(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): ConfigResult {
  let values: ReturnType<typeof readFlags>;
  try {
    values = readFlags(argv);
  } catch (err) {
    return { kind: 'usage-error', message: formatError(err) };
  }

  if (values.help) return { kind: 'help' };
  if (values.version) return { kind: 'version' };

  const deckPath = nonEmpty(values.file);
  if (!deckPath) {
    return { kind: 'usage-error', message: 'Missing required option --file' };
  }

  let margin = DEFAULT_MARGIN;
  const rawMargin = nonEmpty(values.margin) ?? nonEmpty(env.TERMDECK_MARGIN);
  if (rawMargin !== undefined) {
    const parsed = parseMargin(rawMargin, nonEmpty(values.margin) !== undefined ? '--margin' : 'TERMDECK_MARGIN');
    if (typeof parsed === 'string') {
      return { kind: 'usage-error', message: parsed };
    }
    margin = parsed;
  }

  return {
    kind: 'run',
    config: {
      deckPath,
      margin,
      viewer: nonEmpty(values.viewer) ?? nonEmpty(env.TERMDECK_VIEWER) ?? DEFAULT_VIEWER,
      codeTheme: nonEmpty(values.theme) ?? nonEmpty(env.TERMDECK_CODE_THEME) ?? 'default',
      logDir: nonEmpty(values['log-dir']) ?? nonEmpty(env.TERMDECK_LOG_DIR),
    },
  };
}
