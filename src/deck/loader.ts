/**
 * Deck loading - read, parse, validate, resolve paths.
 *
 * Everything here runs before the terminal is taken over, so a bad deck is
 * reported on a normal (cooked) terminal.
 */

import { readFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import type { ZodIssue } from 'zod';
import { deckFileSchema } from './schema.js';
import { isPathSlide, type Deck, type Slide } from './types.js';
import { formatError } from '../utils.js';

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Parse deck source text. Relative slide paths are resolved against `baseDir`.
 */
export function parseDeck(source: string, baseDir: string, origin = '<deck>'): Deck {
  let raw: unknown;
  try {
    raw = parseYaml(source);
  } catch (err) {
    throw new Error(`Deck file ${origin} is not valid YAML: ${formatError(err)}`, { cause: err });
  }

  const result = deckFileSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Deck file ${origin} is invalid: ${formatIssues(result.error.issues)}`);
  }

  const slides = result.data.slides.map((slide): Slide => {
    if (slide.kind === 'open') {
      return { ...slide, path: resolve(baseDir, slide.path), label: slide.path };
    }
    return isPathSlide(slide) ? { ...slide, path: resolve(baseDir, slide.path) } : slide;
  });
  return Object.freeze(slides);
}

/**
 * Read and parse a deck file from disk.
 */
export async function loadDeck(deckPath: string): Promise<Deck> {
  let source: string;
  try {
    source = await readFile(deckPath, 'utf-8');
  } catch (err) {
    throw new Error(`Failed to read deck file ${deckPath}: ${formatError(err)}`, { cause: err });
  }
  return parseDeck(source, dirname(resolve(deckPath)), deckPath);
}
