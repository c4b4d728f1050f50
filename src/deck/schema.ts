/**
 * Deck file schema.
 *
 * A deck file is a YAML (or JSON) document with a `slides` list. Each entry
 * is a single-key object naming the slide kind:
 *
 *   slides:
 *     - banner: termdeck
 *     - markdown: intro.md
 *     - text: "hello"
 */

import { z } from 'zod';
import { SLIDE_KINDS, type Slide, type SlideKind } from './types.js';

function toSlide(kind: SlideKind, value: string): Slide {
  switch (kind) {
    case 'text':
    case 'banner':
      return { kind, content: value };
    case 'markdown':
    case 'image':
    case 'animation':
    case 'open':
    case 'source':
      return { kind, path: value };
  }
}

export const slideEntrySchema = z
  .record(z.string(), z.unknown())
  .transform((entry, ctx): Slide => {
    const keys = Object.keys(entry);
    if (keys.length !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected exactly one of ${SLIDE_KINDS.join(', ')}, got ${keys.length === 0 ? 'none' : keys.join(', ')}`,
      });
      return z.NEVER;
    }

    const key = keys[0];
    const kind = SLIDE_KINDS.find((k) => k === key);
    if (!kind) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `unknown slide kind "${key}"`,
      });
      return z.NEVER;
    }

    const value = entry[key];
    if (typeof value !== 'string' || value.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [key],
        message: 'expected a non-empty string',
      });
      return z.NEVER;
    }

    return toSlide(kind, value);
  });

export const deckFileSchema = z.object({
  slides: z.array(slideEntrySchema).min(1, 'a deck needs at least one slide'),
});
