import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseDeck, loadDeck, slideEntrySchema, isPathSlide } from '../deck/index.js';

describe('slideEntrySchema', () => {
  it('turns a single-key entry into a slide', () => {
    expect(slideEntrySchema.parse({ text: 'hello' })).toEqual({ kind: 'text', content: 'hello' });
    expect(slideEntrySchema.parse({ open: 'talk.pdf' })).toEqual({ kind: 'open', path: 'talk.pdf' });
  });

  it('rejects unknown kinds', () => {
    const result = slideEntrySchema.safeParse({ video: 'a.mp4' });
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.issues[0].message).toBe('unknown slide kind "video"');
  });

  it('rejects entries with more than one key', () => {
    const result = slideEntrySchema.safeParse({ text: 'a', banner: 'b' });
    expect(result.success).toBe(false);
  });

  it('rejects empty and non-string payloads', () => {
    expect(slideEntrySchema.safeParse({ markdown: '' }).success).toBe(false);
    expect(slideEntrySchema.safeParse({ markdown: 3 }).success).toBe(false);
  });
});

describe('parseDeck', () => {
  it('parses every slide kind and resolves paths against the deck directory', () => {
    const source = [
      'slides:',
      '  - banner: termdeck',
      '  - markdown: intro.md',
      '  - text: "hello\\nworld"',
      '  - source: code/main.ts',
      '  - image: pics/a.png',
      '  - animation: /abs/anim.gif',
      '  - open: talk.pdf',
    ].join('\n');

    expect(parseDeck(source, '/decks/demo')).toEqual([
      { kind: 'banner', content: 'termdeck' },
      { kind: 'markdown', path: '/decks/demo/intro.md' },
      { kind: 'text', content: 'hello\nworld' },
      { kind: 'source', path: '/decks/demo/code/main.ts' },
      { kind: 'image', path: '/decks/demo/pics/a.png' },
      { kind: 'animation', path: '/abs/anim.gif' },
      { kind: 'open', path: '/decks/demo/talk.pdf', label: 'talk.pdf' },
    ]);
  });

  it('keeps the open path as written for display', () => {
    const [slide] = parseDeck('slides:\n  - open: ../shared/talk.pdf\n', '/decks/demo');
    expect(slide).toEqual({ kind: 'open', path: '/decks/shared/talk.pdf', label: '../shared/talk.pdf' });
  });

  it('accepts JSON', () => {
    expect(parseDeck('{"slides":[{"text":"hi"}]}', '/d')).toEqual([{ kind: 'text', content: 'hi' }]);
  });

  it('returns a frozen deck', () => {
    expect(Object.isFrozen(parseDeck('slides:\n  - text: a\n', '/d'))).toBe(true);
  });

  it('reports schema problems with their location', () => {
    expect(() => parseDeck('slides:\n  - text: ok\n  - slideshow: x\n', '/d', 'demo.yaml')).toThrow(
      'Deck file demo.yaml is invalid: slides.1: unknown slide kind "slideshow"',
    );
  });

  it('rejects a deck without slides', () => {
    expect(() => parseDeck('slides: []\n', '/d', 'empty.yaml')).toThrow(
      'Deck file empty.yaml is invalid: slides: a deck needs at least one slide',
    );
  });

  it('rejects malformed YAML', () => {
    expect(() => parseDeck('slides: [\n', '/d', 'broken.yaml')).toThrow(/^Deck file broken.yaml is not valid YAML: /);
  });
});

describe('loadDeck', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'termdeck-deck-'));
    await writeFile(join(dir, 'deck.yaml'), 'slides:\n  - markdown: intro.md\n  - text: bye\n');
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a deck file from disk', async () => {
    expect(await loadDeck(join(dir, 'deck.yaml'))).toEqual([
      { kind: 'markdown', path: join(dir, 'intro.md') },
      { kind: 'text', content: 'bye' },
    ]);
  });

  it('fails clearly when the file is missing', async () => {
    const missing = join(dir, 'missing.yaml');
    await expect(loadDeck(missing)).rejects.toThrow(`Failed to read deck file ${missing}`);
  });
});

describe('slide helpers', () => {
  it('tells path slides from literal ones', () => {
    expect(isPathSlide({ kind: 'source', path: '/a.ts' })).toBe(true);
    expect(isPathSlide({ kind: 'text', content: 'x' })).toBe(false);
  });
});
