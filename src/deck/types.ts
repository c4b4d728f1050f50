/**
 * Slide descriptors - what a deck file declares, one tagged value per slide.
 *
 * Path-carrying kinds hold a path already resolved against the deck file;
 * literal kinds hold the text exactly as written.
 */

// ============ Path Slides ============

export interface MarkdownSlide {
  kind: 'markdown';
  path: string;
}

export interface ImageSlide {
  kind: 'image';
  path: string;
}

export interface AnimationSlide {
  kind: 'animation';
  path: string;
}

/** A file handed to the OS default application on activate. */
export interface OpenSlide {
  kind: 'open';
  path: string;
  /** The path as written in the deck, shown in the prompt. */
  label?: string;
}

export interface SourceSlide {
  kind: 'source';
  path: string;
}

// ============ Literal Slides ============

export interface TextSlide {
  kind: 'text';
  content: string;
}

export interface BannerSlide {
  kind: 'banner';
  content: string;
}

export type Slide =
  | MarkdownSlide
  | ImageSlide
  | AnimationSlide
  | OpenSlide
  | TextSlide
  | BannerSlide
  | SourceSlide;

export type SlideKind = Slide['kind'];

export type PathSlide = Extract<Slide, { path: string }>;

export type Deck = readonly Slide[];

export const SLIDE_KINDS = [
  'markdown',
  'image',
  'animation',
  'open',
  'text',
  'banner',
  'source',
] as const satisfies readonly SlideKind[];

const PATH_KINDS: ReadonlySet<SlideKind> = new Set(['markdown', 'image', 'animation', 'open', 'source']);

export function isPathSlide(slide: Slide): slide is PathSlide {
  return PATH_KINDS.has(slide.kind);
}
