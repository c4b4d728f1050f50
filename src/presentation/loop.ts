/**
 * The presentation loop: clear, render the current slide, wait for one key,
 * apply it. Runs until Escape or until the index moves past the last slide.
 *
 * Errors are not caught here. Whatever render/activate/input throws ends the
 * run and reaches the caller, which owns terminal teardown.
 */

import type { Deck, Slide } from '../deck/index.js';
import { classify, type Command, type KeySource } from '../input/index.js';
import type { Terminal } from '../terminal/index.js';
import type { SessionLogger } from '../logging/index.js';
import { initialState, transition, type PresentationState } from './state.js';

export type EndReason = 'quit' | 'end-of-deck';

export interface PresentationResult {
  reason: EndReason;
  state: PresentationState;
}

/** The two things the loop asks of a slide. */
export interface SlideActions {
  render(slide: Slide, margin: number): Promise<void>;
  activate(slide: Slide): Promise<void>;
}

export interface PresentationDeps {
  terminal: Terminal;
  keys: KeySource;
  slides: SlideActions;
  logger?: SessionLogger | null;
}

export interface PresentOptions {
  initialMargin?: number;
}

export async function present(
  deck: Deck,
  deps: PresentationDeps,
  options: PresentOptions = {},
): Promise<PresentationResult> {
  const { terminal, keys, slides, logger } = deps;
  let state = initialState(options.initialMargin);

  for (;;) {
    terminal.clear();
    await terminal.flush();

    const slide = deck[state.index];
    if (!slide) {
      return end('end-of-deck');
    }

    await logger?.logRender(state.index, slide.kind);
    await slides.render(slide, state.margin);
    await terminal.flush();

    const command: Command = classify(await keys.next());
    if (command !== 'noop') {
      await logger?.logCommand(state.index, command);
    }

    if (command === 'quit') {
      return end('quit');
    }
    if (command === 'activate') {
      await logger?.logActivate(state.index, slide.kind);
      await slides.activate(slide);
    }
    state = transition(state, command);
  }

  async function end(reason: EndReason): Promise<PresentationResult> {
    await logger?.logEnd(reason, state);
    return { reason, state };
  }
}
