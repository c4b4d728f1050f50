/**
 * Presentation state and its transitions.
 */

import type { Command } from '../input/index.js';
import { saturatingAdd, saturatingSub } from '../utils.js';

export interface PresentationState {
  /** Current slide; one past the last slide ends the session. */
  index: number;
  /** Inset in cells applied on every side of box-laid-out content. */
  margin: number;
}

export const DEFAULT_MARGIN = 2;

export function initialState(margin: number = DEFAULT_MARGIN): PresentationState {
  return { index: 0, margin };
}

/**
 * Pure state update for a command. 'activate', 'quit' and 'noop' leave the
 * state as it is; their effects belong to the loop.
 */
export function transition(state: PresentationState, command: Command): PresentationState {
  switch (command) {
    case 'next':
      return { ...state, index: saturatingAdd(state.index, 1) };
    case 'previous':
      return { ...state, index: saturatingSub(state.index, 1) };
    case 'increase-margin':
      return { ...state, margin: saturatingAdd(state.margin, 1) };
    case 'decrease-margin':
      return { ...state, margin: saturatingSub(state.margin, 1) };
    case 'activate':
    case 'quit':
    case 'noop':
      return state;
  }
}
