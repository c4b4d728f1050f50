import { describe, it, expect } from 'vitest';
import { initialState, transition, DEFAULT_MARGIN } from '../presentation/index.js';

describe('initialState', () => {
  it('starts at the first slide with the default margin', () => {
    expect(initialState()).toEqual({ index: 0, margin: DEFAULT_MARGIN });
    expect(DEFAULT_MARGIN).toBe(2);
  });

  it('accepts a starting margin', () => {
    expect(initialState(5)).toEqual({ index: 0, margin: 5 });
  });
});

describe('transition', () => {
  it('next and previous move the index', () => {
    expect(transition({ index: 3, margin: 2 }, 'next')).toEqual({ index: 4, margin: 2 });
    expect(transition({ index: 3, margin: 2 }, 'previous')).toEqual({ index: 2, margin: 2 });
  });

  it('previous at the first slide stays there', () => {
    expect(transition({ index: 0, margin: 2 }, 'previous')).toEqual({ index: 0, margin: 2 });
  });

  it('margin round trip returns to the original value', () => {
    for (const margin of [0, 1, 2, 17]) {
      const up = transition({ index: 1, margin }, 'increase-margin');
      expect(up.margin).toBe(margin + 1);
      expect(transition(up, 'decrease-margin')).toEqual({ index: 1, margin });
    }
  });

  it('decrease-margin at zero does not underflow', () => {
    expect(transition({ index: 0, margin: 0 }, 'decrease-margin')).toEqual({ index: 0, margin: 0 });
  });

  it('increments saturate instead of overflowing', () => {
    const max = Number.MAX_SAFE_INTEGER;
    expect(transition({ index: max, margin: 2 }, 'next').index).toBe(max);
    expect(transition({ index: 0, margin: max }, 'increase-margin').margin).toBe(max);
  });

  it('activate, quit and noop leave the state unchanged', () => {
    const state = { index: 2, margin: 3 };
    expect(transition(state, 'activate')).toBe(state);
    expect(transition(state, 'quit')).toBe(state);
    expect(transition(state, 'noop')).toBe(state);
  });
});
