import { describe, it, expect } from 'vitest';
import { classify, COMMANDS, toKeyEvent, type InputEvent } from '../input/index.js';
import { key } from './helpers/fakes.js';

describe('classify', () => {
  it.each([
    ['down', 'next'],
    ['up', 'previous'],
    ['+', 'increase-margin'],
    ['-', 'decrease-margin'],
    ['enter', 'activate'],
    ['return', 'activate'],
    ['escape', 'quit'],
  ] as const)('maps %s to %s', (name, command) => {
    expect(classify(key(name))).toBe(command);
  });

  it('ignores modifiers', () => {
    const event: InputEvent = { type: 'key', key: { name: 'down', ctrl: true, meta: true, shift: true } };
    expect(classify(event)).toBe('next');
  });

  it('maps unrecognised keys to noop', () => {
    for (const name of ['q', 'left', 'right', 'space', 'tab', 'c', '', 'constructor', 'toString']) {
      expect(classify(key(name))).toBe('noop');
    }
  });

  it('maps resize events to noop', () => {
    expect(classify({ type: 'resize', columns: 120, rows: 40 })).toBe('noop');
  });

  it('always yields a known command', () => {
    const names = ['down', 'up', '+', '-', 'enter', 'escape', 'x', 'f1', 'pagedown', '*'];
    for (const name of names) {
      expect(COMMANDS).toContain(classify(key(name)));
    }
  });
});

describe('toKeyEvent', () => {
  it('uses the readline key name', () => {
    expect(toKeyEvent(undefined, { name: 'down', ctrl: false, meta: false, shift: false, sequence: '\x1b[B' })).toEqual({
      name: 'down',
      ctrl: false,
      meta: false,
      shift: false,
    });
  });

  it('normalises return to enter', () => {
    expect(toKeyEvent('\r', { name: 'return', sequence: '\r' }).name).toBe('enter');
  });

  it('falls back to the sequence for unnamed keys', () => {
    expect(toKeyEvent('+', { sequence: '+' }).name).toBe('+');
    expect(toKeyEvent('-', undefined).name).toBe('-');
  });

  it('keeps modifier flags', () => {
    expect(toKeyEvent('\x03', { name: 'c', ctrl: true, sequence: '\x03' })).toEqual({
      name: 'c',
      ctrl: true,
      meta: false,
      shift: false,
    });
  });
});
