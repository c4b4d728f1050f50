import type { Command, InputEvent } from './types.js';

const KEY_COMMANDS: Readonly<Record<string, Command>> = {
  down: 'next',
  up: 'previous',
  '+': 'increase-margin',
  '-': 'decrease-margin',
  enter: 'activate',
  return: 'activate',
  escape: 'quit',
};

/**
 * Map one input event to one command. Modifiers are ignored; only the key
 * name decides. Anything unmapped, and every non-key event, is a no-op.
 */
export function classify(event: InputEvent): Command {
  if (event.type !== 'key') return 'noop';
  return Object.hasOwn(KEY_COMMANDS, event.key.name) ? KEY_COMMANDS[event.key.name] : 'noop';
}
