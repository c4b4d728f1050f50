export {
  TtyTerminal,
  ESCAPES,
  suspendRawMode,
  withTerminal,
  type Terminal,
  type TerminalSize,
} from './terminal.js';
