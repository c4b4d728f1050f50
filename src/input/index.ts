export * from './types.js';
export { classify } from './classifier.js';
export { TtyKeySource, toKeyEvent, type ResizeSource } from './key-source.js';
