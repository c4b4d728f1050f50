export * from './types.js';
export { slideEntrySchema, deckFileSchema } from './schema.js';
export { parseDeck, loadDeck } from './loader.js';
