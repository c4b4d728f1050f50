export { present, type PresentationResult, type PresentationDeps, type PresentOptions, type SlideActions, type EndReason } from './loop.js';
export { initialState, transition, DEFAULT_MARGIN, type PresentationState } from './state.js';
