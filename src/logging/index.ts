export { SessionLogger, createSessionLog, generateSessionId } from './session-logger.js';
export type { SessionEntry, LoggedEntry, SessionInfo } from './types.js';
