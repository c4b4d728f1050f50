import type { SlideKind } from '../deck/index.js';
import type { Command } from '../input/index.js';
import type { EndReason } from '../presentation/index.js';

export type SessionEntry =
  | { type: 'session_start'; deckPath: string; slideCount: number }
  | { type: 'render'; index: number; kind: SlideKind }
  | { type: 'command'; index: number; command: Command }
  | { type: 'activate'; index: number; kind: SlideKind }
  | { type: 'error'; message: string }
  | { type: 'session_end'; reason: EndReason; index: number; margin: number };

export type LoggedEntry = SessionEntry & { timestamp: string };

export interface SessionInfo {
  sessionId: string;
  filePath: string;
}
