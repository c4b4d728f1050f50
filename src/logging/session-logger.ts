import { appendFile, mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { SlideKind } from '../deck/index.js';
import type { Command } from '../input/index.js';
import type { EndReason, PresentationState } from '../presentation/index.js';
import type { LoggedEntry, SessionEntry, SessionInfo } from './types.js';
import { formatError } from '../utils.js';

/**
 * Generate a session ID based on the local time.
 */
export function generateSessionId(now: Date = new Date()): string {
  // Format: YYYY-MM-DD_HH-MM-SS
  const pad = (n: number) => String(n).padStart(2, '0');
  const date = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}-${pad(now.getMinutes())}-${pad(now.getSeconds())}`;
  return `${date}_${time}`;
}

/**
 * Create the JSONL log for a new presentation session.
 */
export async function createSessionLog(logDir: string, now: Date = new Date()): Promise<SessionLogger> {
  await mkdir(logDir, { recursive: true });

  const sessionId = generateSessionId(now);
  const filePath = join(logDir, `${sessionId}.jsonl`);
  await writeFile(filePath, '', { flag: 'a' });

  return new SessionLogger({ sessionId, filePath });
}

/**
 * Session logger for recording what was shown and pressed.
 */
export class SessionLogger {
  constructor(private readonly sessionInfo: SessionInfo) {}

  get filePath(): string {
    return this.sessionInfo.filePath;
  }

  get sessionId(): string {
    return this.sessionInfo.sessionId;
  }

  async logStart(deckPath: string, slideCount: number): Promise<void> {
    await this.append({ type: 'session_start', deckPath, slideCount });
  }

  async logRender(index: number, kind: SlideKind): Promise<void> {
    await this.append({ type: 'render', index, kind });
  }

  async logCommand(index: number, command: Command): Promise<void> {
    await this.append({ type: 'command', index, command });
  }

  async logActivate(index: number, kind: SlideKind): Promise<void> {
    await this.append({ type: 'activate', index, kind });
  }

  async logEnd(reason: EndReason, state: PresentationState): Promise<void> {
    await this.append({ type: 'session_end', reason, index: state.index, margin: state.margin });
  }

  /**
   * Record a fatal error. Never throws; the error being recorded is the one
   * the caller reports.
   */
  async logError(err: unknown): Promise<void> {
    try {
      await this.append({ type: 'error', message: formatError(err) });
    } catch (logErr) {
      console.warn(`[session-log] Failed to record error in ${this.sessionInfo.filePath}:`, logErr);
    }
  }

  private async append(entry: SessionEntry): Promise<void> {
    const logged: LoggedEntry = { ...entry, timestamp: new Date().toISOString() };
    await appendFile(this.sessionInfo.filePath, JSON.stringify(logged) + '\n');
  }
}
