import type { Notifier, StatusEvent, StatusKind } from '../types/index.js';

export interface StatusSnapshot extends StatusEvent {
  updatedAt: Date;
}

const TERMINAL_STATUSES: ReadonlySet<StatusKind> = new Set(['done', 'too-short', 'empty', 'error']);

const STATUS_LABELS: Record<StatusKind, string> = {
  idle: 'Idle',
  recording: 'Recording... (release the key to stop)',
  transcribing: 'Transcribing...',
  done: 'Pasted',
  'too-short': 'Recording too short, ignored',
  empty: 'Nothing recognized',
  error: 'Error',
};

export function describeStatus(event: StatusEvent): string {
  const label = STATUS_LABELS[event.status];
  if (event.status === 'error') {
    return `${label} [${event.failure ?? 'unknown'}]: ${event.message ?? ''}`.trim();
  }
  if (event.status === 'done' && event.text !== undefined) {
    return `${label}: ${event.text}`;
  }
  return label;
}

/**
 * Holds the latest status for display. A terminal status shows for
 * `clearAfterMs` and then falls back to idle; any newer notification
 * cancels the pending fallback.
 */
export class StatusBoard implements Notifier {
  private snapshot: StatusSnapshot = { sessionId: 0, status: 'idle', updatedAt: new Date() };
  private clearTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly clearAfterMs = 3000,
    private readonly log: (line: string) => void = (line) => console.log(line)
  ) {}

  notify(event: StatusEvent): void {
    this.cancelClear();
    this.snapshot = { ...event, updatedAt: new Date() };
    this.log(`[session ${event.sessionId}] ${describeStatus(event)}`);

    if (TERMINAL_STATUSES.has(event.status)) {
      this.scheduleClear(event.sessionId);
    }
  }

  getSnapshot(): StatusSnapshot {
    return this.snapshot;
  }

  dispose(): void {
    this.cancelClear();
  }

  private scheduleClear(sessionId: number): void {
    this.clearTimer = setTimeout(() => {
      this.clearTimer = null;
      if (this.snapshot.sessionId !== sessionId || !TERMINAL_STATUSES.has(this.snapshot.status)) {
        return;
      }
      this.snapshot = { sessionId, status: 'idle', updatedAt: new Date() };
    }, this.clearAfterMs);
    this.clearTimer.unref();
  }

  private cancelClear(): void {
    if (this.clearTimer) {
      clearTimeout(this.clearTimer);
      this.clearTimer = null;
    }
  }
}
