import { EventEmitter } from 'events';
import { logger } from '../utils/logger';

export interface NotificationRequest {
  id: string;
  title: string;
  message: string;
}

export type PresentResult = 'presented' | 'unavailable';

export interface DismissEvent {
  notificationId: string;
}

export type DismissListener = (event: DismissEvent) => void;

/**
 * External single-slot notification surface. Dismissals arrive asynchronously and
 * independently of `present`.
 */
export interface NotificationChannel {
  present(request: NotificationRequest): Promise<PresentResult>;
  /** Returns the unsubscribe function. */
  onDismiss(listener: DismissListener): () => void;
}

const DISMISS_EVENT = 'dismiss';

/**
 * Writes notifications to the log and dismisses each one after `autoDismissMs`, or
 * when `dismiss(id)` is called.
 */
export class ConsoleNotificationChannel implements NotificationChannel {
  private readonly events = new EventEmitter();
  private readonly timers = new Map<string, NodeJS.Timeout>();

  constructor(private readonly autoDismissMs: number | null = null) {}

  async present(request: NotificationRequest): Promise<PresentResult> {
    logger.info(`[notification] ${request.title}\n${request.message}`, { id: request.id });

    if (this.autoDismissMs !== null) {
      this.clearTimer(request.id);
      this.timers.set(request.id, setTimeout(() => this.dismiss(request.id), this.autoDismissMs));
    }
    return 'presented';
  }

  onDismiss(listener: DismissListener): () => void {
    this.events.on(DISMISS_EVENT, listener);
    return () => {
      this.events.off(DISMISS_EVENT, listener);
    };
  }

  dismiss(notificationId: string) {
    this.clearTimer(notificationId);
    const event: DismissEvent = { notificationId };
    this.events.emit(DISMISS_EVENT, event);
  }

  close() {
    for (const id of [...this.timers.keys()]) {
      this.clearTimer(id);
    }
    this.events.removeAllListeners();
  }

  private clearTimer(id: string) {
    const timer = this.timers.get(id);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(id);
    }
  }
}
