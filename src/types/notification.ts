import type { UpdatePhase } from './orchestration.js';

export type NotificationKind = 'success' | 'failure' | 'rollback' | 'warning' | 'no-update';

export interface UpdateNotification {
  kind: NotificationKind;
  subject: string;
  message: string;
  phase: UpdatePhase;
  timestamp: string;
  host: string;
  instances: string[];
}

export interface NotificationChannel {
  readonly name: string;
  notify(notification: UpdateNotification): Promise<void>;
  sendTest(): Promise<void>;
}
