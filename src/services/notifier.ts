import os from 'node:os';
import nodemailer from 'nodemailer';
import { errorMessage } from '../core/errors.js';
import type { SmtpSettings } from '../types/config.js';
import type { NotificationChannel, NotificationKind, UpdateNotification } from '../types/notification.js';
import type { RunOutcome, UpdatePhase } from '../types/orchestration.js';
import { logEvent, type LogLevel } from '../utils/logger.js';

const SUBJECT_PREFIX = '[Bedrock Updater]';

const LOG_LEVEL_BY_KIND: Record<NotificationKind, LogLevel> = {
  'success': 'info',
  'failure': 'error',
  'rollback': 'warn',
  'warning': 'warn',
  'no-update': 'info',
};

export interface MailMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
}

export interface MailTransport {
  sendMail(message: MailMessage): Promise<unknown>;
}

function phaseLabel(phase: UpdatePhase): string {
  return phase.replace(/-/g, ' ');
}

/** Map a terminal outcome to the one notification it produces. */
export function notificationForOutcome(
  outcome: RunOutcome,
  context: { host?: string; now?: () => Date; instances: readonly string[] },
): UpdateNotification {
  const host = context.host ?? os.hostname();
  const timestamp = (context.now ?? (() => new Date()))().toISOString();
  const base = { host, timestamp };

  switch (outcome.kind) {
    case 'no-update-needed':
      return {
        ...base,
        kind: 'no-update',
        phase: 'checking-version',
        instances: [...context.instances],
        subject: `${SUBJECT_PREFIX} No update needed (${outcome.currentVersion})`,
        message: `Servers are on ${outcome.currentVersion}; the latest release is ${outcome.latestVersion}.`,
      };
    case 'dry-run-stopped-before-change':
      return {
        ...base,
        kind: 'warning',
        phase: 'checking-version',
        instances: [...context.instances],
        subject: `${SUBJECT_PREFIX} Dry run: update ${outcome.latestVersion} available`,
        message:
          `Dry run: an update from ${outcome.currentVersion} to ${outcome.latestVersion} is available. ` +
          'No changes were made.',
      };
    case 'success': {
      const lines = [`Updated from ${outcome.oldVersion} to ${outcome.newVersion}.`];
      if (outcome.backupsSkipped) {
        lines.push('Backups were skipped for this run; no rollback point exists for this update.');
      }
      return {
        ...base,
        kind: 'success',
        phase: 'done',
        instances: outcome.instances,
        subject: `${SUBJECT_PREFIX} Update successful: ${outcome.oldVersion} -> ${outcome.newVersion}`,
        message: lines.join('\n'),
      };
    }
    case 'rolled-back':
      return {
        ...base,
        kind: 'rollback',
        phase: outcome.phase,
        instances: outcome.instances,
        subject: `${SUBJECT_PREFIX} Servers rolled back during ${phaseLabel(outcome.phase)}`,
        message: `Every server was restored from its snapshot and restarted.\nReason: ${outcome.reason}`,
      };
    case 'failed': {
      const severe = outcome.rollback === 'failed' || outcome.rollback === 'integrity-failed';
      const lines = [`Update failed during ${phaseLabel(outcome.phase)}.`, `Reason: ${outcome.reason}`];
      if (outcome.rollback === 'failed') {
        lines.push('Rollback was attempted but a restore or restart failed. Manual intervention is required.');
      } else if (outcome.rollback === 'integrity-failed') {
        lines.push('A snapshot failed its integrity check; nothing was restored. Manual intervention is required.');
      } else if (outcome.rollback === 'unavailable') {
        lines.push('Backups were skipped, so no rollback was possible.');
      }
      return {
        ...base,
        kind: 'failure',
        phase: outcome.phase,
        instances: outcome.instances,
        subject: `${SUBJECT_PREFIX} ${severe ? 'CRITICAL: ' : ''}Update failed during ${phaseLabel(outcome.phase)}`,
        message: lines.join('\n'),
      };
    }
  }
}

export function renderNotificationText(notification: UpdateNotification): string {
  return [
    notification.message,
    '',
    `Phase:     ${phaseLabel(notification.phase)}`,
    `Host:      ${notification.host}`,
    `Time:      ${notification.timestamp}`,
    `Instances: ${notification.instances.length > 0 ? notification.instances.join(', ') : '(none)'}`,
  ].join('\n');
}

/** Writes notifications to the update log only. */
export class LogNotifier implements NotificationChannel {
  readonly name = 'log';

  async notify(notification: UpdateNotification): Promise<void> {
    await logEvent(
      `[Notify:${notification.kind}] ${notification.subject} | ${renderNotificationText(notification).replace(/\n/g, ' | ')}`,
      LOG_LEVEL_BY_KIND[notification.kind],
    );
  }

  async sendTest(): Promise<void> {
    await logEvent('[Notify] Test notification: email is not configured, notifications go to the log.');
  }
}

export interface EmailNotifierOptions {
  settings: SmtpSettings;
  /** When false, `no-update` notifications are logged but not mailed. */
  notifyOnNoUpdate?: boolean;
  transport?: MailTransport;
  host?: string;
  now?: () => Date;
}

export class EmailNotifier implements NotificationChannel {
  readonly name = 'email';
  readonly #settings: SmtpSettings;
  readonly #notifyOnNoUpdate: boolean;
  readonly #transport: MailTransport;
  readonly #host: string;
  readonly #now: () => Date;
  readonly #log = new LogNotifier();

  constructor(options: EmailNotifierOptions) {
    this.#settings = options.settings;
    this.#notifyOnNoUpdate = options.notifyOnNoUpdate ?? false;
    this.#transport = options.transport ?? createSmtpTransport(options.settings);
    this.#host = options.host ?? os.hostname();
    this.#now = options.now ?? (() => new Date());
  }

  async notify(notification: UpdateNotification): Promise<void> {
    await this.#log.notify(notification);
    if (notification.kind === 'no-update' && !this.#notifyOnNoUpdate) {
      return;
    }
    await this.#send(notification.subject, renderNotificationText(notification));
  }

  async sendTest(): Promise<void> {
    await this.#send(
      `${SUBJECT_PREFIX} Test email`,
      [
        'This is a test message from the Bedrock server updater.',
        '',
        `Host:      ${this.#host}`,
        `Time:      ${this.#now().toISOString()}`,
        `SMTP host: ${this.#settings.host}:${this.#settings.port}`,
      ].join('\n'),
    );
  }

  async #send(subject: string, text: string): Promise<void> {
    try {
      await this.#transport.sendMail({
        from: this.#settings.from,
        to: this.#settings.to.join(', '),
        subject,
        text,
      });
      await logEvent(`[Notify] Email sent to ${this.#settings.to.join(', ')}: ${subject}`);
    } catch (err) {
      await logEvent(`[Notify] Failed to send email '${subject}': ${errorMessage(err)}`, 'error');
      throw err;
    }
  }
}

function createSmtpTransport(settings: SmtpSettings): MailTransport {
  return nodemailer.createTransport({
    host: settings.host,
    port: settings.port,
    secure: settings.secure,
    auth: settings.user ? { user: settings.user, pass: settings.password ?? '' } : undefined,
  });
}

export function createNotifier(settings: SmtpSettings | null, notifyOnNoUpdate: boolean): NotificationChannel {
  return settings ? new EmailNotifier({ settings, notifyOnNoUpdate }) : new LogNotifier();
}
