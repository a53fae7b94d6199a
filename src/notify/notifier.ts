import { hostname, platform } from 'node:os';
import { logger, describeError } from '../utils/logger.js';
import { executeSubprocess } from '../utils/subprocess-handler.js';
import type { NotifySettings } from '../config/schema.js';

/**
 * Best-effort operator notifications. Implementations must never throw.
 */
export interface Notifier {
  notify(emoji: string, title: string, message: string): Promise<void>;
}

export class NullNotifier implements Notifier {
  async notify(): Promise<void> {}
}

/** Slack-compatible incoming webhook. */
export class WebhookNotifier implements Notifier {
  constructor(
    private url: string,
    private fetchImpl: typeof fetch = fetch
  ) {}

  formatText(emoji: string, title: string, message: string, at: Date = new Date()): string {
    const ts = at.toISOString().replace('T', ' ').slice(0, 19);
    return `${emoji} *${title}*\n${message}\n_${hostname()} • ${ts}_`;
  }

  async notify(emoji: string, title: string, message: string): Promise<void> {
    try {
      const response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text: this.formatText(emoji, title, message) }),
        signal: AbortSignal.timeout(10000),
      });
      if (!response.ok) {
        logger.debug('Webhook notification rejected', { status: response.status, title });
      }
    } catch (err) {
      logger.debug('Webhook notification failed', { title, error: describeError(err) });
    }
  }
}

/** Desktop banner via osascript (macOS) or notify-send (Linux). */
export class DesktopNotifier implements Notifier {
  async notify(emoji: string, title: string, message: string): Promise<void> {
    const heading = `${emoji} ${title}`;
    const script = `display notification ${JSON.stringify(message)} with title ${JSON.stringify(heading)}`;
    const result =
      platform() === 'darwin'
        ? await executeSubprocess('osascript', ['-e', script], { timeout: 10000 })
        : await executeSubprocess('notify-send', [heading, message], { timeout: 10000 });
    if (!result.success) {
      logger.debug('Desktop notification failed', { title, error: result.error });
    }
  }
}

export class CompositeNotifier implements Notifier {
  constructor(private notifiers: Notifier[]) {}

  async notify(emoji: string, title: string, message: string): Promise<void> {
    await Promise.all(this.notifiers.map((n) => n.notify(emoji, title, message)));
  }
}

export function createNotifier(settings: NotifySettings): Notifier {
  const notifiers: Notifier[] = [];
  if (settings.webhookUrl) {
    notifiers.push(new WebhookNotifier(settings.webhookUrl));
  }
  if (settings.desktop) {
    notifiers.push(new DesktopNotifier());
  }
  if (notifiers.length === 0) {
    return new NullNotifier();
  }
  return notifiers.length === 1 ? notifiers[0] : new CompositeNotifier(notifiers);
}
