import logger from '../logger.js';
import metrics from '../metrics/index.js';
import { NotifyError } from '../errors.js';

const COMPONENT = 'notify';
const PUSHOVER_URL = 'https://api.pushover.net/1/messages.json';
const DEFAULT_TIMEOUT_MS = 5000;

export type NotificationAttachment = {
  filename: string;
  contentType: string;
  data: Buffer;
};

export type NotificationMessage = {
  title: string;
  message: string;
  priority?: number;
  attachment?: NotificationAttachment;
};

/** Outbound push capability. Implementations reject with `NotifyError`. */
export interface Notifier {
  send(message: NotificationMessage): Promise<void>;
}

/** Where producers hand notifications off without waiting for delivery. */
export interface NotificationSink {
  dispatch(message: NotificationMessage): void;
}

export class LogNotifier implements Notifier {
  async send(message: NotificationMessage): Promise<void> {
    logger.info(
      {
        component: COMPONENT,
        title: message.title,
        attachment: message.attachment?.filename,
        bytes: message.attachment?.data.length
      },
      message.message
    );
  }
}

export type PushoverNotifierOptions = {
  token: string;
  user: string;
  priority?: number;
  timeoutMs?: number;
  url?: string;
  fetch?: typeof fetch;
};

export class PushoverNotifier implements Notifier {
  private readonly options: PushoverNotifierOptions;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor(options: PushoverNotifierOptions) {
    if (!options.token || !options.user) {
      throw new Error('Pushover token and user are required');
    }
    this.options = options;
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async send(message: NotificationMessage): Promise<void> {
    const form = new FormData();
    form.set('token', this.options.token);
    form.set('user', this.options.user);
    form.set('title', message.title);
    form.set('message', message.message);
    form.set('priority', String(message.priority ?? this.options.priority ?? 0));
    if (message.attachment) {
      const { attachment } = message;
      form.set(
        'attachment',
        new Blob([new Uint8Array(attachment.data)], { type: attachment.contentType }),
        attachment.filename
      );
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.options.url ?? PUSHOVER_URL, {
        method: 'POST',
        body: form,
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new NotifyError(`Pushover request timed out after ${this.timeoutMs}ms`, undefined, true);
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new NotifyError(`Pushover request failed: ${detail}`);
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new NotifyError(
        `Pushover responded with ${response.status}${body ? `: ${body.slice(0, 200)}` : ''}`,
        response.status
      );
    }
  }
}

/**
 * Fire-and-forget delivery with a bounded wait. Failures are logged and
 * counted, never returned to the caller.
 */
export class NotificationDispatcher implements NotificationSink {
  private readonly notifier: Notifier;
  private readonly timeoutMs: number;
  private readonly inflight = new Set<Promise<void>>();

  constructor(notifier: Notifier, options: { timeoutMs?: number } = {}) {
    this.notifier = notifier;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  get pending(): number {
    return this.inflight.size;
  }

  dispatch(message: NotificationMessage): void {
    const task = this.deliver(message).finally(() => {
      this.inflight.delete(task);
    });
    this.inflight.add(task);
  }

  async flush(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled(Array.from(this.inflight));
    }
  }

  private async deliver(message: NotificationMessage): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new NotifyError(`Notification timed out after ${this.timeoutMs}ms`, undefined, true));
      }, this.timeoutMs);
    });

    const sending = Promise.resolve().then(() => this.notifier.send(message));
    sending.catch(error => {
      logger.debug({ component: COMPONENT, err: error }, 'Notification send settled with error');
    });

    try {
      await Promise.race([sending, timeout]);
      metrics.incrementCounter('notify.sent');
    } catch (error) {
      const err =
        error instanceof NotifyError
          ? error
          : new NotifyError(error instanceof Error ? error.message : String(error));
      metrics.incrementCounter('notify.failures');
      metrics.recordDetectorError(COMPONENT, err.message);
      logger.warn(
        { component: COMPONENT, err, title: message.title, statusCode: err.statusCode, timeout: err.isTimeout },
        'Notification failed'
      );
    } finally {
      clearTimeout(timer);
    }
  }
}
