import type { PlatformStore } from "../store/platform-store.js";

type FetchLike = (input: string, init?: RequestInit) => Promise<{ ok: boolean; status: number; text: () => Promise<string> }>;

export interface NotificationMessage {
  subject: string;
  recipients: string[];
  templateId: string;
  context: Record<string, unknown>;
}

/** Delivery boundary. Implementations may be slow or fail; callers never wait on them. */
export interface NotificationSink {
  send(message: NotificationMessage): Promise<void>;
}

export class LogNotificationSink implements NotificationSink {
  async send(message: NotificationMessage): Promise<void> {
    console.log(`[notify] ${message.templateId} -> ${message.recipients.join(", ")}: ${message.subject}`);
  }
}

export interface WebhookNotificationSinkOptions {
  url: string;
  headers?: Record<string, string> | undefined;
  fetchFn?: FetchLike | undefined;
}

export class WebhookNotificationSink implements NotificationSink {
  private readonly fetchFn: FetchLike;

  constructor(private readonly options: WebhookNotificationSinkOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async send(message: NotificationMessage): Promise<void> {
    const response = await this.fetchFn(this.options.url, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        ...(this.options.headers ?? {})
      },
      body: JSON.stringify(message)
    });
    if (!response.ok) {
      throw new Error(`Notification webhook responded ${response.status}: ${await response.text()}`);
    }
  }
}

export interface NotificationDispatch {
  subject: string;
  recipientUserIds: Array<string | null | undefined>;
  templateId: string;
  context: Record<string, unknown>;
}

export class NotificationService {
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly store: PlatformStore,
    private readonly sink: NotificationSink
  ) {}

  /**
   * Queues delivery and returns immediately. Call only after the surrounding transaction
   * has committed; failures are logged and dropped.
   */
  dispatch(notification: NotificationDispatch): void {
    const delivery = this.deliver(notification).catch((error: unknown) => {
      console.error(
        `Notification ${notification.templateId} failed:`,
        error instanceof Error ? error.message : String(error)
      );
    });
    this.pending.add(delivery);
    void delivery.finally(() => {
      this.pending.delete(delivery);
    });
  }

  /** Waits for in-flight deliveries. */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private async deliver(notification: NotificationDispatch): Promise<void> {
    const recipients = await this.resolveEmails(notification.recipientUserIds);
    if (recipients.length === 0) {
      return;
    }
    await this.sink.send({
      subject: notification.subject,
      recipients,
      templateId: notification.templateId,
      context: notification.context
    });
  }

  private async resolveEmails(userIds: Array<string | null | undefined>): Promise<string[]> {
    const uniqueIds = [...new Set(userIds.filter((id): id is string => typeof id === "string" && id.length > 0))];
    const emails = new Set<string>();
    for (const userId of uniqueIds) {
      const user = await this.store.getUser(userId);
      const email = user?.email?.trim();
      if (email) {
        emails.add(email.toLowerCase());
      }
    }
    return [...emails];
  }
}
