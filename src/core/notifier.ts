import axios from 'axios';
import { Classification, Notifier } from '../common/interfaces/monitor.interfaces';
import { WEBHOOK_TIMEOUT_DEFAULT_MS } from '../common/time.constants';

/**
 * Body posted to the notification endpoint
 */
export interface WebhookPayload {
  text: string;
}

/**
 * Posts alert text to a webhook (Slack-style `{"text": ...}` body).
 * No authentication, no retry; a non-2xx response or transport error
 * rejects and is left to the caller.
 */
export class WebhookNotifier implements Notifier {
  constructor(
    private readonly webhookUrl: string,
    private readonly timeoutMs: number = WEBHOOK_TIMEOUT_DEFAULT_MS,
  ) {}

  get url(): string {
    return this.webhookUrl;
  }

  async notify(text: string): Promise<void> {
    const payload: WebhookPayload = { text };

    await axios.post(this.webhookUrl, payload, {
      headers: { 'Content-Type': 'application/json' },
      timeout: this.timeoutMs,
    });
  }
}

/**
 * Human-readable notification text for an alert classification
 */
export function formatNotificationText(classification: Classification): string {
  if (classification.source === 'structured') {
    return `🚨 Log Alert: Structured Error Detected!\nMessage: ${classification.detail ?? ''}`;
  }

  const rule = classification.ruleName ? ` (${classification.ruleName})` : '';
  return `🚨 Log Alert: Pattern Match${rule}!\nLog: ${classification.detail ?? classification.message ?? ''}`;
}
