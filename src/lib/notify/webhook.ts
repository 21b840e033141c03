import axios from 'axios';
import { NotificationError, errorMessage } from '../errors.js';
import { toWebhookPayload } from '../batch/report.js';
import type { Notifier, Report } from '../types.js';

export interface WebhookClient {
  post(url: string, body: unknown): Promise<{ status: number }>;
}

const webhookHttp = axios.create({
  timeout: 10000,
  headers: { 'Content-Type': 'application/json' },
  // Non-2xx responses are reported, not thrown
  validateStatus: () => true,
});

export const axiosWebhookClient: WebhookClient = {
  post: (url, body) => webhookHttp.post(url, body),
};

export interface WebhookNotifierOptions {
  client?: WebhookClient;
  includeFormattedTime?: boolean;
}

/**
 * Delivers the batch report to a webhook. Failures are logged and reported
 * through the return value, never thrown.
 */
export class WebhookNotifier implements Notifier {
  private readonly client: WebhookClient;
  private readonly includeFormattedTime: boolean;

  constructor({
    client = axiosWebhookClient,
    includeFormattedTime = true,
  }: WebhookNotifierOptions = {}) {
    this.client = client;
    this.includeFormattedTime = includeFormattedTime;
  }

  async send(report: Report, endpoint: string): Promise<boolean> {
    const payload = toWebhookPayload(report, {
      includeFormattedTime: this.includeFormattedTime,
    });

    try {
      const response = await this.client.post(endpoint, payload);
      if (response.status === 200) {
        console.log('[Webhook] Webhook sent successfully.');
        return true;
      }
      console.warn(
        `[Webhook] Webhook failed with status code: ${response.status}`,
      );
      return false;
    } catch (error) {
      const failure = new NotificationError(
        `Error sending webhook: ${errorMessage(error)}`,
        endpoint,
      );
      console.error(`[Webhook] ${failure.message}`);
      return false;
    }
  }
}
