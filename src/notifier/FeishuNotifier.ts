import { z } from 'zod';
import { FetchLike } from '../client/BaseRpcClient';
import { truncate } from '../utils/coerce';
import { AlertMessage, Notifier } from './types';

/**
 * Feishu bot webhook reply; `code` 0 means accepted
 */
const FeishuReplySchema = z.object({
  code: z.number().optional(),
  StatusCode: z.number().optional(),
  msg: z.string().optional(),
});

/**
 * Feishu notifier configuration options
 */
export interface FeishuNotifierOptions {
  /** Custom bot webhook URL; delivery always fails when empty */
  webhookUrl: string;
  /** Request timeout in ms (default: 10000) */
  timeoutMs?: number;
  /** Whether to log verbose debug information */
  verbose?: boolean;
  /** HTTP implementation (default: global fetch) */
  fetch?: FetchLike;
}

/**
 * Builds the plain-text body sent to the webhook.
 */
export function renderFeishuText(alert: AlertMessage): string {
  let text = `${alert.title}\n\n${alert.message}`;
  const entries = Object.entries(alert.detail);
  if (entries.length > 0) {
    text += '\n\nDetails:';
    for (const [key, value] of entries) {
      text += `\n${key}: ${value}`;
    }
  }
  return text;
}

/**
 * Delivers alerts as text messages to a Feishu custom bot webhook.
 * Never throws; every failure resolves to false.
 */
export class FeishuNotifier implements Notifier {
  private readonly webhookUrl: string;

  private readonly timeoutMs: number;

  private readonly verbose: boolean;

  private readonly fetchImpl: FetchLike;

  constructor(options: FeishuNotifierOptions) {
    this.webhookUrl = options.webhookUrl;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.verbose = options.verbose ?? false;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async send(alert: AlertMessage): Promise<boolean> {
    if (!this.webhookUrl) {
      console.warn('[Feishu] Webhook URL not configured, skipping delivery');
      return false;
    }

    try {
      const response = await this.fetchImpl(this.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ msg_type: 'text', content: { text: renderFeishuText(alert) } }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      const body = await response.text();
      if (!response.ok) {
        console.error(`[Feishu] HTTP ${response.status}: ${truncate(body)}`);
        return false;
      }

      const reply = FeishuReplySchema.safeParse(JSON.parse(body));
      const code = reply.success ? reply.data.code ?? reply.data.StatusCode : undefined;
      if (code !== 0) {
        const reason = reply.success ? reply.data.msg ?? 'unknown error' : 'unexpected reply';
        console.error(`[Feishu] Delivery rejected: ${reason}`);
        return false;
      }

      if (this.verbose) {
        console.log(`[Feishu] Delivered: ${alert.title}`);
      }
      return true;
    } catch (error) {
      console.error('[Feishu] Delivery failed:', error instanceof Error ? error.message : error);
      return false;
    }
  }
}
