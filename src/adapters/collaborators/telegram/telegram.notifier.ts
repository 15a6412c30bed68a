import { Logger } from '@nestjs/common';
import {
  CallOptions,
  DeliveryResult,
  DownstreamError,
  MessageKind,
  NotificationPayload,
  Notifier,
} from '../../../core';
import { HttpJsonClient } from '../http/http-json.client';
import { splitMessage, TELEGRAM_MESSAGE_LIMIT } from './message-splitter';

export interface TelegramNotifierConfig {
  botToken: string;
  apiBaseUrl?: string;
  maxMessageLength?: number;
}

/**
 * Delivers order messages to a Telegram chat. The order's userId is the chat id.
 * Long reports are sent as several messages, in order.
 */
export class TelegramNotifier implements Notifier {
  readonly name = 'telegram';
  private readonly logger = new Logger(TelegramNotifier.name);
  private readonly client: HttpJsonClient;
  private readonly maxMessageLength: number;

  constructor(config: TelegramNotifierConfig) {
    this.client = new HttpJsonClient({
      baseUrl: `${config.apiBaseUrl ?? 'https://api.telegram.org'}/bot${config.botToken}`,
      name: this.name,
    });
    this.maxMessageLength = config.maxMessageLength ?? TELEGRAM_MESSAGE_LIMIT;
  }

  async notify(
    userRef: string,
    kind: MessageKind,
    payload: NotificationPayload,
    options: CallOptions = {},
  ): Promise<DeliveryResult> {
    const chunks = splitMessage(payload.text, this.maxMessageLength);

    for (const [index, chunk] of chunks.entries()) {
      try {
        await this.client.post('/sendMessage', { chat_id: userRef, text: chunk }, options);
      } catch (error) {
        // 4xx such as a blocked bot or an unknown chat will not heal on retry
        if (error instanceof DownstreamError && !error.retryable) {
          this.logger.warn(
            `Telegram refused ${kind} for order ${payload.orderId} (part ${index + 1}/${chunks.length}): ${error.message}`,
          );
          return 'failed';
        }
        throw error;
      }
    }

    return 'delivered';
  }
}
