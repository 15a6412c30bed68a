import { Logger } from '@nestjs/common';
import { MessageKind, RefundStatus } from '../domain/enums';
import { Order } from '../domain/models';
import { DeliveryResult, NotificationPayload, Notifier } from '../interfaces';
import { sleep, withTimeout } from '../fulfillment/retry';
import { toError } from '../fulfillment/errors';

export interface NotificationSettings {
  /**
   * Attempts for payment_ack and report_ready; other kinds are sent once
   */
  attempts: number;
  retryDelayMs: number;
  /**
   * Bound on each notify call; its AbortSignal fires when it elapses
   */
  timeoutMs: number;
  sleepFn?: (ms: number) => Promise<void>;
}

const RETRIED_KINDS: MessageKind[] = [MessageKind.PAYMENT_ACK, MessageKind.REPORT_READY];

/**
 * Best-effort user messaging. Never throws: a message that cannot be
 * delivered is logged and reported as 'failed'.
 */
export class NotificationService {
  private readonly logger = new Logger(NotificationService.name);

  constructor(
    private readonly notifier: Notifier,
    private readonly settings: NotificationSettings,
  ) {}

  async send(order: Order, kind: MessageKind): Promise<DeliveryResult> {
    const payload = this.buildPayload(order, kind);
    const attempts = RETRIED_KINDS.includes(kind) ? Math.max(1, this.settings.attempts) : 1;
    const sleepFn = this.settings.sleepFn ?? sleep;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const result = await withTimeout(
          (signal) => this.notifier.notify(order.userId, kind, payload, { signal }),
          this.settings.timeoutMs,
          `notify ${kind}`,
        );
        if (result === 'delivered') {
          return result;
        }
        this.logger.warn(`${kind} for order ${order.id} not delivered (attempt ${attempt}/${attempts})`);
      } catch (error) {
        this.logger.warn(
          `${kind} for order ${order.id} failed (attempt ${attempt}/${attempts}): ${toError(error).message}`,
        );
      }

      if (attempt < attempts) {
        await sleepFn(this.settings.retryDelayMs);
      }
    }

    this.logger.error(`Giving up on ${kind} for order ${order.id}`);
    return 'failed';
  }

  buildPayload(order: Order, kind: MessageKind): NotificationPayload {
    return {
      orderId: order.id,
      text: this.renderText(order, kind),
      data: {
        status: order.status,
        amount: order.amount,
        currency: order.currency,
      },
    };
  }

  private renderText(order: Order, kind: MessageKind): string {
    switch (kind) {
      case MessageKind.PAYMENT_ACK:
        return [
          'Payment received.',
          `Order: ${order.id}`,
          `Product: ${order.productKind}`,
          `Amount: ${order.money.format()}`,
          'Your report is being prepared.',
        ].join('\n');

      case MessageKind.REPORT_READY:
        return `Your report for order ${order.id} is ready.\n\n${order.generatedContent ?? ''}`;

      case MessageKind.FAILURE:
        if (order.refundStatus === RefundStatus.SCHEDULED) {
          return `We could not complete order ${order.id}. A refund of ${order.money.format()} is on its way.`;
        }
        return `Order ${order.id} could not be completed: ${order.failureReason ?? 'payment failed'}`;

      case MessageKind.REFUND_DONE:
        return `Your refund of ${order.money.format()} for order ${order.id} has been issued.`;
    }
  }
}
