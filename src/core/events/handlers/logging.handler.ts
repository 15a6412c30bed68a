import { Logger, LoggerService } from '@nestjs/common';
import { OrderEvent } from '../../domain/enums';
import { EventHandler, OrderLifecycleEvent } from '../../interfaces';

/**
 * Logs order lifecycle events
 */
export class LoggingEventHandler {
  constructor(
    private readonly logger: LoggerService = new Logger('OrderLifecycle'),
    private readonly logLevel: 'verbose' | 'normal' | 'minimal' = 'normal',
  ) {}

  getHandler(): EventHandler {
    return (eventType: OrderEvent, payload: OrderLifecycleEvent) => {
      this.logger.log(this.formatMessage(eventType, payload));
    };
  }

  formatMessage(eventType: OrderEvent, payload: OrderLifecycleEvent): string {
    const base = `${eventType} ${payload.order.id}`;
    switch (this.logLevel) {
      case 'minimal':
        return base;
      case 'verbose':
        return `${base}: ${payload.fromStatus} -> ${payload.toStatus} by ${payload.triggerType} ${JSON.stringify(
          payload.order.toAuditSnapshot(),
        )}`;
      case 'normal':
      default:
        return `${base}: ${payload.fromStatus} -> ${payload.toStatus} by ${payload.triggerType}`;
    }
  }
}
