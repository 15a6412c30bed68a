import { AuditAction, OrderEvent, OrderStatus, TriggerType } from '../enums';
import { JsonObject } from './order.model';

/**
 * AuditLog domain model - append-only record of every order mutation,
 * written in the same store transaction as the change it describes
 */
export class AuditLog {
  constructor(
    public readonly id: string,
    public readonly orderId: string,
    public readonly action: AuditAction,
    public readonly stateBefore: OrderStatus | null,
    public readonly stateAfter: OrderStatus,
    public readonly triggerType: TriggerType,
    public readonly event: OrderEvent | null = null,
    public readonly performedBy: string = 'system',
    public readonly metadata: JsonObject = {},
    public readonly performedAt: Date = new Date(),
  ) {}

  isCreation(): boolean {
    return this.stateBefore === null;
  }

  isStatusChange(): boolean {
    return this.stateBefore !== null && this.stateBefore !== this.stateAfter;
  }

  isOperatorAction(): boolean {
    return this.triggerType === TriggerType.OPERATOR;
  }
}
