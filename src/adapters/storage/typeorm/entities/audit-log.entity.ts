import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { AuditAction, OrderEvent, OrderStatus, TriggerType } from '../../../../core/domain/enums';
import { OrderEntity } from './order.entity';

/**
 * TypeORM entity for AuditLog
 */
@Entity('audit_logs')
@Index(['orderId'])
@Index(['action'])
@Index(['performedAt'])
export class AuditLogEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'order_id', type: 'varchar', length: 64 })
  orderId!: string;

  @Column({
    type: 'simple-enum',
    enum: AuditAction,
  })
  action!: AuditAction;

  @Column({
    name: 'state_before',
    type: 'simple-enum',
    enum: OrderStatus,
    nullable: true,
  })
  stateBefore!: OrderStatus | null;

  @Column({
    name: 'state_after',
    type: 'simple-enum',
    enum: OrderStatus,
  })
  stateAfter!: OrderStatus;

  @Column({
    name: 'trigger_type',
    type: 'simple-enum',
    enum: TriggerType,
  })
  triggerType!: TriggerType;

  @Column({
    type: 'simple-enum',
    enum: OrderEvent,
    nullable: true,
  })
  event!: OrderEvent | null;

  @Column({ name: 'performed_by', type: 'varchar' })
  performedBy!: string;

  @Column({ name: 'performed_at' })
  performedAt!: Date;

  @Column({ type: 'simple-json' })
  metadata!: object;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  // Relations
  @ManyToOne(() => OrderEntity, (order) => order.auditLogs)
  @JoinColumn({ name: 'order_id' })
  order!: OrderEntity;
}
