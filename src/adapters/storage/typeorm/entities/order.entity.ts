import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
  Index,
  VersionColumn,
} from 'typeorm';
import { DeliveryStatus, OrderStatus, RefundStatus } from '../../../../core/domain/enums';
import { AuditLogEntity } from './audit-log.entity';

/**
 * TypeORM entity for Order
 */
@Entity('orders')
@Index(['status'])
@Index(['userId'])
@Index(['affiliateCode'])
@Index(['createdAt'])
export class OrderEntity {
  @PrimaryColumn({ type: 'varchar', length: 64 })
  id!: string;

  @Column({ name: 'user_id', type: 'varchar' })
  userId!: string;

  @Column({ name: 'product_kind', type: 'varchar' })
  productKind!: string;

  @Column({ type: 'simple-json' })
  input!: object;

  @Column({
    type: 'simple-enum',
    enum: OrderStatus,
    default: OrderStatus.PENDING_PAYMENT,
  })
  status!: OrderStatus;

  @Column({ type: 'bigint' })
  amount!: number;

  @Column({ type: 'varchar', length: 3 })
  currency!: string;

  @Column({ name: 'requires_enrichment', type: 'boolean', default: false })
  requiresEnrichment!: boolean;

  @Column({ name: 'affiliate_code', type: 'varchar', nullable: true })
  affiliateCode!: string | null;

  @Column({ name: 'payment_reference', type: 'varchar', nullable: true })
  paymentReference!: string | null;

  @Column({ name: 'enrichment_data', type: 'simple-json', nullable: true })
  enrichmentData!: object | null;

  @Column({ name: 'generated_content', type: 'text', nullable: true })
  generatedContent!: string | null;

  @Column({ name: 'last_processed_event_id', type: 'varchar', nullable: true })
  lastProcessedEventId!: string | null;

  @Column({
    name: 'refund_status',
    type: 'simple-enum',
    enum: RefundStatus,
    default: RefundStatus.NOT_REQUIRED,
  })
  refundStatus!: RefundStatus;

  @Column({ name: 'refund_reference', type: 'varchar', nullable: true })
  refundReference!: string | null;

  @Column({
    name: 'delivery_status',
    type: 'simple-enum',
    enum: DeliveryStatus,
    default: DeliveryStatus.PENDING,
  })
  deliveryStatus!: DeliveryStatus;

  @Column({ name: 'failure_reason', type: 'text', nullable: true })
  failureReason!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;

  @VersionColumn({ name: 'version' })
  version!: number;

  // Relations
  @OneToMany(() => AuditLogEntity, (audit) => audit.order)
  auditLogs!: AuditLogEntity[];
}
