import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
} from 'typeorm';

/**
 * TypeORM entity for the affiliate commission ledger. Append-only.
 */
@Entity('affiliate_ledger')
@Index(['affiliateCode'])
export class AffiliateLedgerEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'affiliate_code', type: 'varchar' })
  affiliateCode!: string;

  @Column({ name: 'order_id', type: 'varchar', length: 64, unique: true })
  orderId!: string;

  @Column({ name: 'order_amount', type: 'bigint' })
  orderAmount!: number;

  @Column({ type: 'varchar', length: 3 })
  currency!: string;

  @Column({ name: 'commission_rate', type: 'double precision' })
  commissionRate!: number;

  @Column({ name: 'commission_amount', type: 'bigint' })
  commissionAmount!: number;

  @Column({ name: 'bonus_amount', type: 'bigint', default: 0 })
  bonusAmount!: number;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
