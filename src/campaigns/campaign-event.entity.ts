import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { Customer } from '../customers/customer.entity';
import { Campaign } from './campaign.entity';
import type { CampaignChannel } from './campaign.entity';

export type CampaignEventStatus = 'pending' | 'sent' | 'failed';

/** One message of a campaign to one customer on one channel */
@Entity('campaign_events')
@Index(['campaignId', 'customerId'])
export class CampaignEvent {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column()
  campaignId!: number;

  @ManyToOne(() => Campaign, (campaign) => campaign.events, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'campaignId' })
  campaign?: Campaign;

  @Column()
  customerId!: number;

  @ManyToOne(() => Customer, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'customerId' })
  customer?: Customer;

  @Column({ type: 'varchar', length: 10 })
  channel!: CampaignChannel;

  @Column({ type: 'varchar', length: 10, default: 'pending' })
  status!: CampaignEventStatus;

  @Column({ nullable: true })
  sentAt?: Date;

  @Column({ default: false })
  responseReceived!: boolean;

  @Column({ type: 'varchar', length: 36, nullable: true })
  dispatchId!: string | null;

  @CreateDateColumn()
  createdAt!: Date;
}
