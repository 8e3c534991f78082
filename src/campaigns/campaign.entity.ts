import {
  Column,
  CreateDateColumn,
  Entity,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { CampaignEvent } from './campaign-event.entity';

export const CAMPAIGN_SEGMENTS = ['high_risk', 'medium_risk'] as const;
export const CAMPAIGN_CHANNELS = ['email', 'sms', 'push'] as const;
export const CAMPAIGN_STATUSES = ['draft', 'active', 'completed'] as const;

export type CampaignSegment = (typeof CAMPAIGN_SEGMENTS)[number];
export type CampaignChannel = (typeof CAMPAIGN_CHANNELS)[number];
export type CampaignStatus = (typeof CAMPAIGN_STATUSES)[number];

@Entity('campaigns')
export class Campaign {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column()
  name!: string;

  @Column({ type: 'varchar', length: 20, default: 'high_risk' })
  targetSegment!: CampaignSegment;

  @Column({ type: 'simple-json' })
  channels!: CampaignChannel[];

  @Column({ type: 'text', default: '' })
  messageTemplate!: string;

  @Column({ type: 'varchar', length: 20, default: 'draft' })
  status!: CampaignStatus;

  @OneToMany(() => CampaignEvent, (event) => event.campaign)
  events?: CampaignEvent[];

  @CreateDateColumn()
  createdAt!: Date;
}
