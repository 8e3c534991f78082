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
import type { Sentiment } from './sentiment.analyzer';

@Entity('feedback')
export class Feedback {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column()
  customerId!: number;

  @ManyToOne(() => Customer, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'customerId' })
  customer?: Customer;

  @Column({ type: 'text' })
  feedbackText!: string;

  @Column({ type: 'varchar', length: 10 })
  sentiment!: Sentiment;

  @Column({ type: 'double precision' })
  sentimentScore!: number;

  @Column({ type: 'varchar', length: 50, default: 'manual' })
  source!: string;

  @CreateDateColumn()
  createdAt!: Date;
}
