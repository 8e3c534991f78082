import {
  Column,
  CreateDateColumn,
  Entity,
  JoinColumn,
  OneToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import type { FeatureVector } from '../churn/interfaces/churn.interface';
import { RiskLevel } from '../churn/interfaces/churn.interface';
import { Customer } from './customer.entity';

/**
 * Current churn score of a customer. The unique join column keeps a single
 * row per customer; rescoring replaces it.
 */
@Entity('churn_scores')
export class ChurnScore {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column()
  customerId!: number;

  @OneToOne(() => Customer, (customer) => customer.score, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'customerId' })
  customer?: Customer;

  @Column({ type: 'double precision' })
  churnProbability!: number;

  @Column({ type: 'varchar', length: 10 })
  riskLevel!: RiskLevel;

  @Column({ type: 'simple-json', nullable: true })
  features!: FeatureVector | null;

  @CreateDateColumn()
  scoredAt!: Date;
}
