import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  OneToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { ChurnScore } from './churn-score.entity';

@Entity('customers')
export class Customer {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column()
  name!: string;

  @Index()
  @Column()
  email!: string;

  @Column({ type: 'varchar', nullable: true })
  phone!: string | null;

  // 'YYYY-MM-DD'
  @Column({ type: 'date', nullable: true })
  registrationDate!: string | null;

  @Index()
  @Column({ type: 'date', nullable: true })
  lastTransactionDate!: string | null;

  @Column({ type: 'integer', default: 0 })
  transactionCount!: number;

  @Column({ type: 'double precision', default: 0 })
  totalSpent!: number;

  @Column({ type: 'integer', default: 50 })
  engagementScore!: number;

  @Column({ type: 'integer', default: 0 })
  supportTickets!: number;

  @OneToOne(() => ChurnScore, (score) => score.customer)
  score?: ChurnScore | null;

  @CreateDateColumn()
  createdAt!: Date;
}
