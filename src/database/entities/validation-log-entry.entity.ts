import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  Index,
} from 'typeorm';
import { ValidationLogRecord } from '../stores/license-store.interface';

/**
 * Append-only audit trail of validation attempts. No other table references it.
 */
@Entity('license_validation_logs')
@Index(['validation_date'])
@Index(['license_key'])
export class ValidationLogEntry implements ValidationLogRecord {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer', nullable: true })
  license_id!: number | null; // set only when the submitted key resolved

  @Column({ type: 'varchar', length: 200 })
  license_key!: string;

  @Column({ type: 'varchar', length: 100, default: '' })
  hardware_fingerprint!: string;

  @Column()
  validation_date!: Date;

  @Column({ type: 'boolean' })
  is_successful!: boolean;

  @Column({ type: 'varchar', length: 500, default: '' })
  error_message!: string;

  @Column({ type: 'varchar', length: 50, default: '' })
  ip_address!: string;
}
