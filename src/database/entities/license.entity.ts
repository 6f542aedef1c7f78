import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  Index,
} from 'typeorm';
import { LicenseRecord } from '../stores/license-store.interface';

@Entity('licenses')
@Index(['license_key'], { unique: true })
@Index(['is_active'])
export class License implements LicenseRecord {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 200 })
  license_key!: string;

  @Column({ type: 'varchar', length: 300 })
  customer_name!: string;

  @Column({ type: 'varchar', length: 320, nullable: true })
  customer_email!: string | null;

  @Column({ type: 'integer', default: 1 })
  max_activations!: number;

  @Column()
  creation_date!: Date;

  // Fixed at creation; nothing updates it afterwards
  @Column({ update: false })
  expiration_date!: Date;

  @Column({ type: 'boolean', default: true })
  is_active!: boolean;
}
