import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  Index,
  ManyToOne,
  JoinColumn,
} from 'typeorm';
import { License } from './license.entity';
import { ActivationRecord } from '../stores/license-store.interface';

@Entity('license_activations')
@Index(['license_id'])
@Index(['hardware_fingerprint'])
export class Activation implements ActivationRecord {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer' })
  license_id!: number;

  @ManyToOne(() => License, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'license_id' })
  license?: License;

  @Column({ type: 'varchar', length: 100 })
  hardware_fingerprint!: string;

  @Column({ type: 'varchar', length: 100, default: '' })
  machine_name!: string;

  @Column()
  first_activated!: Date;

  @Column()
  last_seen!: Date;

  @Column({ type: 'varchar', length: 50, default: '' })
  product_version!: string;
}
