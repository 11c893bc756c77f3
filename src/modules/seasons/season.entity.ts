import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';

@Entity('seasons')
@Index(['startDate'])
@Index('UQ_seasons_single_active', ['active'], {
  unique: true,
  where: '"active" = true',
})
export class Season {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 120 })
  name!: string;

  @Column({ type: 'date' })
  startDate!: string;

  // null = open-ended
  @Column({ type: 'date', nullable: true })
  endDate!: string | null;

  // at most one row is active; only SeasonsService.runSeasonTransition flips it
  @Column({ type: 'boolean', default: false })
  active!: boolean;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
