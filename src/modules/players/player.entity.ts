import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { DEFAULT_RATING } from '../ratings/ratings.constants';
import { RatingCounters } from '../ratings/rating-counters';

/**
 * A ladder player. The counters describe the current season cycle only and
 * are reset in bulk whenever a new season becomes active.
 */
@Entity('players')
export class Player implements RatingCounters {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index({ unique: true })
  @Column({ type: 'varchar', length: 80 })
  name!: string;

  @Column({ type: 'int', default: DEFAULT_RATING })
  rating!: number;

  @Column({ type: 'int', default: 0 })
  winCount!: number;

  @Column({ type: 'int', default: 0 })
  lossCount!: number;

  // shutouts dealt
  @Column({ type: 'int', default: 0 })
  bonusGivenCount!: number;

  // shutouts suffered
  @Column({ type: 'int', default: 0 })
  bonusTakenCount!: number;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;
}
