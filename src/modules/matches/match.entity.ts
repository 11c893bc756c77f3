import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { Player } from '../players/player.entity';
import { Season } from '../seasons/season.entity';

/**
 * Immutable match log record. Chronological order is (date, sequence):
 * sequence is assigned by the database on insert and breaks ties between
 * matches played on the same day.
 */
@Entity('matches')
@Index(['date', 'sequence'])
@Index(['seasonId', 'date'])
export class Match {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index({ unique: true })
  @Column({ type: 'int', generated: 'increment' })
  sequence!: number;

  @Index()
  @Column({ type: 'uuid' })
  winnerId!: string;

  @ManyToOne(() => Player, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'winnerId' })
  winner!: Player;

  @Index()
  @Column({ type: 'uuid' })
  loserId!: string;

  @ManyToOne(() => Player, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'loserId' })
  loser!: Player;

  @Column({ type: 'uuid' })
  seasonId!: string;

  @ManyToOne(() => Season, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'seasonId' })
  season!: Season;

  @Column({ type: 'date' })
  date!: string;

  // loser scored nothing; feeds the bonus counters, never the rating
  @Column({ type: 'boolean', default: false })
  shutout!: boolean;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
