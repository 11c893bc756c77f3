import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryColumn } from 'typeorm';
import { Match } from '../matches/match.entity';
import { Player } from '../players/player.entity';

/**
 * Rating of one participant right after one match. Fully derived from the
 * match log: no generated columns, so a regeneration is identical row for
 * row.
 */
@Entity('rating_history')
@Index(['playerId', 'matchDate', 'matchSequence'])
export class RatingHistoryEntry {
  @PrimaryColumn({ type: 'uuid' })
  matchId!: string;

  @PrimaryColumn({ type: 'uuid' })
  playerId!: string;

  @ManyToOne(() => Match, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'matchId' })
  match!: Match;

  @ManyToOne(() => Player, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'playerId' })
  player!: Player;

  @Column({ type: 'uuid' })
  seasonId!: string;

  @Column({ type: 'date' })
  matchDate!: string;

  @Column({ type: 'int' })
  matchSequence!: number;

  @Column({ type: 'int' })
  rating!: number;
}
