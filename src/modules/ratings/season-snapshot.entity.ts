import { Column, Entity, JoinColumn, ManyToOne, PrimaryColumn } from 'typeorm';
import { Player } from '../players/player.entity';
import { Season } from '../seasons/season.entity';

// final standing of a player in a season, as of their last match in it
@Entity('season_snapshots')
export class SeasonSnapshot {
  @PrimaryColumn({ type: 'uuid' })
  seasonId!: string;

  @PrimaryColumn({ type: 'uuid' })
  playerId!: string;

  @ManyToOne(() => Season, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'seasonId' })
  season!: Season;

  @ManyToOne(() => Player, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'playerId' })
  player!: Player;

  @Column({ type: 'int' })
  rating!: number;

  @Column({ type: 'int' })
  winCount!: number;

  @Column({ type: 'int' })
  lossCount!: number;
}
