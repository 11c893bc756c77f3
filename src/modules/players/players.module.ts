import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { RatingHistoryEntry } from '../ratings/rating-history-entry.entity';
import { SeasonSnapshot } from '../ratings/season-snapshot.entity';
import { Season } from '../seasons/season.entity';
import { Player } from './player.entity';
import { PlayersController } from './players.controller';
import { PlayersService } from './players.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([Player, RatingHistoryEntry, SeasonSnapshot, Season]),
  ],
  controllers: [PlayersController],
  providers: [PlayersService],
  exports: [PlayersService],
})
export class PlayersModule {}
