import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { RatingHistoryEntry } from './rating-history-entry.entity';
import { RatingReplaysService } from './rating-replays.service';
import { ReplaysAdminController } from './replays-admin.controller';
import { SeasonSnapshot } from './season-snapshot.entity';

@Module({
  imports: [TypeOrmModule.forFeature([RatingHistoryEntry, SeasonSnapshot])],
  controllers: [ReplaysAdminController],
  providers: [RatingReplaysService],
  exports: [RatingReplaysService],
})
export class RatingsModule {}
