import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { Player } from '../players/player.entity';
import { Season } from './season.entity';
import { SeasonTransitionCron } from './season-transition.cron';
import { SeasonsAdminController } from './seasons-admin.controller';
import { SeasonsController } from './seasons.controller';
import { SeasonsService } from './seasons.service';

@Module({
  imports: [TypeOrmModule.forFeature([Season, Player])],
  controllers: [SeasonsController, SeasonsAdminController],
  providers: [SeasonsService, SeasonTransitionCron],
  exports: [SeasonsService],
})
export class SeasonsModule {}
