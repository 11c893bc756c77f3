import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';

import configuration from './config/configuration';
import { DatabaseModule } from './database/database.module';
import { MatchesModule } from './modules/matches/matches.module';
import { PlayersModule } from './modules/players/players.module';
import { RatingsModule } from './modules/ratings/ratings.module';
import { SeasonsModule } from './modules/seasons/seasons.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [configuration] }),
    ScheduleModule.forRoot(),
    DatabaseModule,

    PlayersModule,
    SeasonsModule,
    MatchesModule,
    RatingsModule,
  ],
})
export class AppModule {}
