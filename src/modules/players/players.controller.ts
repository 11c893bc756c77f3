import { Body, Controller, Get, Param, Post, Query } from '@nestjs/common';
import { ParseRequiredUuidPipe } from '../../common/pipes/parse-required-uuid.pipe';
import { CreatePlayerDto } from './dto/create-player.dto';
import { LimitQueryDto } from './dto/limit-query.dto';
import { PlayersService } from './players.service';

@Controller('players')
export class PlayersController {
  constructor(private readonly players: PlayersService) {}

  @Post()
  create(@Body() dto: CreatePlayerDto) {
    return this.players.createPlayer(dto);
  }

  @Get('ranking')
  ranking(@Query() q: LimitQueryDto) {
    return this.players.ranking(q.limit ?? 50);
  }

  @Get(':id')
  get(@Param('id', new ParseRequiredUuidPipe('id')) id: string) {
    return this.players.getPlayer(id);
  }

  @Get(':id/rating-history')
  ratingHistory(
    @Param('id', new ParseRequiredUuidPipe('id')) id: string,
    @Query() q: LimitQueryDto,
  ) {
    return this.players.ratingHistory(id, q.limit ?? 50);
  }

  @Get(':id/seasons')
  seasons(@Param('id', new ParseRequiredUuidPipe('id')) id: string) {
    return this.players.seasonSnapshots(id);
  }
}
