import { Body, Controller, Get, Post } from '@nestjs/common';
import { CreateSeasonDto } from './dto/create-season.dto';
import { SeasonsService } from './seasons.service';

@Controller('seasons')
export class SeasonsController {
  constructor(private readonly seasons: SeasonsService) {}

  @Post()
  create(@Body() dto: CreateSeasonDto) {
    return this.seasons.createSeason(dto);
  }

  @Get()
  list() {
    return this.seasons.listSeasons();
  }

  @Get('active')
  active() {
    return this.seasons.getActiveSeason();
  }
}
