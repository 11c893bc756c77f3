import { Body, Controller, Get, Post, Query } from '@nestjs/common';
import { ListMatchesQueryDto } from './dto/list-matches-query.dto';
import { RecordMatchDto } from './dto/record-match.dto';
import { MatchesService } from './matches.service';

@Controller('matches')
export class MatchesController {
  constructor(private readonly matches: MatchesService) {}

  @Post()
  record(@Body() dto: RecordMatchDto) {
    return this.matches.recordMatch(dto);
  }

  @Get()
  list(@Query() q: ListMatchesQueryDto) {
    return this.matches.listMatches(q);
  }
}
