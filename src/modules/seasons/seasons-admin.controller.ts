import { Controller, HttpCode, Post } from '@nestjs/common';
import { SeasonsService } from './seasons.service';

@Controller('admin/seasons')
export class SeasonsAdminController {
  constructor(private readonly seasons: SeasonsService) {}

  @Post('transition')
  @HttpCode(200)
  transition() {
    return this.seasons.runSeasonTransition();
  }
}
