import { Controller, HttpCode, Post } from '@nestjs/common';
import { RatingReplaysService } from './rating-replays.service';

@Controller('admin/replays')
export class ReplaysAdminController {
  constructor(private readonly replays: RatingReplaysService) {}

  @Post('rating-history')
  @HttpCode(200)
  ratingHistory() {
    return this.replays.replayRatingHistory();
  }

  @Post('season-snapshots')
  @HttpCode(200)
  seasonSnapshots() {
    return this.replays.replaySeasonSnapshots();
  }
}
