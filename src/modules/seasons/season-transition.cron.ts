import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { getErrorMessage } from '../../common/error-message';
import { SeasonsService } from './seasons.service';

export const SEASON_TRANSITION_JOB = 'season-transition';

@Injectable()
export class SeasonTransitionCron {
  private readonly logger = new Logger(SeasonTransitionCron.name);

  constructor(
    private readonly seasons: SeasonsService,
    private readonly configService: ConfigService,
  ) {}

  // hourly: the host zone can differ from ladder.timezone
  @Cron(CronExpression.EVERY_HOUR, { name: SEASON_TRANSITION_JOB })
  async handle() {
    const isEnabled = this.configService.get<boolean>('ladder.enableCrons');
    if (isEnabled === false) return;

    try {
      const res = await this.seasons.runSeasonTransition();
      if (res.expiredSeasonIds.length > 0 || res.activatedSeasonId) {
        this.logger.log(
          `Season transition: today=${res.today} expired=${res.expiredSeasonIds.length} activated=${res.activatedSeasonId ?? 'none'}`,
        );
      }
    } catch (e: unknown) {
      this.logger.error(`Season transition failed: ${getErrorMessage(e)}`);
    }
  }
}
