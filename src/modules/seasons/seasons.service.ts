import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import {
  DataSource,
  EntityManager,
  IsNull,
  LessThan,
  LessThanOrEqual,
  MoreThanOrEqual,
  Repository,
} from 'typeorm';

import { ladderToday } from '../../common/ladder-clock';
import { SeasonConfigurationException } from '../../common/ladder-exceptions';
import { acquireLadderLock } from '../../common/ladder-lock';
import { Player } from '../players/player.entity';
import { DEFAULT_COUNTERS } from '../ratings/rating-counters';
import { CreateSeasonDto } from './dto/create-season.dto';
import { Season } from './season.entity';

export type SeasonTransitionResult = {
  today: string;
  expiredSeasonIds: string[];
  activatedSeasonId: string | null;
  playersReset: number;
};

export type SeasonStatus = 'pending' | 'active' | 'expired';

@Injectable()
export class SeasonsService {
  private readonly logger = new Logger(SeasonsService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly config: ConfigService,
    @InjectRepository(Season)
    private readonly seasonRepo: Repository<Season>,
  ) {}

  async createSeason(dto: CreateSeasonDto) {
    const endDate = dto.endDate ?? null;
    if (endDate !== null && endDate < dto.startDate) {
      throw new BadRequestException({
        statusCode: 400,
        code: 'SEASON_INVALID_WINDOW',
        message: 'endDate must not be before startDate',
      });
    }

    const saved = await this.seasonRepo.save(
      this.seasonRepo.create({
        name: dto.name.trim(),
        startDate: dto.startDate,
        endDate,
        active: false,
      }),
    );

    return this.toView(saved, this.today());
  }

  async listSeasons() {
    const today = this.today();
    const rows = await this.seasonRepo.find({ order: { startDate: 'ASC' } });
    return rows.map((s) => this.toView(s, today));
  }

  async getActiveSeason() {
    const season = await this.seasonRepo.findOne({ where: { active: true } });
    if (!season) throw new NotFoundException('No active season');
    return this.toView(season, this.today());
  }

  /**
   * Daily season bookkeeping, safe to run any number of times:
   *  1. active seasons whose endDate has passed are deactivated (committed
   *     on its own, so a later configuration error does not undo it);
   *  2. the single season whose window contains today is activated if it is
   *     not active yet, and every player's counters are reset with it.
   *
   * No covering season is a gap between seasons and activates nothing.
   * Several covering seasons is a configuration error and is thrown, never
   * resolved by picking one.
   */
  async runSeasonTransition(): Promise<SeasonTransitionResult> {
    const today = this.today();

    const expiredSeasonIds = await this.dataSource.transaction((manager) =>
      this.expireSeasonsTx(manager, today),
    );

    if (expiredSeasonIds.length > 0) {
      this.logger.log(
        `seasons expired: today=${today} ids=${expiredSeasonIds.join(',')}`,
      );
    }

    const activation = await this.dataSource.transaction((manager) =>
      this.activateSeasonTx(manager, today),
    );

    if (activation.activatedSeasonId) {
      this.logger.log(
        `season activated: today=${today} id=${activation.activatedSeasonId} playersReset=${activation.playersReset}`,
      );
    }

    return { today, expiredSeasonIds, ...activation };
  }

  private async expireSeasonsTx(manager: EntityManager, today: string) {
    await acquireLadderLock(manager);
    const repo = manager.getRepository(Season);

    const expired = await repo.find({
      where: { active: true, endDate: LessThan(today) },
    });
    if (expired.length === 0) return [];

    for (const season of expired) season.active = false;
    await repo.save(expired);

    return expired.map((s) => s.id);
  }

  private async activateSeasonTx(manager: EntityManager, today: string) {
    await acquireLadderLock(manager);
    const repo = manager.getRepository(Season);

    const covering = await repo.find({
      where: [
        { startDate: LessThanOrEqual(today), endDate: IsNull() },
        { startDate: LessThanOrEqual(today), endDate: MoreThanOrEqual(today) },
      ],
      order: { startDate: 'ASC' },
    });

    // between two seasons: nothing to activate
    if (covering.length === 0) {
      return { activatedSeasonId: null, playersReset: 0 };
    }
    if (covering.length > 1) {
      throw new SeasonConfigurationException(
        `${covering.length} seasons cover ${today}: ${covering.map((s) => s.id).join(', ')}`,
      );
    }

    const season = covering[0];
    if (season.active) {
      return { activatedSeasonId: null, playersReset: 0 };
    }

    // deactivate first: the single-active unique index is checked per row
    const stillActive = await repo.find({ where: { active: true } });
    if (stillActive.length > 0) {
      for (const other of stillActive) other.active = false;
      await repo.save(stillActive);
    }
    season.active = true;
    await repo.save(season);

    const reset = await manager
      .getRepository(Player)
      .createQueryBuilder()
      .update()
      .set({ ...DEFAULT_COUNTERS })
      .execute();

    return { activatedSeasonId: season.id, playersReset: reset.affected ?? 0 };
  }

  private statusOf(season: Season, today: string): SeasonStatus {
    if (season.active) return 'active';
    if (season.endDate !== null && season.endDate < today) return 'expired';
    return 'pending';
  }

  private toView(s: Season, today: string) {
    return {
      id: s.id,
      name: s.name,
      startDate: s.startDate,
      endDate: s.endDate,
      active: s.active,
      status: this.statusOf(s, today),
      createdAt: s.createdAt,
    };
  }

  private today() {
    return ladderToday(this.config.get<string>('ladder.timezone') ?? 'UTC');
  }
}
