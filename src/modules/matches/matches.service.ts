import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import {
  Between,
  DataSource,
  EntityManager,
  FindOptionsWhere,
  LessThanOrEqual,
  MoreThanOrEqual,
  Repository,
} from 'typeorm';

import { ladderToday } from '../../common/ladder-clock';
import { acquireLadderLock } from '../../common/ladder-lock';
import { Player } from '../players/player.entity';
import { RatingHistoryEntry } from '../ratings/rating-history-entry.entity';
import { applyMatchResult } from '../ratings/rating-counters';
import { Season } from '../seasons/season.entity';
import { ListMatchesQueryDto } from './dto/list-matches-query.dto';
import { RecordMatchDto } from './dto/record-match.dto';
import { Match } from './match.entity';

@Injectable()
export class MatchesService {
  private readonly logger = new Logger(MatchesService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly config: ConfigService,
    @InjectRepository(Match)
    private readonly matchRepo: Repository<Match>,
  ) {}

  /**
   * Live path: appends the match, updates both players' counters and
   * writes their rating history, all in one transaction.
   */
  async recordMatch(dto: RecordMatchDto) {
    if (dto.winnerId === dto.loserId) {
      throw new BadRequestException({
        statusCode: 400,
        code: 'MATCH_SAME_PLAYER',
        message: 'Winner and loser must be different players',
      });
    }

    const result = await this.dataSource.transaction((manager) =>
      this.recordMatchTx(manager, dto),
    );

    this.logger.log(
      `match recorded: id=${result.id} seq=${result.sequence} season=${result.seasonId} winner=${result.winnerId}->${result.winnerRating} loser=${result.loserId}->${result.loserRating}`,
    );

    return result;
  }

  async recordMatchTx(manager: EntityManager, dto: RecordMatchDto) {
    await acquireLadderLock(manager);

    const matchRepo = manager.getRepository(Match);
    const playerRepo = manager.getRepository(Player);
    const historyRepo = manager.getRepository(RatingHistoryEntry);

    const season = await manager
      .getRepository(Season)
      .findOne({ where: { active: true } });
    if (!season) {
      throw new ConflictException({
        statusCode: 409,
        code: 'NO_ACTIVE_SEASON',
        message: 'Matches can only be recorded while a season is active',
      });
    }

    const date = dto.date ?? this.today();
    if (
      date < season.startDate ||
      (season.endDate !== null && date > season.endDate)
    ) {
      throw new BadRequestException({
        statusCode: 400,
        code: 'MATCH_OUTSIDE_SEASON',
        message: `Match date ${date} is outside the active season`,
      });
    }

    // the log must stay append-only in (date, sequence) order, otherwise a
    // replay would apply matches in a different order than the live path did
    const [latest] = await matchRepo.find({
      order: { date: 'DESC', sequence: 'DESC' },
      take: 1,
    });
    if (latest && date < latest.date) {
      throw new BadRequestException({
        statusCode: 400,
        code: 'MATCH_OUT_OF_ORDER',
        message: `Match date ${date} is before the latest recorded match (${latest.date})`,
      });
    }

    const winner = await playerRepo.findOne({ where: { id: dto.winnerId } });
    if (!winner) throw new NotFoundException('Winner not found');
    const loser = await playerRepo.findOne({ where: { id: dto.loserId } });
    if (!loser) throw new NotFoundException('Loser not found');

    const shutout = dto.shutout ?? false;
    const match = await matchRepo.save(
      matchRepo.create({
        winnerId: winner.id,
        loserId: loser.id,
        seasonId: season.id,
        date,
        shutout,
      }),
    );

    const { winnerRating, loserRating } = applyMatchResult(
      winner,
      loser,
      shutout,
    );
    await playerRepo.save([winner, loser]);

    await historyRepo.insert([
      historyRepo.create({
        matchId: match.id,
        playerId: winner.id,
        seasonId: season.id,
        matchDate: match.date,
        matchSequence: match.sequence,
        rating: winnerRating,
      }),
      historyRepo.create({
        matchId: match.id,
        playerId: loser.id,
        seasonId: season.id,
        matchDate: match.date,
        matchSequence: match.sequence,
        rating: loserRating,
      }),
    ]);

    return {
      ...this.toView(match),
      winnerRating,
      loserRating,
    };
  }

  async listMatches(q: ListMatchesQueryDto) {
    const where: FindOptionsWhere<Match> = {};
    if (q.seasonId) where.seasonId = q.seasonId;

    if (q.from && q.to) where.date = Between(q.from, q.to);
    else if (q.from) where.date = MoreThanOrEqual(q.from);
    else if (q.to) where.date = LessThanOrEqual(q.to);

    const rows = await this.matchRepo.find({
      where,
      order: { date: 'ASC', sequence: 'ASC' },
      take: Math.max(1, Math.min(500, q.limit ?? 100)),
    });

    return rows.map((m) => this.toView(m));
  }

  private toView(m: Match) {
    return {
      id: m.id,
      sequence: m.sequence,
      date: m.date,
      seasonId: m.seasonId,
      winnerId: m.winnerId,
      loserId: m.loserId,
      shutout: m.shutout,
      createdAt: m.createdAt,
    };
  }

  private today() {
    return ladderToday(this.config.get<string>('ladder.timezone') ?? 'UTC');
  }
}
