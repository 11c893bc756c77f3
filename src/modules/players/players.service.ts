import {
  ConflictException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';

import { RatingHistoryEntry } from '../ratings/rating-history-entry.entity';
import { DEFAULT_COUNTERS } from '../ratings/rating-counters';
import { SeasonSnapshot } from '../ratings/season-snapshot.entity';
import { Season } from '../seasons/season.entity';
import { CreatePlayerDto } from './dto/create-player.dto';
import { Player } from './player.entity';

const PLAYER_NAME_UNIQUE_VIOLATION = '23505';

@Injectable()
export class PlayersService {
  constructor(
    @InjectRepository(Player)
    private readonly playerRepo: Repository<Player>,
    @InjectRepository(RatingHistoryEntry)
    private readonly historyRepo: Repository<RatingHistoryEntry>,
    @InjectRepository(SeasonSnapshot)
    private readonly snapshotRepo: Repository<SeasonSnapshot>,
    @InjectRepository(Season)
    private readonly seasonRepo: Repository<Season>,
  ) {}

  async createPlayer(dto: CreatePlayerDto) {
    const name = dto.name.trim();

    const existing = await this.playerRepo.findOne({ where: { name } });
    if (existing) throw this.duplicateName(name);

    try {
      const saved = await this.playerRepo.save(
        this.playerRepo.create({ name, ...DEFAULT_COUNTERS }),
      );
      return this.toView(saved);
    } catch (err: unknown) {
      // lost a race against a concurrent create with the same name
      const code =
        err && typeof err === 'object' && 'code' in err
          ? String(err.code)
          : null;
      if (code === PLAYER_NAME_UNIQUE_VIOLATION) throw this.duplicateName(name);
      throw err;
    }
  }

  async getPlayer(id: string) {
    return this.toView(await this.findOrThrow(id));
  }

  async ranking(limit = 50) {
    const n = Math.max(1, Math.min(200, limit));

    const rows = await this.playerRepo.find({
      order: { rating: 'DESC', name: 'ASC' },
      take: n,
    });

    return rows.map((p, i) => ({ position: i + 1, ...this.toView(p) }));
  }

  async ratingHistory(playerId: string, limit = 50) {
    await this.findOrThrow(playerId);
    const n = Math.max(1, Math.min(200, limit));

    const rows = await this.historyRepo.find({
      where: { playerId },
      order: { matchDate: 'DESC', matchSequence: 'DESC' },
      take: n,
    });

    return rows.map((h) => ({
      matchId: h.matchId,
      seasonId: h.seasonId,
      date: h.matchDate,
      rating: h.rating,
    }));
  }

  async seasonSnapshots(playerId: string) {
    await this.findOrThrow(playerId);

    const snapshots = await this.snapshotRepo.find({ where: { playerId } });
    if (snapshots.length === 0) return [];

    const seasons = await this.seasonRepo.find({
      where: { id: In(snapshots.map((s) => s.seasonId)) },
    });
    const byId = new Map(seasons.map((s) => [s.id, s]));

    return snapshots
      .flatMap((snap) => {
        const season = byId.get(snap.seasonId);
        if (!season) return [];
        return [
          {
            seasonId: season.id,
            seasonName: season.name,
            startDate: season.startDate,
            endDate: season.endDate,
            rating: snap.rating,
            winCount: snap.winCount,
            lossCount: snap.lossCount,
          },
        ];
      })
      .sort((a, b) => a.startDate.localeCompare(b.startDate));
  }

  private async findOrThrow(id: string) {
    const player = await this.playerRepo.findOne({ where: { id } });
    if (!player) throw new NotFoundException('Player not found');
    return player;
  }

  private duplicateName(name: string) {
    return new ConflictException({
      statusCode: 409,
      code: 'PLAYER_NAME_TAKEN',
      message: `A player named "${name}" already exists`,
    });
  }

  private toView(p: Player) {
    return {
      id: p.id,
      name: p.name,
      rating: p.rating,
      winCount: p.winCount,
      lossCount: p.lossCount,
      bonusGivenCount: p.bonusGivenCount,
      bonusTakenCount: p.bonusTakenCount,
      createdAt: p.createdAt,
      updatedAt: p.updatedAt,
    };
  }
}
