import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource, EntityManager } from 'typeorm';

import { getErrorMessage } from '../../common/error-message';
import { ReplayIntegrityException } from '../../common/ladder-exceptions';
import { acquireLadderLock } from '../../common/ladder-lock';
import { Match } from '../matches/match.entity';
import { Season } from '../seasons/season.entity';
import { LoggedMatch, TrackedPlayer, scanMatchLog } from './match-log-scanner';
import { RatingHistoryEntry } from './rating-history-entry.entity';
import { SeasonSnapshot } from './season-snapshot.entity';

export type ReplayReport = {
  matchesProcessed: number;
  playersTouched: number;
  rowsWritten: number;
};

const DEFAULT_BATCH_SIZE = 500;

/**
 * Rebuilds the derived tables (rating history, season snapshots) from the
 * match log. Each replay clears and rewrites its table inside one
 * transaction under the ladder lock, so readers see either the old rows or
 * the complete new set.
 */
@Injectable()
export class RatingReplaysService {
  private readonly logger = new Logger(RatingReplaysService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly config: ConfigService,
  ) {}

  async replayRatingHistory(): Promise<ReplayReport> {
    return this.runReplay('rating history', async (manager) => {
      const matches = await this.loadMatchLog(manager);
      const repo = manager.getRepository(RatingHistoryEntry);
      const players = new Set<string>();
      const rows: RatingHistoryEntry[] = [];

      for (const { match, winner, loser } of scanMatchLog(matches)) {
        for (const state of [winner, loser]) {
          players.add(state.playerId);
          rows.push(
            repo.create({
              matchId: match.id,
              playerId: state.playerId,
              seasonId: match.seasonId,
              matchDate: match.date,
              matchSequence: match.sequence,
              rating: state.rating,
            }),
          );
        }
      }

      await repo.clear();
      await this.insertInBatches(rows, (chunk) => repo.insert(chunk));

      return {
        matchesProcessed: matches.length,
        playersTouched: players.size,
        rowsWritten: rows.length,
      };
    });
  }

  async replaySeasonSnapshots(): Promise<ReplayReport> {
    return this.runReplay('season snapshots', async (manager) => {
      const matches = await this.loadMatchLog(manager);
      const repo = manager.getRepository(SeasonSnapshot);
      const players = new Set<string>();

      // keyed by season + player; later matches overwrite earlier state
      const latest = new Map<string, TrackedPlayer>();
      for (const { winner, loser } of scanMatchLog(matches)) {
        for (const state of [winner, loser]) {
          players.add(state.playerId);
          latest.set(`${state.seasonId}:${state.playerId}`, state);
        }
      }

      const rows = [...latest.values()].map((state) =>
        repo.create({
          seasonId: state.seasonId,
          playerId: state.playerId,
          rating: state.rating,
          winCount: state.winCount,
          lossCount: state.lossCount,
        }),
      );

      await repo.clear();
      await this.insertInBatches(rows, (chunk) => repo.insert(chunk));

      return {
        matchesProcessed: matches.length,
        playersTouched: players.size,
        rowsWritten: rows.length,
      };
    });
  }

  private async runReplay(
    label: string,
    work: (manager: EntityManager) => Promise<ReplayReport>,
  ): Promise<ReplayReport> {
    const startedAt = Date.now();

    try {
      const report = await this.dataSource.transaction(async (manager) => {
        await acquireLadderLock(manager);
        return work(manager);
      });

      this.logger.log(
        `${label} replayed: matches=${report.matchesProcessed} players=${report.playersTouched} rows=${report.rowsWritten} tookMs=${Date.now() - startedAt}`,
      );
      return report;
    } catch (err: unknown) {
      this.logger.error(
        `${label} replay failed, derived rows left untouched: ${getErrorMessage(err)}`,
      );
      throw err;
    }
  }

  /**
   * Full match log in chronological order. Any record the scan could not
   * interpret aborts the replay. Player ids are covered by the foreign keys;
   * the players table is never read here.
   */
  private async loadMatchLog(manager: EntityManager): Promise<LoggedMatch[]> {
    const matches = await manager.getRepository(Match).find({
      order: { date: 'ASC', sequence: 'ASC' },
    });
    const seasons = await manager
      .getRepository(Season)
      .find({ select: { id: true } });

    const seasonIds = new Set(seasons.map((s) => s.id));

    for (const m of matches) {
      if (!seasonIds.has(m.seasonId)) {
        throw new ReplayIntegrityException(
          `Match ${m.id} references unknown season ${m.seasonId}`,
        );
      }
      if (m.winnerId === m.loserId) {
        throw new ReplayIntegrityException(
          `Match ${m.id} has the same player on both sides`,
        );
      }
    }

    return matches;
  }

  private async insertInBatches<T>(
    rows: T[],
    insert: (chunk: T[]) => Promise<unknown>,
  ) {
    const batchSize =
      this.config.get<number>('ladder.replayBatchSize') ?? DEFAULT_BATCH_SIZE;

    for (let i = 0; i < rows.length; i += batchSize) {
      await insert(rows.slice(i, i + batchSize));
    }
  }
}
