import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import {
  BadRequestException,
  ConflictException,
  NotFoundException,
} from '@nestjs/common';
import { DataSource } from 'typeorm';
import { MatchesService } from './matches.service';
import { Match } from './match.entity';
import { Player } from '../players/player.entity';
import { RatingHistoryEntry } from '../ratings/rating-history-entry.entity';
import { RatingReplaysService } from '../ratings/rating-replays.service';
import { SeasonSnapshot } from '../ratings/season-snapshot.entity';
import { Season } from '../seasons/season.entity';
import { SeasonsService } from '../seasons/seasons.service';
import {
  InMemoryDataSource,
  createInMemoryDataSource,
} from '@/test-utils/in-memory-datasource';
import {
  freezeToday,
  ladderConfig,
  seedPlayer,
  seedSeason,
  unfreezeToday,
} from '@/test-utils/ladder-fixtures';

function responseCode(err: unknown) {
  if (!(err instanceof BadRequestException || err instanceof ConflictException)) {
    return null;
  }
  const body = err.getResponse();
  return typeof body === 'object' && 'code' in body ? body.code : null;
}

describe('MatchesService', () => {
  let service: MatchesService;
  let seasons: SeasonsService;
  let replays: RatingReplaysService;
  let ds: InMemoryDataSource;
  let alice: Player;
  let bob: Player;

  const player = (id: string) => ds.rows(Player).find((p) => p.id === id);

  async function rejection(promise: Promise<unknown>) {
    try {
      await promise;
    } catch (err: unknown) {
      return err;
    }
    throw new Error('expected a rejection');
  }

  beforeEach(async () => {
    ds = createInMemoryDataSource();
    freezeToday('2026-01-05');

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MatchesService,
        SeasonsService,
        RatingReplaysService,
        { provide: DataSource, useValue: ds },
        { provide: ConfigService, useValue: ladderConfig() },
        { provide: getRepositoryToken(Match), useValue: ds.getRepository(Match) },
        { provide: getRepositoryToken(Season), useValue: ds.getRepository(Season) },
      ],
    }).compile();

    service = module.get<MatchesService>(MatchesService);
    seasons = module.get<SeasonsService>(SeasonsService);
    replays = module.get<RatingReplaysService>(RatingReplaysService);

    alice = await seedPlayer(ds, 'alice');
    bob = await seedPlayer(ds, 'bob');
  });

  afterEach(() => {
    unfreezeToday();
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  // ── recordMatch ──────────────────────────────────────────────────

  describe('recordMatch', () => {
    let winter: Season;

    beforeEach(async () => {
      winter = await seedSeason(ds, {
        name: 'Winter',
        startDate: '2026-01-01',
        endDate: '2026-03-31',
        active: true,
      });
    });

    it('appends the match and updates both players', async () => {
      const result = await service.recordMatch({
        winnerId: alice.id,
        loserId: bob.id,
        date: '2026-01-05',
      });

      expect(result).toMatchObject({
        sequence: 1,
        date: '2026-01-05',
        seasonId: winter.id,
        winnerId: alice.id,
        loserId: bob.id,
        shutout: false,
        winnerRating: 1016,
        loserRating: 984,
      });
      expect(player(alice.id)).toMatchObject({
        rating: 1016,
        winCount: 1,
        lossCount: 0,
      });
      expect(player(bob.id)).toMatchObject({
        rating: 984,
        winCount: 0,
        lossCount: 1,
      });
    });

    it('writes a rating history entry per participant', async () => {
      const result = await service.recordMatch({
        winnerId: alice.id,
        loserId: bob.id,
      });

      const entries = ds
        .rows(RatingHistoryEntry)
        .map((e) => [e.matchId, e.playerId, e.matchDate, e.matchSequence, e.rating]);
      expect(entries).toEqual([
        [result.id, alice.id, '2026-01-05', 1, 1016],
        [result.id, bob.id, '2026-01-05', 1, 984],
      ]);
    });

    it('defaults the date to today', async () => {
      freezeToday('2026-02-14');

      const result = await service.recordMatch({
        winnerId: alice.id,
        loserId: bob.id,
      });

      expect(result.date).toBe('2026-02-14');
    });

    it('counts shutouts without touching the rating', async () => {
      const result = await service.recordMatch({
        winnerId: alice.id,
        loserId: bob.id,
        shutout: true,
      });

      expect(result.winnerRating).toBe(1016);
      expect(player(alice.id)?.bonusGivenCount).toBe(1);
      expect(player(bob.id)?.bonusTakenCount).toBe(1);
      expect(player(alice.id)?.bonusTakenCount).toBe(0);
    });

    it('assigns increasing sequences to same-day matches', async () => {
      const first = await service.recordMatch({
        winnerId: alice.id,
        loserId: bob.id,
      });
      const second = await service.recordMatch({
        winnerId: bob.id,
        loserId: alice.id,
      });

      expect([first.sequence, second.sequence]).toEqual([1, 2]);
      // bob at 984 beats alice at 1016
      expect(second.winnerRating).toBe(1001);
      expect(second.loserRating).toBe(999);
    });

    it('takes the ladder lock', async () => {
      await service.recordMatch({ winnerId: alice.id, loserId: bob.id });

      expect(ds.queries.map((q) => q.sql)).toEqual([
        'SELECT pg_advisory_xact_lock($1)',
      ]);
    });

    it('rejects the same player on both sides before opening a transaction', async () => {
      const err = await rejection(
        service.recordMatch({ winnerId: alice.id, loserId: alice.id }),
      );

      expect(err).toBeInstanceOf(BadRequestException);
      expect(responseCode(err)).toBe('MATCH_SAME_PLAYER');
      expect(ds.queries).toEqual([]);
    });

    it('rejects a date outside the active season', async () => {
      const err = await rejection(
        service.recordMatch({
          winnerId: alice.id,
          loserId: bob.id,
          date: '2026-04-01',
        }),
      );

      expect(responseCode(err)).toBe('MATCH_OUTSIDE_SEASON');
      expect(ds.rows(Match)).toEqual([]);
    });

    it('rejects a date earlier than the latest recorded match', async () => {
      await service.recordMatch({
        winnerId: alice.id,
        loserId: bob.id,
        date: '2026-01-10',
      });

      const err = await rejection(
        service.recordMatch({
          winnerId: bob.id,
          loserId: alice.id,
          date: '2026-01-09',
        }),
      );

      expect(responseCode(err)).toBe('MATCH_OUT_OF_ORDER');
      expect(ds.rows(Match)).toHaveLength(1);
    });

    it('throws NotFoundException for an unknown player and stores nothing', async () => {
      await expect(
        service.recordMatch({
          winnerId: alice.id,
          loserId: '00000000-0000-0000-0000-00000000dead',
        }),
      ).rejects.toBeInstanceOf(NotFoundException);
      expect(ds.rows(Match)).toEqual([]);
    });

    it('rolls back the match and counters when the history write fails', async () => {
      ds.failNext(RatingHistoryEntry, 'insert');

      await expect(
        service.recordMatch({ winnerId: alice.id, loserId: bob.id }),
      ).rejects.toThrow('injected insert failure');

      expect(ds.rows(Match)).toEqual([]);
      expect(player(alice.id)?.rating).toBe(1000);
      expect(player(bob.id)?.lossCount).toBe(0);
    });
  });

  it('refuses to record while no season is active', async () => {
    await seedSeason(ds, { startDate: '2026-01-01' });

    const err = await rejection(
      service.recordMatch({ winnerId: alice.id, loserId: bob.id }),
    );

    expect(err).toBeInstanceOf(ConflictException);
    expect(responseCode(err)).toBe('NO_ACTIVE_SEASON');
  });

  // ── listMatches ──────────────────────────────────────────────────

  describe('listMatches', () => {
    beforeEach(async () => {
      await seedSeason(ds, { startDate: '2026-01-01', active: true });
      for (const date of ['2026-01-05', '2026-01-05', '2026-01-20', '2026-02-01']) {
        await service.recordMatch({ winnerId: alice.id, loserId: bob.id, date });
      }
    });

    it('lists in (date, sequence) order', async () => {
      const rows = await service.listMatches({});

      expect(rows.map((m) => [m.date, m.sequence])).toEqual([
        ['2026-01-05', 1],
        ['2026-01-05', 2],
        ['2026-01-20', 3],
        ['2026-02-01', 4],
      ]);
    });

    it('filters by an inclusive date range', async () => {
      const rows = await service.listMatches({
        from: '2026-01-05',
        to: '2026-01-20',
      });

      expect(rows.map((m) => m.sequence)).toEqual([1, 2, 3]);
    });

    it('filters by an open-ended range and limit', async () => {
      const rows = await service.listMatches({ from: '2026-01-06', limit: 1 });

      expect(rows.map((m) => m.sequence)).toEqual([3]);
    });

    it('filters by season', async () => {
      const rows = await service.listMatches({ seasonId: 'other-season' });

      expect(rows).toEqual([]);
    });
  });

  // ── live path against replays ────────────────────────────────────

  describe('live path against replays', () => {
    it('agrees with a replay of the same log across a season change', async () => {
      const winter = await seasons.createSeason({
        name: 'Winter',
        startDate: '2026-01-01',
        endDate: '2026-03-31',
      });
      const spring = await seasons.createSeason({
        name: 'Spring',
        startDate: '2026-04-01',
      });

      freezeToday('2026-01-01');
      await seasons.runSeasonTransition();
      await service.recordMatch({ winnerId: alice.id, loserId: bob.id, date: '2026-01-05' });
      await service.recordMatch({ winnerId: alice.id, loserId: bob.id, date: '2026-02-10' });

      freezeToday('2026-04-01');
      const transition = await seasons.runSeasonTransition();
      expect(transition).toEqual({
        today: '2026-04-01',
        expiredSeasonIds: [winter.id],
        activatedSeasonId: spring.id,
        playersReset: 2,
      });

      await service.recordMatch({ winnerId: alice.id, loserId: bob.id, date: '2026-04-02' });

      const liveHistory = ds
        .rows(RatingHistoryEntry)
        .map((e) => `${e.matchSequence}:${e.playerId}:${e.rating}`)
        .sort();

      await ds.getRepository(RatingHistoryEntry).clear();
      const report = await replays.replayRatingHistory();
      await replays.replaySeasonSnapshots();

      expect(report.rowsWritten).toBe(6);

      const replayedHistory = ds
        .rows(RatingHistoryEntry)
        .map((e) => `${e.matchSequence}:${e.playerId}:${e.rating}`)
        .sort();
      expect(replayedHistory).toEqual(liveHistory);
      expect(liveHistory).toEqual([
        `1:${alice.id}:1016`,
        `1:${bob.id}:984`,
        `2:${alice.id}:1031`,
        `2:${bob.id}:969`,
        `3:${alice.id}:1016`,
        `3:${bob.id}:984`,
      ].sort());

      // the current season's snapshots match the live counters
      for (const p of ds.rows(Player)) {
        const snap = ds
          .rows(SeasonSnapshot)
          .find((s) => s.seasonId === spring.id && s.playerId === p.id);
        expect(snap).toMatchObject({
          rating: p.rating,
          winCount: p.winCount,
          lossCount: p.lossCount,
        });
      }
    });
  });
});
