import { ConfigService } from '@nestjs/config';
import { Settings } from 'luxon';

import { LadderConfig } from '../config/configuration';
import { Player } from '../modules/players/player.entity';
import { DEFAULT_COUNTERS } from '../modules/ratings/rating-counters';
import { Season } from '../modules/seasons/season.entity';
import { InMemoryDataSource } from './in-memory-datasource';

export function ladderConfig(overrides: Partial<LadderConfig> = {}) {
  return new ConfigService({
    ladder: {
      timezone: 'UTC',
      enableCrons: true,
      replayBatchSize: 500,
      ...overrides,
    },
  });
}

/** Pins luxon's clock so "today" in UTC is `isoDate`. */
export function freezeToday(isoDate: string) {
  const fixed = Date.parse(`${isoDate}T12:00:00.000Z`);
  Settings.now = () => fixed;
}

export function unfreezeToday() {
  Settings.now = () => Date.now();
}

export async function seedPlayer(
  ds: InMemoryDataSource,
  name: string,
  overrides: Partial<Player> = {},
) {
  const repo = ds.getRepository(Player);
  return repo.save(repo.create({ name, ...DEFAULT_COUNTERS, ...overrides }));
}

export async function seedSeason(
  ds: InMemoryDataSource,
  season: Pick<Season, 'startDate'> & Partial<Season>,
) {
  const repo = ds.getRepository(Season);
  return repo.save(
    repo.create({
      name: `Season from ${season.startDate}`,
      endDate: null,
      active: false,
      ...season,
    }),
  );
}
