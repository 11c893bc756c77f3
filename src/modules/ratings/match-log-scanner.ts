import { MatchOrderingException } from '../../common/ladder-exceptions';
import { Match } from '../matches/match.entity';
import {
  RatingCounters,
  applyMatchResult,
  freshCounters,
} from './rating-counters';

export type LoggedMatch = Pick<
  Match,
  'id' | 'sequence' | 'date' | 'seasonId' | 'winnerId' | 'loserId' | 'shutout'
>;

export type TrackedPlayer = RatingCounters & {
  playerId: string;
  seasonId: string;
};

export type ScannedMatch = {
  match: LoggedMatch;
  winner: TrackedPlayer;
  loser: TrackedPlayer;
};

export function compareMatchOrder(a: LoggedMatch, b: LoggedMatch) {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  return a.sequence - b.sequence;
}

/**
 * Walks the match log in (date, sequence) order and yields both
 * participants' state right after each match. A player's state restarts
 * from the defaults whenever they show up in a different season than their
 * previous match, which reproduces the season reset from chronology alone.
 *
 * Yielded states are copies; mutating them does not affect the scan.
 */
export function* scanMatchLog(
  matches: readonly LoggedMatch[],
): Generator<ScannedMatch> {
  const ordered = [...matches].sort(compareMatchOrder);

  const seen = new Map<number, string>();
  for (const match of ordered) {
    if (!Number.isInteger(match.sequence)) {
      throw new MatchOrderingException(
        `Match ${match.id} has no insertion sequence`,
      );
    }
    const other = seen.get(match.sequence);
    if (other) {
      throw new MatchOrderingException(
        `Matches ${other} and ${match.id} share sequence ${match.sequence}`,
      );
    }
    seen.set(match.sequence, match.id);
  }

  const tracked = new Map<string, TrackedPlayer>();

  const enter = (playerId: string, seasonId: string) => {
    let state = tracked.get(playerId);
    if (!state || state.seasonId !== seasonId) {
      state = { ...freshCounters(), playerId, seasonId };
      tracked.set(playerId, state);
    }
    return state;
  };

  for (const match of ordered) {
    const winner = enter(match.winnerId, match.seasonId);
    const loser = enter(match.loserId, match.seasonId);

    applyMatchResult(winner, loser, match.shutout);

    yield { match, winner: { ...winner }, loser: { ...loser } };
  }
}
