import { rate } from './elo';
import { DEFAULT_RATING } from './ratings.constants';

export interface RatingCounters {
  rating: number;
  winCount: number;
  lossCount: number;
  bonusGivenCount: number;
  bonusTakenCount: number;
}

export const DEFAULT_COUNTERS: Readonly<RatingCounters> = {
  rating: DEFAULT_RATING,
  winCount: 0,
  lossCount: 0,
  bonusGivenCount: 0,
  bonusTakenCount: 0,
};

export function freshCounters(): RatingCounters {
  return { ...DEFAULT_COUNTERS };
}

/**
 * Applies one match outcome to both participants in place. The live path
 * calls this on Player rows, the replays on their tracked state; keeping a
 * single implementation is what makes the two agree.
 */
export function applyMatchResult(
  winner: RatingCounters,
  loser: RatingCounters,
  shutout: boolean,
) {
  const [winnerRating, loserRating] = rate(winner.rating, loser.rating);

  winner.rating = winnerRating;
  winner.winCount += 1;
  loser.rating = loserRating;
  loser.lossCount += 1;

  if (shutout) {
    winner.bonusGivenCount += 1;
    loser.bonusTakenCount += 1;
  }

  return { winnerRating, loserRating };
}
