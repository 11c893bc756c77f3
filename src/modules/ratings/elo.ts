import { LADDER_K_FACTOR } from './ratings.constants';

export type RatingPair = [winnerRating: number, loserRating: number];

export function expectedScore(rating: number, opponentRating: number) {
  return 1 / (1 + Math.pow(10, (opponentRating - rating) / 400));
}

/** Nearest integer, halves rounded away from zero. */
export function roundRating(value: number) {
  const magnitude = Math.round(Math.abs(value));
  return value < 0 ? 0 - magnitude : magnitude;
}

/**
 * Elo update for a decided 1v1 match. Zero-sum up to one point of
 * rounding.
 */
export function rate(winnerRating: number, loserRating: number): RatingPair {
  if (!Number.isInteger(winnerRating) || !Number.isInteger(loserRating)) {
    throw new Error(
      `Ratings must be integers (got ${winnerRating}, ${loserRating})`,
    );
  }

  const expectedWinner = expectedScore(winnerRating, loserRating);
  const expectedLoser = 1 - expectedWinner;

  return [
    roundRating(winnerRating + LADDER_K_FACTOR * (1 - expectedWinner)),
    roundRating(loserRating + LADDER_K_FACTOR * (0 - expectedLoser)),
  ];
}
