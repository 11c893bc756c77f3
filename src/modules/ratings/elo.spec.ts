import { expectedScore, rate, roundRating } from './elo';
import { DEFAULT_RATING, LADDER_K_FACTOR } from './ratings.constants';

describe('elo', () => {
  describe('expectedScore', () => {
    it('is 0.5 between equal ratings', () => {
      expect(expectedScore(1000, 1000)).toBe(0.5);
    });

    it('is complementary for the two sides', () => {
      expect(expectedScore(1300, 1100) + expectedScore(1100, 1300)).toBeCloseTo(
        1,
        12,
      );
    });
  });

  describe('roundRating', () => {
    it('rounds halves away from zero', () => {
      expect(roundRating(2.5)).toBe(3);
      expect(roundRating(-2.5)).toBe(-3);
    });

    it('rounds to the nearest integer otherwise', () => {
      expect(roundRating(1030.53)).toBe(1031);
      expect(roundRating(969.47)).toBe(969);
      expect(roundRating(-0.4)).toBe(0);
    });
  });

  describe('rate', () => {
    it('moves equal ratings by half the K factor', () => {
      expect(rate(DEFAULT_RATING, DEFAULT_RATING)).toEqual([
        DEFAULT_RATING + LADDER_K_FACTOR / 2,
        DEFAULT_RATING - LADDER_K_FACTOR / 2,
      ]);
      expect(rate(1000, 1000)).toEqual([1016, 984]);
    });

    it('gives a favourite a small gain', () => {
      expect(rate(1200, 1000)).toEqual([1208, 992]);
    });

    it('gives an upset a large gain', () => {
      expect(rate(1000, 1200)).toEqual([1024, 1176]);
    });

    it('continues from a previous result', () => {
      expect(rate(1016, 984)).toEqual([1031, 969]);
    });

    it('is zero-sum up to one point of rounding', () => {
      for (let winner = 600; winner <= 1800; winner += 37) {
        for (let loser = 600; loser <= 1800; loser += 53) {
          const [newWinner, newLoser] = rate(winner, loser);
          expect(Math.abs(newWinner + newLoser - (winner + loser))).toBeLessThanOrEqual(1);
          expect(newWinner).toBeGreaterThanOrEqual(winner);
          expect(newLoser).toBeLessThanOrEqual(loser);
        }
      }
    });

    it('is deterministic', () => {
      expect(rate(1187, 1042)).toEqual(rate(1187, 1042));
    });

    it('rejects non-integer ratings', () => {
      expect(() => rate(1000.5, 1000)).toThrow('Ratings must be integers');
      expect(() => rate(1000, Number.NaN)).toThrow('Ratings must be integers');
    });
  });
});
