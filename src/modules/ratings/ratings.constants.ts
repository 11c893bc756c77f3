export const DEFAULT_RATING = 1000;

/**
 * Shared by the live path and both replays. Changing it invalidates every
 * stored rating, so it is not read from configuration.
 */
export const LADDER_K_FACTOR = 32;
