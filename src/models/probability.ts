/**
 * Odds conversion and bet sizing utilities
 */

/**
 * Net payout for a $1 stake, used to compare two quotes for the same side
 * @param american American odds (e.g., -110, +150)
 */
export function payoutPerDollar(american: number): number {
  if (american >= 100) {
    return american / 100;
  }
  return 100 / Math.abs(american);
}

/**
 * Profit per unit staked if the bet wins
 * @param american American odds (e.g., -110, +150)
 */
export function profitMultiplier(american: number): number {
  if (american > 0) {
    return american / 100; // bet 100 to win odds
  }
  return 100 / -american; // bet -odds to win 100
}

/**
 * Calculate implied probability from American odds (vig included)
 * @returns Implied probability (0 to 1), undefined when there is no price
 */
export function americanToImplied(american: number | undefined): number | undefined {
  if (american === undefined || american === 0 || !Number.isFinite(american)) {
    return undefined;
  }
  if (american < 0) {
    return -american / (-american + 100);
  }
  return 100 / (american + 100);
}

/**
 * Expected value per unit stake: EV = p * profit_if_win - (1 - p)
 */
export function expectedValue(probability: number, american: number): number {
  const profit = profitMultiplier(american);
  return probability * profit - (1 - probability);
}

/**
 * Kelly fraction of bankroll to stake. Never negative.
 */
export function kellyFraction(probability: number, american: number): number {
  const b = profitMultiplier(american);
  if (!Number.isFinite(b) || b <= 0) {
    return 0;
  }
  const f = (probability * (b + 1) - 1) / b;
  return Math.max(0, f);
}

/**
 * Format American odds with proper sign
 * @returns Formatted string (e.g., "-110", "+150")
 */
export function formatAmericanOdds(american: number | undefined): string {
  if (american === undefined) return "n/a";
  return american > 0 ? `+${american}` : `${american}`;
}

export function clamp(x: number, lo: number, hi: number): number {
  return x > hi ? hi : x < lo ? lo : x;
}

/**
 * Round to a fixed number of decimal places (4 by default)
 */
export function roundTo(x: number, places: number = 4): number {
  const factor = 10 ** places;
  return Math.round(x * factor) / factor;
}
