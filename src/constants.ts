/**
 * Fixed-point scales and protocol-wide bounds.
 */

export const PRICE_DECIMALS = 18;
export const ASSET_DECIMALS = 18;
export const USDN_DECIMALS = 18;
export const LEVERAGE_DECIMALS = 21;
export const FUNDING_RATE_DECIMALS = 18;
export const FUNDING_SF_DECIMALS = 3;
export const LIQUIDATION_MULTIPLIER_DECIMALS = 38;

export const WAD = 10n ** 18n;
export const LEVERAGE_FACTOR = 10n ** BigInt(LEVERAGE_DECIMALS);
export const FUNDING_RATE_FACTOR = 10n ** BigInt(FUNDING_RATE_DECIMALS);
export const MULTIPLIER_FACTOR = 10n ** BigInt(LIQUIDATION_MULTIPLIER_DECIMALS);
export const BPS_DIVISOR = 10_000n;
export const SECONDS_PER_DAY = 86_400n;

export const UINT256_MAX = (1n << 256n) - 1n;
export const INT256_MAX = (1n << 255n) - 1n;
export const INT256_MIN = -(1n << 255n);

// price(tick) = 1.0001^tick, so these bound prices to roughly [1e4, 3.6e60] wei
export const MIN_TICK = -322_378;
export const MAX_TICK = 980_000;

// elastic token divisor bounds
export const MAX_DIVISOR = 10n ** 18n;
export const MIN_DIVISOR = 10n ** 9n;

// upper bound of live records inspected when looking for an actionable action
export const MAX_ACTIONABLE_PENDING_ACTIONS = 20;

// tokens minted to the dead address at initialization, never withdrawable
export const MIN_USDN_SUPPLY = 1000n;

export const PENDING_ACTION_RECORD_SIZE = 217;
