/**
 * Safe Connection Pool Limits
 * Both portal services share one PostgreSQL instance; keep each pool small.
 */

export const SAFE_POOL_LIMITS = {
  PRODUCTION_MAX: 10,
  PRODUCTION_MIN: 2,

  DEVELOPMENT_MAX: 20,
  DEVELOPMENT_MIN: 1,

  getMax: (): number => {
    const env = process.env.NODE_ENV || 'development';
    return env === 'production' ? SAFE_POOL_LIMITS.PRODUCTION_MAX : SAFE_POOL_LIMITS.DEVELOPMENT_MAX;
  },

  getMin: (): number => {
    const env = process.env.NODE_ENV || 'development';
    return env === 'production' ? SAFE_POOL_LIMITS.PRODUCTION_MIN : SAFE_POOL_LIMITS.DEVELOPMENT_MIN;
  },
};
