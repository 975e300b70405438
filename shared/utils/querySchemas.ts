import { z } from 'zod';

/** Blank strings count as absent */
export const optionalText = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined),
  z.string().optional()
);

// Postgres INTEGER bounds
const INT4_MIN = -2147483648;
const INT4_MAX = 2147483647;

/**
 * Listing filters are lenient: anything that is not a plain integer within the
 * INTEGER column range is dropped instead of failing the request
 */
export const lenientInteger = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return undefined;
  }
  const parsed = Number(trimmed);
  return parsed >= INT4_MIN && parsed <= INT4_MAX ? parsed : undefined;
}, z.number().int().optional());
