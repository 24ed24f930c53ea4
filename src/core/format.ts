import { HOUR_SECONDS } from './constants';

/**
 * Seconds as hours with a fixed number of decimals: (5400, 2) -> "1.50"
 */
export function formatHours(seconds: number, digits = 2): string {
  return (seconds / HOUR_SECONDS).toFixed(digits);
}

/**
 * "abcd...wxyz" for long tokens, all stars for short ones.
 */
export function maskToken(token: string): string {
  if (!token) return '<empty>';
  if (token.length <= 8) return '*'.repeat(token.length);
  return `${token.slice(0, 4)}...${token.slice(-4)}`;
}
