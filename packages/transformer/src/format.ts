import type { DecimalAmount } from '@invoice-bridge/contracts';
import { round } from '@invoice-bridge/shared';

/**
 * Fixed-point text with exactly `places` decimals, rounded half away from zero.
 * A value that rounds to zero never carries a minus sign.
 */
export function formatFixed(value: DecimalAmount, places: number): string {
  return round(value, places, 'ROUND_HALF_UP');
}
