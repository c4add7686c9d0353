import { z } from 'zod';

/**
 * Number of decimal places in one whole unit, for display only.
 * All arithmetic stays in integer micro-units.
 */
export const MICRO_UNIT_DECIMALS = 6;

/**
 * An identity (account, wallet or signer principal).
 * Surrounding whitespace is not significant.
 */
export const PrincipalSchema = z.string().trim().min(1, 'Principal must not be empty');

export type Principal = z.infer<typeof PrincipalSchema>;

/**
 * Unsigned integer amount in micro-units.
 *
 * Accepts a bigint, a safe integer number, or a string of decimal digits
 * (JSON has no bigint, so files and CLI flags carry amounts as strings).
 */
export const MicroAmountSchema = z
  .union([
    z.bigint(),
    z.number().int('Amount must be an integer').safe('Amount exceeds safe integer range'),
    z.string().trim().regex(/^\d+$/, 'Amount must be a string of decimal digits'),
  ])
  .transform((value) => BigInt(value))
  .pipe(z.bigint().nonnegative('Amount must not be negative'));

export type MicroAmount = z.output<typeof MicroAmountSchema>;
export type MicroAmountInput = z.input<typeof MicroAmountSchema>;

/**
 * Non-negative safe integer (heights, counters, ids, metrics)
 */
export const NonNegativeIntegerSchema = z.number().int().nonnegative().safe();

/**
 * Format micro-units as a fixed-point string, e.g. 1500000n -> "1.500000"
 */
export function formatMicroAmount(amount: bigint, decimals: number = MICRO_UNIT_DECIMALS): string {
  const negative = amount < 0n;
  const digits = (negative ? -amount : amount).toString().padStart(decimals + 1, '0');
  const whole = digits.slice(0, digits.length - decimals);
  const fraction = digits.slice(digits.length - decimals);
  const sign = negative ? '-' : '';
  return decimals === 0 ? `${sign}${whole}` : `${sign}${whole}.${fraction}`;
}
