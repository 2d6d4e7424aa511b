import { z } from 'zod';
import { getAddress, isAddress, type Address } from 'viem';
import { ValidationError } from './errors.js';

/**
 * Normalize an identity to checksum form so every spelling of the same
 * address maps to the same registry key.
 *
 * @throws ValidationError if the value is not a 20-byte hex address
 */
export function normalizeAddress(value: string, field: string = 'address'): Address {
  const address = parseAddress(value);
  if (!address) {
    throw new ValidationError(`Invalid address: ${value}`, field);
  }
  return address;
}

/**
 * Checksum form of the value, or undefined if it is not an address
 */
export function parseAddress(value: string): Address | undefined {
  const trimmed = value.trim();
  return isAddress(trimmed, { strict: false }) ? getAddress(trimmed) : undefined;
}

/**
 * Shortened form for log lines: 0x1234...abcd
 */
export function shortAddress(address: Address): string {
  return `${address.slice(0, 6)}...${address.slice(-4)}`;
}

/**
 * Zod schema for an address, normalized to checksum form
 */
export const addressSchema = z.string().trim().transform((val, ctx): Address => {
  if (!isAddress(val, { strict: false })) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid address' });
    return z.NEVER;
  }
  return getAddress(val);
});
