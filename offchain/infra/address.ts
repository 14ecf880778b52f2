import { isAddress, type Address } from 'viem';
import { z } from 'zod';

export const EvmAddressSchema = z
  .string()
  .trim()
  .refine((value): value is Address => isAddress(value, { strict: false }), 'expected a 0x-prefixed 20-byte address');

export const ZERO_ADDRESS: Address = '0x0000000000000000000000000000000000000000';
