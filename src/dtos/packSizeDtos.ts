import z from 'zod';
import { PACK_SIZE_RULE_IDS, PACK_UNITS } from '../services/packSize';

export const NormalizePackSizeRequest = z.object({
  labels: z.array(z.string().max(200).nullable()).min(1).max(1000),
});

export const NormalizedPackSizeResult = z.object({
  label: z.string().nullable(),
  quantity: z.number().nullable(),
  unit: z.enum(PACK_UNITS).nullable(),
  rule: z.enum(PACK_SIZE_RULE_IDS).nullable(),
});

export const NormalizePackSizeResponse = z.object({
  results: z.array(NormalizedPackSizeResult),
});

export type NormalizePackSizeResponseType = z.infer<typeof NormalizePackSizeResponse>;
