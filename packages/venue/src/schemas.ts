import { z } from 'zod';
import { isDecimalString } from '@migrator/quantize';
import type {
  L2Book,
  SpotAssetContext,
  SpotClearinghouseState,
  SpotMeta,
  SpotMetaAndAssetCtxs,
} from '@migrator/types';

const decimalString = z.string().refine(isDecimalString, 'Expected a decimal string');

export const spotMetaSchema: z.ZodType<SpotMeta> = z.object({
  universe: z.array(
    z.object({
      name: z.string(),
      index: z.number().int().nonnegative(),
      tokens: z.tuple([z.number().int(), z.number().int()]),
    })
  ),
  tokens: z.array(
    z.object({
      name: z.string(),
      index: z.number().int().nonnegative(),
      szDecimals: z.number().int().nonnegative(),
      weiDecimals: z.number().int().nonnegative(),
    })
  ),
});

export const spotAssetContextSchema: z.ZodType<SpotAssetContext> = z.object({
  coin: z.string(),
  markPx: decimalString,
  midPx: decimalString.nullable(),
  prevDayPx: decimalString,
  dayNtlVlm: decimalString,
});

export const spotMetaAndAssetCtxsSchema: z.ZodType<SpotMetaAndAssetCtxs> = z.tuple([
  spotMetaSchema,
  z.array(spotAssetContextSchema),
]);

export const spotClearinghouseStateSchema: z.ZodType<SpotClearinghouseState> = z.object({
  balances: z.array(
    z.object({
      coin: z.string(),
      total: decimalString,
      hold: decimalString,
    })
  ),
});

const bookLevelSchema = z.object({
  px: decimalString,
  sz: decimalString,
  n: z.number().int().nonnegative(),
});

export const l2BookSchema: z.ZodType<L2Book> = z.object({
  coin: z.string(),
  time: z.number(),
  levels: z.tuple([z.array(bookLevelSchema), z.array(bookLevelSchema)]),
});
