import { z } from 'zod';

/**
 * On-disk shape of the holdings store. Existing `portfolio_data.json` files
 * use these exact keys, so they must not be renamed.
 */
export const PersistedHoldingSchema = z.object({
  MutualFundDetails: z.object({
    Name: z.string(),
    ISIN: z.string(),
    Industry: z.string(),
  }),
  MonthData: z.object({
    Quantity: z.number(),
    MarketValueInLakhs: z.number(),
    '%ToNAV': z.number(),
  }),
});

export const PersistedSnapshotSchema = z.record(z.string(), z.array(PersistedHoldingSchema));

export type PersistedHolding = z.infer<typeof PersistedHoldingSchema>;
export type PersistedSnapshot = z.infer<typeof PersistedSnapshotSchema>;
