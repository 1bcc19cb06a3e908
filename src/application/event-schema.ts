import { z } from 'zod';

/**
 * Zod schema for a reading about to be appended to the log.
 *
 * - `timestamp` is kept verbatim; devices are not required to send ISO-8601.
 * - `action` is an open enumeration, so any non-empty string passes.
 * - `amount` is in device units (grams on every known model) and never negative.
 */
export const newEventSchema = z.object({
  device_id: z.string().min(1).max(255),
  model: z.string().min(1).max(64),
  timestamp: z.string().min(1).max(64),
  action: z.string().min(1).max(64),
  amount: z.number().finite().nonnegative(),
  location: z.string().min(1).max(255),
  ingredient: z.string().min(1).max(255),
  synced: z.boolean().default(false),
});

export type NewEventInput = z.infer<typeof newEventSchema>;

/**
 * Catalogue the generator draws readings from.
 * Each ingredient carries its plausible weight range in grams.
 */
export const generatorCatalogSchema = z.object({
  models: z.array(z.string().min(1)).min(1),
  scale_numbers: z.array(z.string().min(1)).min(1),
  locations: z.array(z.string().min(1)).min(1),
  ingredients: z
    .array(
      z
        .object({
          name: z.string().min(1),
          min_grams: z.number().nonnegative(),
          max_grams: z.number().nonnegative(),
        })
        .refine((i) => i.min_grams <= i.max_grams, { message: 'min_grams must not exceed max_grams' }),
    )
    .min(1),
});

export type GeneratorCatalog = z.infer<typeof generatorCatalogSchema>;
