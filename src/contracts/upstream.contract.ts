/**
 * Upstream Response Contracts
 *
 * Only the fields the normalizers read are declared; everything else in the
 * responses is dropped on parse.
 */

import { z } from 'zod';

// ============================================================================
// Legacy endpoints (linux-od.json / linux-od.min.js)
// ============================================================================

const LegacyPriceValueSchema = z.union([z.string(), z.number()]);

export const LegacySizeSchema = z.object({
    size: z.string(),
    valueColumns: z
        .array(
            z.object({
                prices: z.object({
                    USD: LegacyPriceValueSchema,
                }),
            })
        )
        .nonempty(),
});

export const LegacyPricingDocumentSchema = z.object({
    config: z.object({
        regions: z.array(
            z.object({
                region: z.string(),
                instanceTypes: z.array(
                    z.object({
                        sizes: z.array(LegacySizeSchema),
                    })
                ),
            })
        ),
    }),
});

export type LegacySize = z.infer<typeof LegacySizeSchema>;
export type LegacyPricingDocument = z.infer<typeof LegacyPricingDocumentSchema>;

// ============================================================================
// Calculator API (one document per region and OS)
// ============================================================================

export const INSTANCE_TYPE_ATTRIBUTE = 'aws:ec2:instanceType';

export const CalculatorPriceEntrySchema = z.object({
    attributes: z.object({
        [INSTANCE_TYPE_ATTRIBUTE]: z.string().nullish(),
    }),
    price: z.object({
        USD: z.union([z.string(), z.number()]).nullish(),
    }),
});

export const CalculatorPricingDocumentSchema = z.object({
    prices: z.array(CalculatorPriceEntrySchema),
});

export type CalculatorPriceEntry = z.infer<typeof CalculatorPriceEntrySchema>;
export type CalculatorPricingDocument = z.infer<typeof CalculatorPricingDocumentSchema>;
