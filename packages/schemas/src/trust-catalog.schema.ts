import { z } from 'zod';

const HostListSchema = z.array(z.string().trim().min(1)).min(1);

const CatalogSectionSchema = z
  .object({
    General: HostListSchema,
    Health: HostListSchema.optional(),
    Finance: HostListSchema.optional(),
    Other: HostListSchema.optional(),
  })
  .strict();

export const TrustCatalogSchema = z.object({
  $schema: z.string().optional(),
  version: z.string().regex(/^\d+\.\d+\.\d+$/),
  evergreen: CatalogSectionSchema,
  realtime: CatalogSectionSchema,
});

export type TrustCatalogData = z.infer<typeof TrustCatalogSchema>;
export type TrustCatalogSection = z.infer<typeof CatalogSectionSchema>;
