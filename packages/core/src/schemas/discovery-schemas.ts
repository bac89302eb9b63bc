// packages/core/src/schemas/discovery-schemas.ts
import { z } from 'zod';

// --- Routing Discovery ---

export const DiscoveredServerSchema = z.object({
  addresses: z.array(z.string()),
  role: z.string(),
});
export type DiscoveredServerRecord = z.infer<typeof DiscoveredServerSchema>;

/**
 * First record of a routing table discovery response.
 * `ttl` is in seconds; drivers may hand integers back as bigint.
 */
export const DiscoveryRecordSchema = z.object({
  servers: z.array(DiscoveredServerSchema),
  ttl: z.union([z.number(), z.bigint()])
    .transform(Number)
    .pipe(z.number().int().nonnegative()),
});
export type DiscoveryRecord = z.infer<typeof DiscoveryRecordSchema>;

export const DiscoveryParametersSchema = z.object({
  context: z.record(z.string(), z.string()),
  database: z.string().min(1),
});
export type DiscoveryParameters = z.infer<typeof DiscoveryParametersSchema>;
