import type { PartialEnrichment } from '../../shared/types';

/**
 * One external source of IP intelligence. Implementations throw on failure;
 * the enrichment cache isolates each call.
 */
export interface EnrichmentProvider {
  readonly name: string;
  lookup(ipAddress: string): Promise<PartialEnrichment>;
}
