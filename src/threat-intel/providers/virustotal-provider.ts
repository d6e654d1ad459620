import { z } from 'zod';
import type { PartialEnrichment } from '../../shared/types';
import { ProviderError } from '../../shared/errors';
import { APP_CONFIG, PROVIDER_NAMES } from '../../../lib/config/constants';
import type { EnrichmentProvider } from './types';
import { fetchProviderJson } from './http';

const VirusTotalIpSchema = z.object({
  data: z.object({
    attributes: z.object({
      reputation: z.number().nullish(),
      last_analysis_stats: z
        .object({
          malicious: z.number().nullish(),
          suspicious: z.number().nullish(),
          harmless: z.number().nullish(),
          undetected: z.number().nullish(),
        })
        .nullish(),
    }),
  }),
});

/**
 * Engine verdicts from VirusTotal. Stored with the record; not part of the
 * threat score.
 */
export class VirusTotalProvider implements EnrichmentProvider {
  readonly name = PROVIDER_NAMES.VIRUSTOTAL;

  constructor(
    private apiKey: string,
    private baseUrl: string = APP_CONFIG.providers.virusTotal,
    private timeoutMs: number = APP_CONFIG.enrichment.providerTimeoutMs
  ) {}

  async lookup(ipAddress: string): Promise<PartialEnrichment> {
    const body = await fetchProviderJson(
      this.name,
      `${this.baseUrl}/ip_addresses/${encodeURIComponent(ipAddress)}`,
      { 'x-apikey': this.apiKey, Accept: 'application/json' },
      this.timeoutMs
    );

    const parsed = VirusTotalIpSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError(this.name, 'unexpected response shape');
    }

    const attributes = parsed.data.data.attributes;
    const stats = attributes.last_analysis_stats;
    return {
      reputationData: {
        malicious: stats?.malicious ?? 0,
        suspicious: stats?.suspicious ?? 0,
        harmless: stats?.harmless ?? 0,
        undetected: stats?.undetected ?? 0,
        reputation: attributes.reputation ?? 0,
      },
    };
  }
}
