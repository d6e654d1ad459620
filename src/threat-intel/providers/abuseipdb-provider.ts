import { z } from 'zod';
import type { PartialEnrichment } from '../../shared/types';
import { ProviderError } from '../../shared/errors';
import { APP_CONFIG, PROVIDER_NAMES } from '../../../lib/config/constants';
import type { EnrichmentProvider } from './types';
import { fetchProviderJson } from './http';

const AbuseIpDbResponseSchema = z.object({
  data: z.object({
    abuseConfidenceScore: z.number().nullish(),
    totalReports: z.number().nullish(),
    lastReportedAt: z.string().nullish(),
    countryCode: z.string().nullish(),
    usageType: z.string().nullish(),
    isPublic: z.boolean().nullish(),
    isWhitelisted: z.boolean().nullish(),
  }),
});

/**
 * Abuse reputation from AbuseIPDB
 */
export class AbuseIpDbProvider implements EnrichmentProvider {
  readonly name = PROVIDER_NAMES.ABUSEIPDB;

  constructor(
    private apiKey: string,
    private baseUrl: string = APP_CONFIG.providers.abuseIpDb,
    private timeoutMs: number = APP_CONFIG.enrichment.providerTimeoutMs
  ) {}

  async lookup(ipAddress: string): Promise<PartialEnrichment> {
    const query = new URLSearchParams({
      ipAddress,
      maxAgeInDays: String(APP_CONFIG.providers.abuseMaxAgeDays),
    });

    const body = await fetchProviderJson(
      this.name,
      `${this.baseUrl}/check?${query.toString()}`,
      { Key: this.apiKey, Accept: 'application/json' },
      this.timeoutMs
    );

    const parsed = AbuseIpDbResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError(this.name, 'unexpected response shape');
    }

    const d = parsed.data.data;
    return {
      abuseData: {
        abuseConfidenceScore: d.abuseConfidenceScore ?? 0,
        totalReports: d.totalReports ?? 0,
        lastReportedAt: d.lastReportedAt ?? null,
        countryCode: d.countryCode ?? undefined,
        usageType: d.usageType ?? undefined,
        isPublic: d.isPublic ?? false,
        isWhitelisted: d.isWhitelisted ?? false,
      },
    };
  }
}
