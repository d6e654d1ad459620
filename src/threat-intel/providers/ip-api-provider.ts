import { z } from 'zod';
import type { PartialEnrichment } from '../../shared/types';
import { ProviderError } from '../../shared/errors';
import { APP_CONFIG, PROVIDER_NAMES } from '../../../lib/config/constants';
import type { EnrichmentProvider } from './types';
import { fetchProviderJson } from './http';

const IpApiResponseSchema = z.object({
  error: z.boolean().nullish(),
  reason: z.string().nullish(),
  latitude: z.number().nullish(),
  longitude: z.number().nullish(),
  city: z.string().nullish(),
  region: z.string().nullish(),
  country_name: z.string().nullish(),
  country: z.string().nullish(),
  org: z.string().nullish(),
  asn: z.string().nullish(),
});

/**
 * Geolocation from ipapi.co (no key required)
 */
export class IpApiProvider implements EnrichmentProvider {
  readonly name = PROVIDER_NAMES.IP_API;

  constructor(
    private baseUrl: string = APP_CONFIG.providers.ipApi,
    private timeoutMs: number = APP_CONFIG.enrichment.providerTimeoutMs
  ) {}

  async lookup(ipAddress: string): Promise<PartialEnrichment> {
    const body = await fetchProviderJson(
      this.name,
      `${this.baseUrl}/${encodeURIComponent(ipAddress)}/json/`,
      { Accept: 'application/json' },
      this.timeoutMs
    );

    const parsed = IpApiResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError(this.name, 'unexpected response shape');
    }
    if (parsed.data.error) {
      throw new ProviderError(this.name, parsed.data.reason || 'lookup rejected');
    }

    const geo = parsed.data;
    return {
      geoData: {
        latitude: geo.latitude ?? undefined,
        longitude: geo.longitude ?? undefined,
        city: geo.city ?? undefined,
        region: geo.region ?? undefined,
        country: geo.country_name ?? undefined,
        countryCode: geo.country ?? undefined,
        isp: geo.org ?? undefined,
        asn: geo.asn ?? undefined,
      },
    };
  }
}
