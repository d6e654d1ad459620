import { z } from 'zod';
import type { PartialEnrichment } from '../../shared/types';
import { ProviderError } from '../../shared/errors';
import { APP_CONFIG, PROVIDER_NAMES } from '../../../lib/config/constants';
import type { EnrichmentProvider } from './types';
import { fetchProviderJson } from './http';

const ShodanHostSchema = z.object({
  ports: z.array(z.number()).nullish(),
  org: z.string().nullish(),
  hostnames: z.array(z.string()).nullish(),
  // Older responses key vulnerabilities by CVE id, newer ones list them
  vulns: z.union([z.array(z.string()), z.record(z.unknown())]).nullish(),
});

/**
 * Exposed services and known vulnerabilities from Shodan
 */
export class ShodanProvider implements EnrichmentProvider {
  readonly name = PROVIDER_NAMES.SHODAN;

  constructor(
    private apiKey: string,
    private baseUrl: string = APP_CONFIG.providers.shodan,
    private timeoutMs: number = APP_CONFIG.enrichment.providerTimeoutMs
  ) {}

  async lookup(ipAddress: string): Promise<PartialEnrichment> {
    const query = new URLSearchParams({ key: this.apiKey });
    const body = await fetchProviderJson(
      this.name,
      `${this.baseUrl}/host/${encodeURIComponent(ipAddress)}?${query.toString()}`,
      { Accept: 'application/json' },
      this.timeoutMs
    );

    const parsed = ShodanHostSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError(this.name, 'unexpected response shape');
    }

    const host = parsed.data;
    const vulnerabilities = Array.isArray(host.vulns)
      ? host.vulns
      : Object.keys(host.vulns ?? {});

    return {
      exposureData: {
        ports: host.ports ?? [],
        organization: host.org ?? undefined,
        hostnames: host.hostnames ?? [],
        vulnerabilities,
        vulnerabilityCount: vulnerabilities.length,
      },
    };
  }
}
